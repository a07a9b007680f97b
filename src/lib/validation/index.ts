/**
 * Validation wrapper — zod schemas evaluated into Result<T, ValidationError>.
 *
 * Protocol code imports `z` from here rather than from "zod" so the
 * dependency stays behind one import path.
 */

import { z } from "zod";
import { ErrorCategory, ProtocolError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Schema validation failure carrying every issue zod reported. */
export class ValidationError extends ProtocolError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.Validation, { issueCount: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Validate data against a zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: [...i.path],
		message: i.message,
	}));
	const first = issues[0];
	const summary = first ? `${first.path.join(".") || "value"}: ${first.message}` : "invalid value";
	return err(new ValidationError(`Validation failed (${summary})`, issues));
}
