/**
 * ProtocolError hierarchy — structured error classification.
 *
 * Every error carries a category that tells the caller what went wrong at
 * the protocol level: bad input, missing capability, unmet precondition,
 * failing collaborator, or a lifecycle misuse by an operator. Nothing is
 * retried by the library; the category is for callers and for logs.
 */

/** Error categories of the protocol's failure taxonomy. */
export const ErrorCategory = {
	Validation: "validation",
	Authorization: "authorization",
	Precondition: "precondition",
	External: "external",
	Lifecycle: "lifecycle",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Free-form diagnostic context; a `cause` entry is lifted onto `Error.cause`. */
export type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

/** Base error class for every failed protocol operation. */
export class ProtocolError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
		hint?: string,
	) {
		super(message);
		const { cause, ...rest } = context;
		this.name = "ProtocolError";
		this.category = category;
		this.code = code;
		this.context = rest;
		this.hint = hint;
		if (cause !== undefined) this.cause = cause;
	}

	/** Operator-side mistakes (lifecycle, fatal) rather than runtime conditions a user can hit. */
	get isOperational(): boolean {
		return this.category === ErrorCategory.Lifecycle || this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Validation ───────────────────────────────────────────────────────

/** Zero amount, zero address, out-of-range basis points and similar input faults. */
export class InvalidInputError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVALID_INPUT", ErrorCategory.Validation, context);
		this.name = "InvalidInputError";
	}
}

/** Caller-supplied arrays whose length does not match the registered set. */
export class LengthMismatchError extends ProtocolError {
	readonly expected: number;
	readonly actual: number;

	constructor(message: string, expected: number, actual: number, context: ErrorContext = {}) {
		super(message, "LENGTH_MISMATCH", ErrorCategory.Validation, { ...context, expected, actual });
		this.name = "LengthMismatchError";
		this.expected = expected;
		this.actual = actual;
	}
}

/** Lookup of an unknown token, account or route. */
export class NotFoundError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "NOT_FOUND", ErrorCategory.Validation, context);
		this.name = "NotFoundError";
	}
}

// ── Authorization ────────────────────────────────────────────────────

/** Caller lacks the role or ownership an operation requires. */
export class UnauthorizedError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "UNAUTHORIZED", ErrorCategory.Authorization, context);
		this.name = "UnauthorizedError";
	}
}

// ── Preconditions ────────────────────────────────────────────────────

/** Balance too low for a withdrawal or token movement. */
export class InsufficientBalanceError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INSUFFICIENT_BALANCE", ErrorCategory.Precondition, context);
		this.name = "InsufficientBalanceError";
	}
}

/** Spender allowance too low for a pull. */
export class InsufficientAllowanceError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INSUFFICIENT_ALLOWANCE", ErrorCategory.Precondition, context);
		this.name = "InsufficientAllowanceError";
	}
}

/** Deposits are halted by the guardian. */
export class DepositsPausedError extends ProtocolError {
	constructor(message = "Deposits are paused", context: ErrorContext = {}) {
		super(message, "DEPOSITS_PAUSED", ErrorCategory.Precondition, context);
		this.name = "DepositsPausedError";
	}
}

/** A satellite strategy does not belong to the account's owner. */
export class OwnershipMismatchError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "OWNERSHIP_MISMATCH", ErrorCategory.Precondition, context);
		this.name = "OwnershipMismatchError";
	}
}

/** Funding would leave the emission schedule insolvent. */
export class RewardTooHighError extends ProtocolError {
	constructor(message = "Provided reward too high", context: ErrorContext = {}) {
		super(message, "REWARD_TOO_HIGH", ErrorCategory.Precondition, context);
		this.name = "RewardTooHighError";
	}
}

// ── External dependencies ────────────────────────────────────────────

/** Proposed swap output falls below the oracle-implied minimum, or the oracle is unusable. */
export class PriceCheckError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "PRICE_CHECK_FAILED", ErrorCategory.External, context);
		this.name = "PriceCheckError";
	}
}

/** A collaborator (venue, satellite, feed) failed or misbehaved. */
export class ExternalCallError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "EXTERNAL_CALL_FAILED", ErrorCategory.External, context);
		this.name = "ExternalCallError";
	}
}

// ── Lifecycle ────────────────────────────────────────────────────────

/** Operator misuse of the reward lifecycle (re-adding, removing an active window, ...). */
export class LifecycleError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "LIFECYCLE_VIOLATION", ErrorCategory.Lifecycle, context);
		this.name = "LifecycleError";
	}
}

// ── Fatal ────────────────────────────────────────────────────────────

/** Invalid or missing configuration. */
export class ConfigError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

// ── Classification helper ────────────────────────────────────────────

/**
 * Classify anything thrown inside a unit of work.
 *
 * Protocol errors pass through untouched. Anything else came from a
 * collaborator (satellite deposit, venue settlement, price feed) and is
 * reported as an external failure with the original as its cause.
 */
export function classifyError(error: unknown): ProtocolError {
	if (error instanceof ProtocolError) return error;
	if (error instanceof Error) {
		return new ExternalCallError(error.message, { cause: error });
	}
	return new ExternalCallError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isProtocolError(e: unknown): e is ProtocolError {
	return e instanceof ProtocolError;
}

export function isPriceCheckError(e: unknown): e is PriceCheckError {
	return e instanceof PriceCheckError;
}

export function isUnauthorized(e: unknown): e is UnauthorizedError {
	return e instanceof UnauthorizedError;
}

export function isOwnershipMismatch(e: unknown): e is OwnershipMismatchError {
	return e instanceof OwnershipMismatchError;
}
