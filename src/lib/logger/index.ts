/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Objects marked `__opaque: true` (signing keys) are replaced with
 * "[REDACTED]" before they reach pino; further paths can be redacted by
 * configuration.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	readonly bindings?: Record<string, unknown>;
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Credential redaction ────────────────────────────────────────────

function isOpaque(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		"__opaque" in value &&
		(value as { __opaque: unknown }).__opaque === true
	);
}

function redactOpaque(obj: Record<string, unknown>): Record<string, unknown> | string {
	if (isOpaque(obj)) return "[REDACTED]";
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaque(value) ? "[REDACTED]" : value;
	}
	return result;
}

/** bigint is not JSON-serialisable; log amounts as decimal strings. */
function stringifyBigints(obj: Record<string, unknown> | string): Record<string, unknown> | string {
	if (typeof obj === "string") return obj;
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = typeof value === "bigint" ? value.toString() : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type WriteLevel = "info" | "warn" | "error" | "debug";

function wrapPino(base: pino.Logger): Logger {
	const write =
		(level: WriteLevel) =>
		(msgOrObj: string | Record<string, unknown>, msg?: string): void => {
			if (typeof msgOrObj === "string") {
				base[level](msgOrObj);
				return;
			}
			const payload = stringifyBigints(redactOpaque(msgOrObj));
			if (typeof payload === "string") {
				base[level]({ value: payload }, msg ?? "");
			} else {
				base[level](payload, msg ?? "");
			}
		};

	return {
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
		debug: write("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(base.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" }).child({ component: "rewards" });
 * logger.info({ account, amount: 10n }, "staked");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: pino.LoggerOptions = { level: config.level };
	if (config.redactPaths && config.redactPaths.length > 0) {
		options.redact = { paths: [...config.redactPaths], censor: "[REDACTED]" };
	}
	if (config.bindings) {
		options.base = config.bindings;
	}

	const base = config.destination
		? pino(options, {
				write(chunk: string): void {
					config.destination?.write(chunk);
				},
			})
		: pino(options);

	return wrapPino(base);
}

/** Logger that discards everything; the default for components built without one. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
