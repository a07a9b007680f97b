/**
 * Protocol configuration.
 *
 * Defaults are safe for tests and local runs; deployments override them
 * through `RESTAKE_*` environment variables or an explicit object.
 */

import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { type Address, address } from "./identifiers.js";
import { type Result, err, ok } from "./result.js";

/** Hard ceiling for any slippage tolerance the protocol accepts. */
export const MAX_SLIPPAGE_BPS = 2_500;

export interface ProtocolConfig {
	/** Slippage used for accounts that did not set their own (bps) */
	readonly defaultSlippageBps: number;
	/** Upper bound for default and per-account slippage (bps) */
	readonly maxSlippageBps: number;
	/** Fee taken from each compounding swap before the sell order (bps) */
	readonly compoundFeeBps: number;
	/** Receiver of the compound fee; required when the fee is nonzero */
	readonly feeRecipient?: Address | undefined;
	/** Gas limit recorded on the fee pre-hook of sell orders */
	readonly hookGasLimit: number;
	/** Application code stamped into order appData */
	readonly appCode: string;
	readonly logLevel: "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
}

export const DEFAULT_PROTOCOL_CONFIG: ProtocolConfig = {
	defaultSlippageBps: 100,
	maxSlippageBps: MAX_SLIPPAGE_BPS,
	compoundFeeBps: 0,
	hookGasLimit: 100_000,
	appCode: "restake",
	logLevel: "info",
};

const bps = z.number().int().min(0).max(10_000);

const configSchema = z
	.object({
		defaultSlippageBps: bps.min(1),
		maxSlippageBps: bps.max(MAX_SLIPPAGE_BPS),
		compoundFeeBps: bps.max(1_000),
		feeRecipient: z
			.string()
			.regex(/^0x[0-9a-fA-F]{40}$/, "must be a 20-byte hex address")
			.transform((v) => address(v))
			.optional(),
		hookGasLimit: z.number().int().positive(),
		appCode: z.string().min(1),
		logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]),
	})
	.refine((c) => c.defaultSlippageBps <= c.maxSlippageBps, {
		message: "defaultSlippageBps must not exceed maxSlippageBps",
		path: ["defaultSlippageBps"],
	})
	.refine((c) => c.compoundFeeBps === 0 || c.feeRecipient !== undefined, {
		message: "feeRecipient is required when compoundFeeBps is nonzero",
		path: ["feeRecipient"],
	});

/**
 * Merges overrides onto the defaults and validates the result.
 * @returns Ok with the full config, or Err(ConfigError) listing every issue
 */
export function resolveConfig(
	overrides: Partial<Record<keyof ProtocolConfig, unknown>> = {},
): Result<ProtocolConfig, ConfigError> {
	const result = validate(configSchema, { ...DEFAULT_PROTOCOL_CONFIG, ...overrides });
	if (result.ok) return ok(result.value);
	const detail = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
	return err(new ConfigError(`Invalid protocol config: ${detail}`, { issues: result.error.issues }));
}

/** Raw overrides as read from the environment, validated by `resolveConfig`. */
export interface ConfigOverrides {
	defaultSlippageBps?: number;
	maxSlippageBps?: number;
	compoundFeeBps?: number;
	feeRecipient?: string;
	hookGasLimit?: number;
	appCode?: string;
	logLevel?: string;
}

/**
 * Reads config overrides from environment variables.
 * Supported: RESTAKE_DEFAULT_SLIPPAGE_BPS, RESTAKE_MAX_SLIPPAGE_BPS,
 * RESTAKE_COMPOUND_FEE_BPS, RESTAKE_FEE_RECIPIENT, RESTAKE_HOOK_GAS_LIMIT,
 * RESTAKE_APP_CODE, RESTAKE_LOG_LEVEL.
 * @throws ConfigError if a numeric variable is not a non-negative integer
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
	const result: ConfigOverrides = {};

	readIntEnv(env, "RESTAKE_DEFAULT_SLIPPAGE_BPS", (v) => {
		result.defaultSlippageBps = v;
	});
	readIntEnv(env, "RESTAKE_MAX_SLIPPAGE_BPS", (v) => {
		result.maxSlippageBps = v;
	});
	readIntEnv(env, "RESTAKE_COMPOUND_FEE_BPS", (v) => {
		result.compoundFeeBps = v;
	});
	readIntEnv(env, "RESTAKE_HOOK_GAS_LIMIT", (v) => {
		result.hookGasLimit = v;
	});

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const recipient = env["RESTAKE_FEE_RECIPIENT"];
	if (recipient) result.feeRecipient = recipient;
	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const appCode = env["RESTAKE_APP_CODE"];
	if (appCode) result.appCode = appCode;
	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const logLevel = env["RESTAKE_LOG_LEVEL"];
	if (logLevel) result.logLevel = logLevel;

	return result;
}

function readIntEnv(
	env: NodeJS.ProcessEnv,
	key: string,
	assign: (value: number) => void,
): void {
	const raw = env[key];
	if (!raw) return;
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim() || parsed < 0) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a non-negative integer`);
	}
	assign(parsed);
}
