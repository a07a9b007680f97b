import { describe, expect, it } from "vitest";
import {
	DEFAULT_PROTOCOL_CONFIG,
	MAX_SLIPPAGE_BPS,
	configFromEnv,
	resolveConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";

const RECIPIENT = `0x${"fe".repeat(20)}`;

describe("ProtocolConfig", () => {
	it("has defaults within bounds", () => {
		expect(DEFAULT_PROTOCOL_CONFIG.defaultSlippageBps).toBe(100);
		expect(DEFAULT_PROTOCOL_CONFIG.maxSlippageBps).toBe(MAX_SLIPPAGE_BPS);
		expect(DEFAULT_PROTOCOL_CONFIG.compoundFeeBps).toBe(0);
		expect(DEFAULT_PROTOCOL_CONFIG.feeRecipient).toBeUndefined();
	});

	describe("resolveConfig", () => {
		it("returns defaults when nothing is overridden", () => {
			const result = resolveConfig();
			expect(result.ok).toBe(true);
			if (result.ok) expect(result.value.appCode).toBe("restake");
		});

		it("lowercases the fee recipient", () => {
			const result = resolveConfig({
				compoundFeeBps: 25,
				feeRecipient: RECIPIENT.toUpperCase().replace("0X", "0x"),
			});
			expect(result.ok).toBe(true);
			if (result.ok) expect(result.value.feeRecipient).toBe(RECIPIENT);
		});

		it("rejects a default above the maximum", () => {
			const result = resolveConfig({ defaultSlippageBps: 600, maxSlippageBps: 500 });
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ConfigError);
				expect(result.error.message).toBe(
					"Invalid protocol config: defaultSlippageBps: defaultSlippageBps must not exceed maxSlippageBps",
				);
			}
		});

		it("requires a recipient for a nonzero fee", () => {
			const result = resolveConfig({ compoundFeeBps: 10 });
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.message).toContain("feeRecipient is required");
		});

		it("rejects a max slippage above the hard ceiling", () => {
			expect(resolveConfig({ maxSlippageBps: MAX_SLIPPAGE_BPS + 1 }).ok).toBe(false);
		});
	});

	describe("configFromEnv", () => {
		it("reads RESTAKE_* variables", () => {
			const overrides = configFromEnv({
				RESTAKE_DEFAULT_SLIPPAGE_BPS: "50",
				RESTAKE_COMPOUND_FEE_BPS: "30",
				RESTAKE_FEE_RECIPIENT: RECIPIENT,
				RESTAKE_LOG_LEVEL: "debug",
			});
			expect(overrides).toEqual({
				defaultSlippageBps: 50,
				compoundFeeBps: 30,
				feeRecipient: RECIPIENT,
				logLevel: "debug",
			});
		});

		it("ignores unset and empty variables", () => {
			expect(configFromEnv({ RESTAKE_APP_CODE: "" })).toEqual({});
		});

		it("throws on non-integer numbers", () => {
			expect(() => configFromEnv({ RESTAKE_HOOK_GAS_LIMIT: "12.5" })).toThrow(ConfigError);
			expect(() => configFromEnv({ RESTAKE_MAX_SLIPPAGE_BPS: "-1" })).toThrow(
				'Invalid RESTAKE_MAX_SLIPPAGE_BPS: "-1" must be a non-negative integer',
			);
		});

		it("feeds resolveConfig", () => {
			const result = resolveConfig(configFromEnv({ RESTAKE_DEFAULT_SLIPPAGE_BPS: "9999" }));
			expect(result.ok).toBe(false);
		});
	});
});
