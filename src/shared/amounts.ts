/**
 * Fixed-point helpers for token amounts held as bigint base units.
 */

import { InvalidInputError } from "./errors.js";
import { type Result, done, err } from "./result.js";

/** Basis-point denominator: 10_000 bps = 100%. */
export const BPS_DENOMINATOR = 10_000n;

/** 1e18, the accumulator scale. */
export const WAD = 10n ** 18n;

/** 10^decimals as bigint. */
export function pow10(decimals: number): bigint {
	if (!Number.isInteger(decimals) || decimals < 0) {
		throw new Error(`pow10: invalid exponent ${decimals}`);
	}
	return 10n ** BigInt(decimals);
}

/** True for an integer within [0, 10_000]. */
export function isValidBps(bps: number): boolean {
	return Number.isInteger(bps) && bps >= 0 && bps <= Number(BPS_DENOMINATOR);
}

/** `amount * bps / 10_000`, rounded down. */
export function applyBps(amount: bigint, bps: number): bigint {
	return (amount * BigInt(bps)) / BPS_DENOMINATOR;
}

/**
 * Lowest output accepted for an expected output at a slippage tolerance.
 * @example minimumOutput(1_000n, 100) // 990n
 */
export function minimumOutput(expected: bigint, slippageBps: number): bigint {
	return (expected * (BPS_DENOMINATOR - BigInt(slippageBps))) / BPS_DENOMINATOR;
}

/** `a * b / d`, rounded down. */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
	if (d === 0n) {
		throw new Error("mulDiv: division by zero");
	}
	return (a * b) / d;
}

/** Ok for a strictly positive amount, InvalidInputError otherwise. */
export function requirePositive(amount: bigint, what: string): Result<void, InvalidInputError> {
	if (amount > 0n) return done();
	return err(new InvalidInputError(`${what} must be greater than zero`, { amount }));
}
