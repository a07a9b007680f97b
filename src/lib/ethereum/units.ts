/**
 * Decimal-string ⇄ base-unit conversion for token amounts.
 */

import { formatUnits, parseUnits } from "viem";

/**
 * Converts a human-readable amount to base units.
 * @example toBaseUnits("1.5", 6) // 1_500_000n
 */
export function toBaseUnits(value: string, decimals: number): bigint {
	return parseUnits(value, decimals);
}

/**
 * Converts base units to a human-readable decimal string.
 * @example fromBaseUnits(1_500_000n, 6) // "1.5"
 */
export function fromBaseUnits(amount: bigint, decimals: number): string {
	return formatUnits(amount, decimals);
}
