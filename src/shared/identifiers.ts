/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * Addresses are stored lowercase so they can key maps directly; checksum
 * casing is accepted on input and discarded.
 */

import { isHexAddress } from "../lib/ethereum/address.js";

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Account, token, strategy or pool address (lowercase 0x-hex). */
export type Address = Brand<string, "Address">;
/** Identifier of a swap pool inside the execution venue. */
export type PoolId = Brand<string, "PoolId">;

export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000" as Address;

// ── Factory functions with validation ────────────────────────────────

/** Create a validated Address from a raw string. Throws on malformed input. */
export function address(value: string): Address {
	const trimmed = value.trim();
	if (!isHexAddress(trimmed)) {
		throw new Error(`Address must be 20 bytes of 0x-prefixed hex, got: ${trimmed}`);
	}
	return trimmed.toLowerCase() as Address;
}

/** Create a PoolId from a raw string. Throws if empty. */
export function poolId(value: string): PoolId {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error("PoolId cannot be empty");
	}
	return trimmed as PoolId;
}

export function isZeroAddress(value: Address): boolean {
	return value === ZERO_ADDRESS;
}

/** Extract the raw string from a branded identifier. */
export function idToString(id: Address | PoolId): string {
	return id as string;
}
