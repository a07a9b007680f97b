/**
 * ABI encoding and hashing helpers used when describing swap orders.
 */

import { encodeFunctionData, erc20Abi, keccak256, stringToHex } from "viem";
import type { Address } from "../../shared/identifiers.js";
import { isHexAddress } from "./address.js";
import type { Hex } from "./types.js";

function hexAddress(value: Address): Hex {
	if (!isHexAddress(value)) {
		throw new Error(`Not a hex address: ${value}`);
	}
	return value;
}

/**
 * Calldata for `IERC20.transferFrom(from, to, amount)`.
 * @example encodeTransferFrom(account, feeRecipient, 10n) // "0x23b872dd..."
 */
export function encodeTransferFrom(from: Address, to: Address, amount: bigint): Hex {
	return encodeFunctionData({
		abi: erc20Abi,
		functionName: "transferFrom",
		args: [hexAddress(from), hexAddress(to), amount],
	});
}

/** keccak-256 of the UTF-8 bytes of a JSON document. */
export function hashJson(document: unknown): Hex {
	return keccak256(stringToHex(JSON.stringify(document)));
}
