/**
 * appData documents attached to sell orders.
 *
 * The order carries only the hash; the document travels off-chain and
 * describes the pre-hook that moves the compound fee.
 */

import { encodeTransferFrom, hashJson } from "../lib/ethereum/encoding.js";
import type { Hex } from "../lib/ethereum/types.js";
import type { Address } from "../shared/identifiers.js";

export const APP_DATA_VERSION = "1.1.0";
export const HOOKS_VERSION = "0.1.0";

export interface OrderHook {
	readonly callData: Hex;
	/** Decimal string, as settlement tooling expects */
	readonly gasLimit: string;
	readonly target: Address;
}

export interface AppDataDocument {
	readonly appCode: string;
	readonly metadata: {
		readonly hooks?: { readonly pre: readonly OrderHook[]; readonly version: string };
	};
	readonly version: string;
}

export interface FeeHookParams {
	readonly token: Address;
	readonly from: Address;
	readonly recipient: Address;
	readonly amount: bigint;
	readonly gasLimit: number;
}

export function feeHook(params: FeeHookParams): OrderHook {
	return {
		callData: encodeTransferFrom(params.from, params.recipient, params.amount),
		gasLimit: String(params.gasLimit),
		target: params.token,
	};
}

/**
 * @example
 * const { hash } = buildAppData("restake", [feeHook({ ... })]);
 */
export function buildAppData(
	appCode: string,
	preHooks: readonly OrderHook[] = [],
): { document: AppDataDocument; hash: Hex } {
	const document: AppDataDocument = {
		appCode,
		metadata: preHooks.length > 0 ? { hooks: { pre: preHooks, version: HOOKS_VERSION } } : {},
		version: APP_DATA_VERSION,
	};
	return { document, hash: hashJson(document) };
}
