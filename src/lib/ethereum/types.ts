/**
 * Ethereum library wrapper — type definitions.
 *
 * Domain code talks to these interfaces; only the files under lib/ethereum
 * import viem.
 */

import type { Address } from "../../shared/identifiers.js";

/** A 0x-prefixed hex string, as produced by hashing and ABI encoding. */
export type Hex = `0x${string}`;

/** Parameters for signing EIP-712 typed data. */
export interface SignTypedDataParams {
	readonly domain: {
		readonly name?: string;
		readonly version?: string;
		readonly chainId?: number;
		readonly verifyingContract?: string;
	};
	readonly types: Record<string, readonly { readonly name: string; readonly type: string }[]>;
	readonly primaryType: string;
	readonly message: Record<string, unknown>;
}

/** Backend signing key, exposed only through signing operations. */
export interface EthSigner {
	readonly address: Address;
	signMessage(message: string): Promise<Hex>;
	signTypedData(params: SignTypedDataParams): Promise<Hex>;
}
