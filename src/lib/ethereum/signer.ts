/**
 * Ethereum signer wrapper — keeps viem's local account behind EthSigner.
 */

import { privateKeyToAccount } from "viem/accounts";
import { address } from "../../shared/identifiers.js";
import type { EthSigner, Hex, SignTypedDataParams } from "./types.js";

const HEX_KEY_RE = /^0x[0-9a-fA-F]{64}$/;

/**
 * Creates an EthSigner from a private key hex string.
 * The key never appears in `toString`, `toJSON` or log output.
 * @throws Error if the key is not 32 bytes of hex
 */
export function createSigner(privateKey: string): EthSigner {
	if (!HEX_KEY_RE.test(privateKey)) {
		throw new Error("Invalid private key format");
	}
	let account: ReturnType<typeof privateKeyToAccount>;
	try {
		account = privateKeyToAccount(privateKey as Hex);
	} catch {
		throw new Error("Invalid private key format");
	}

	const signer: EthSigner = {
		address: address(account.address),

		async signMessage(message: string): Promise<Hex> {
			return account.signMessage({ message });
		},

		async signTypedData(params: SignTypedDataParams): Promise<Hex> {
			return account.signTypedData({
				domain: params.domain as Record<string, unknown>,
				types: params.types as Record<string, { name: string; type: string }[]>,
				primaryType: params.primaryType,
				message: params.message,
			});
		},
	};

	Object.defineProperty(signer, "__opaque", { value: true, enumerable: true });
	Object.defineProperty(signer, "toString", { value: () => "[EthSigner]", enumerable: false });
	Object.defineProperty(signer, "toJSON", { value: () => "[EthSigner]", enumerable: false });

	return signer;
}
