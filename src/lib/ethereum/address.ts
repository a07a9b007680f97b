import { isAddress } from "viem";
import type { Hex } from "./types.js";

/** True for a 20-byte hex address; checksum casing is not enforced. */
export function isHexAddress(value: string): value is Hex {
	return isAddress(value, { strict: false });
}
