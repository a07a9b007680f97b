export type { EthSigner, Hex, SignTypedDataParams } from "./types.js";
export { isHexAddress } from "./address.js";
export { toBaseUnits, fromBaseUnits } from "./units.js";
export { encodeTransferFrom, hashJson } from "./encoding.js";
export { createSigner } from "./signer.js";
