export type { TokenMetadata } from "./types.js";
export { TokenLedger } from "./token-ledger.js";
