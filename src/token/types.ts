import type { Address } from "../shared/identifiers.js";

export interface TokenMetadata {
	readonly address: Address;
	readonly symbol: string;
	readonly decimals: number;
}
