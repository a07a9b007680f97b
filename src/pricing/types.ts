import type { ProtocolError } from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

/** Latest answer of an aggregator-style price feed. */
export interface RoundData {
	readonly answer: bigint;
	/** Seconds since the epoch */
	readonly updatedAt: number;
}

/** External price oracle. The protocol only reads it. */
export interface PriceFeed {
	readonly description: string;
	decimals(): number;
	latestRoundData(): RoundData;
}

/** One conversion step toward the common quote currency. */
export interface FeedHop {
	readonly feed: PriceFeed;
	/** Divide by the answer instead of multiplying (feed quotes the other direction) */
	readonly reverse: boolean;
	/** Maximum answer age in seconds */
	readonly heartbeat: number;
}

export interface TokenPriceConfig {
	readonly hops: readonly FeedHop[];
	/** Seconds a price-checked sell order stays valid */
	readonly maxTimePriceValid: number;
}

/** Oracle-backed bound on swap outputs. */
export interface PriceChecker {
	isTokenConfigured(token: Address): boolean;
	/** Seconds a sell order of `token` stays valid after its price check */
	maxTimePriceValid(token: Address): Result<number, ProtocolError>;
	expectedOut(
		amountIn: bigint,
		tokenIn: Address,
		tokenOut: Address,
	): Result<bigint, ProtocolError>;
	checkPrice(
		amountIn: bigint,
		tokenIn: Address,
		tokenOut: Address,
		amountOutProposed: bigint,
		slippageBps: number,
	): Result<void, ProtocolError>;
}
