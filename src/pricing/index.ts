export type {
	RoundData,
	PriceFeed,
	FeedHop,
	TokenPriceConfig,
	PriceChecker,
} from "./types.js";
export { OraclePriceChecker } from "./oracle-price-checker.js";
