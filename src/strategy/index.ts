export {
	CompoundMode,
	type SatelliteRoute,
	type SatelliteStrategy,
	type StrategyRegistry,
	type AccountDirectory,
	type AccountPosition,
	type ReinvestReceipt,
	type ProcessingOutcome,
} from "./types.js";
export { AccountBook, type AccountRecord } from "./account-book.js";
export {
	StrategyRewardProcessor,
	type RewardProcessorOptions,
} from "./reward-processor.js";
