export {
	MIN_REWARD_DECIMALS,
	MAX_REWARD_DECIMALS,
	type RewardTokenConfig,
	type RewardPayout,
	type ExitResult,
} from "./types.js";
export { RewardTokenRegistry, type RewardEntry, type NewRewardToken } from "./reward-token-registry.js";
export {
	RewardAccounting,
	type RewardAccountingOptions,
	type StakeState,
} from "./reward-accounting.js";
export { EmissionScheduler } from "./emission-scheduler.js";
export {
	forecastEmissions,
	type EmissionForecast,
	type EmissionForecastInput,
} from "./emission-forecast.js";
export {
	normalisationScale,
	scaledRate,
	rewardPerToken,
	earned,
	rolloverRate,
	lastTimeApplicable,
} from "./reward-math.js";
