import type { Address } from "../shared/identifiers.js";

/** Smallest and largest decimal count a reward token may have. */
export const MIN_REWARD_DECIMALS = 1;
export const MAX_REWARD_DECIMALS = 18;

/** Read-only view of one reward token's emission schedule. */
export interface RewardTokenConfig {
	readonly token: Address;
	readonly decimals: number;
	readonly distributor: Address;
	/** Length of an emission window, seconds */
	readonly duration: number;
	/** End of the current window, seconds since the epoch (0 = never funded) */
	readonly periodFinish: number;
	/** Emission per second normalised to 18 decimals */
	readonly rewardRate: bigint;
	readonly rewardPerTokenStored: bigint;
	readonly lastUpdateTime: number;
}

/** Amounts paid out by one harvest, keyed by reward token, in registry order. */
export type RewardPayout = ReadonlyMap<Address, bigint>;

export interface ExitResult {
	readonly withdrawn: bigint;
	readonly rewards: RewardPayout;
}
