import type { RewardPayout } from "../rewards/types.js";
import type { Address, PoolId } from "../shared/identifiers.js";

/** What the backend does with an account's harvested rewards. */
export const CompoundMode = {
	/** Swap every reward into the staking token and restake it */
	Compound: "COMPOUND",
	/** Restake the staking-token reward; send other rewards to satellite strategies */
	Reinvest: "REINVEST",
} as const;

export type CompoundMode = (typeof CompoundMode)[keyof typeof CompoundMode];

/** Where a reward token goes in Reinvest mode. */
export interface SatelliteRoute {
	readonly satellite: Address;
	/** Pool used when the satellite's asset differs from the reward token */
	readonly swapPool: PoolId;
}

/** Yield strategy outside the pool that accepts reinvested rewards. */
export interface SatelliteStrategy {
	readonly address: Address;
	owner(): Address;
	/** Token the strategy accepts */
	asset(): Address;
	/** Pull `amount` of `asset()` from `from`, which must have approved the strategy. */
	deposit(from: Address, amount: bigint): void;
}

/** Directory of strategies deployed for users. */
export interface StrategyRegistry {
	isUserStrategy(owner: Address, strategy: Address): boolean;
}

/** Resolves the owner of a staking account. */
export interface AccountDirectory {
	ownerOf(account: Address): Address | undefined;
}

export interface AccountPosition {
	readonly account: Address;
	readonly owner: Address;
	readonly mode: CompoundMode;
	readonly staked: bigint;
	readonly slippageBps: number;
	readonly routes: ReadonlyMap<Address, SatelliteRoute>;
	/** Claimable rewards per registered reward token */
	readonly pending: ReadonlyMap<Address, bigint>;
}

export interface ReinvestReceipt {
	readonly token: Address;
	readonly satellite: Address;
	/** Reward amount taken from the harvest */
	readonly amountIn: bigint;
	/** Amount of the satellite's asset deposited */
	readonly deposited: bigint;
}

export interface ProcessingOutcome {
	readonly account: Address;
	readonly mode: CompoundMode;
	readonly harvested: RewardPayout;
	/** Staking-token amount restaked */
	readonly restaked: bigint;
	readonly reinvested: readonly ReinvestReceipt[];
}
