/**
 * Protocol events — one record per observable state change.
 *
 * Events are buffered while a unit of work runs and published only when it
 * commits, so a rolled-back call leaves nothing behind in the log.
 */

import type { Address, PoolId } from "../shared/identifiers.js";
import type { CompoundMode } from "../strategy/types.js";

export type ProtocolEvent =
	// tokens
	| TransferEvent
	| ApprovalEvent
	// reward lifecycle
	| RewardTokenAdded
	| RewardTokenRemoved
	| RewardAdded
	| RewardsDurationUpdated
	| RewardsDistributorUpdated
	| Recovered
	| DepositsPaused
	| DepositsUnpaused
	// staking
	| Staked
	| Withdrawn
	| RewardPaid
	// accounts and slippage
	| AccountRegistered
	| CompoundModeUpdated
	| AccountSlippageUpdated
	| DefaultSlippageUpdated
	| SatelliteRouteUpdated
	// swaps and processing
	| PriceFeedConfigured
	| TokenSwapApproved
	| SwapExecuted
	| Reinvested
	| RewardsProcessed;

export type ProtocolEventType = ProtocolEvent["type"];

export type EventOfType<K extends ProtocolEventType> = Extract<ProtocolEvent, { type: K }>;

export function isEventOfType<K extends ProtocolEventType>(
	event: ProtocolEvent,
	type: K,
): event is EventOfType<K> {
	return event.type === type;
}

// ── Tokens ───────────────────────────────────────────────────────────

export interface TransferEvent {
	readonly type: "transfer";
	readonly token: Address;
	readonly from: Address;
	readonly to: Address;
	readonly amount: bigint;
}

export interface ApprovalEvent {
	readonly type: "approval";
	readonly token: Address;
	readonly owner: Address;
	readonly spender: Address;
	readonly amount: bigint;
}

// ── Reward lifecycle ─────────────────────────────────────────────────

export interface RewardTokenAdded {
	readonly type: "reward_token_added";
	readonly token: Address;
	readonly distributor: Address;
	readonly duration: number;
	readonly decimals: number;
}

export interface RewardTokenRemoved {
	readonly type: "reward_token_removed";
	readonly token: Address;
}

export interface RewardAdded {
	readonly type: "reward_added";
	readonly token: Address;
	readonly amount: bigint;
	/** Scaled rate (18-decimal normalised units per second) */
	readonly rewardRate: bigint;
	readonly periodFinish: number;
}

export interface RewardsDurationUpdated {
	readonly type: "rewards_duration_updated";
	readonly token: Address;
	readonly duration: number;
}

export interface RewardsDistributorUpdated {
	readonly type: "rewards_distributor_updated";
	readonly token: Address;
	readonly distributor: Address;
}

export interface Recovered {
	readonly type: "recovered";
	readonly token: Address;
	readonly amount: bigint;
	readonly to: Address;
}

export interface DepositsPaused {
	readonly type: "deposits_paused";
	readonly by: Address;
}

export interface DepositsUnpaused {
	readonly type: "deposits_unpaused";
	readonly by: Address;
}

// ── Staking ──────────────────────────────────────────────────────────

export interface Staked {
	readonly type: "staked";
	readonly account: Address;
	readonly amount: bigint;
}

export interface Withdrawn {
	readonly type: "withdrawn";
	readonly account: Address;
	readonly amount: bigint;
}

export interface RewardPaid {
	readonly type: "reward_paid";
	readonly account: Address;
	readonly token: Address;
	readonly amount: bigint;
}

// ── Accounts ─────────────────────────────────────────────────────────

export interface AccountRegistered {
	readonly type: "account_registered";
	readonly account: Address;
	readonly owner: Address;
}

export interface CompoundModeUpdated {
	readonly type: "compound_mode_updated";
	readonly account: Address;
	readonly mode: CompoundMode;
}

export interface AccountSlippageUpdated {
	readonly type: "account_slippage_updated";
	readonly account: Address;
	readonly slippageBps: number;
}

export interface DefaultSlippageUpdated {
	readonly type: "default_slippage_updated";
	readonly slippageBps: number;
}

export interface SatelliteRouteUpdated {
	readonly type: "satellite_route_updated";
	readonly account: Address;
	readonly token: Address;
	readonly satellite: Address;
	readonly swapPool: PoolId;
}

// ── Swaps and processing ─────────────────────────────────────────────

export interface PriceFeedConfigured {
	readonly type: "price_feed_configured";
	readonly token: Address;
	readonly hops: number;
}

export interface TokenSwapApproved {
	readonly type: "token_swap_approved";
	readonly token: Address;
}

export interface SwapExecuted {
	readonly type: "swap_executed";
	readonly account: Address;
	readonly tokenIn: Address;
	readonly tokenOut: Address;
	readonly amountIn: bigint;
	readonly amountOut: bigint;
	readonly fee: bigint;
}

export interface Reinvested {
	readonly type: "reinvested";
	readonly account: Address;
	readonly token: Address;
	readonly satellite: Address;
	readonly amount: bigint;
}

export interface RewardsProcessed {
	readonly type: "rewards_processed";
	readonly account: Address;
	readonly mode: CompoundMode;
	/** Staking-token amount restaked by this call */
	readonly restaked: bigint;
}
