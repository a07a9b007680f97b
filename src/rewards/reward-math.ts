/**
 * Reward-per-token accounting in pure functions.
 *
 * Rates are stored normalised to 18 decimals so tokens of any precision
 * share one accumulator scale (1e18). Payouts divide the normalisation
 * back out into the token's own base units.
 */

import { WAD, mulDiv, pow10 } from "../shared/amounts.js";

/** Factor lifting a token's base units to 18 decimals. */
export function normalisationScale(decimals: number): bigint {
	return pow10(18 - decimals);
}

/** Scaled per-second rate for `amount` base units spread over `duration` seconds. */
export function scaledRate(amount: bigint, decimals: number, duration: number): bigint {
	return (amount * normalisationScale(decimals)) / BigInt(duration);
}

/** Emission window end clamped to now. */
export function lastTimeApplicable(now: number, periodFinish: number): number {
	return Math.min(now, periodFinish);
}

/**
 * Accumulator value at `applicableTime`.
 * With nothing staked the accumulator does not move.
 */
export function rewardPerToken(
	stored: bigint,
	rewardRate: bigint,
	lastUpdateTime: number,
	applicableTime: number,
	totalSupply: bigint,
): bigint {
	if (totalSupply === 0n) return stored;
	const elapsed = BigInt(Math.max(0, applicableTime - lastUpdateTime));
	return stored + mulDiv(elapsed * rewardRate, WAD, totalSupply);
}

/** Claimable base units for a balance between two accumulator readings. */
export function earned(
	balance: bigint,
	currentRewardPerToken: bigint,
	paidRewardPerToken: bigint,
	accrued: bigint,
	decimals: number,
): bigint {
	const scaled = mulDiv(balance, currentRewardPerToken - paidRewardPerToken, WAD);
	return scaled / normalisationScale(decimals) + accrued;
}

/**
 * Rate after funding a window with `amount`.
 * An unexpired window rolls its undistributed remainder into the new one.
 */
export function rolloverRate(params: {
	readonly amount: bigint;
	readonly decimals: number;
	readonly duration: number;
	readonly now: number;
	readonly periodFinish: number;
	readonly currentRate: bigint;
}): bigint {
	const scaledAmount = params.amount * normalisationScale(params.decimals);
	if (params.now >= params.periodFinish) {
		return scaledAmount / BigInt(params.duration);
	}
	const remaining = BigInt(params.periodFinish - params.now) * params.currentRate;
	return (scaledAmount + remaining) / BigInt(params.duration);
}
