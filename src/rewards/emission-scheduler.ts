/**
 * EmissionScheduler — reward token lifecycle and window funding.
 *
 * Funding settles the global accumulators first, then converts the amount
 * into a per-second rate over a fresh window. An unexpired window rolls its
 * undistributed remainder into the new rate.
 */

import { type Caller, Role, requireAddress, requireRole } from "../access/caller.js";
import type { ProtocolContext } from "../context/protocol-context.js";
import type { Logger } from "../lib/logger/index.js";
import { requirePositive } from "../shared/amounts.js";
import {
	InvalidInputError,
	LifecycleError,
	type ProtocolError,
	RewardTooHighError,
} from "../shared/errors.js";
import { type Address, isZeroAddress } from "../shared/identifiers.js";
import { type Result, done, err, ok } from "../shared/result.js";
import type { RewardAccounting } from "./reward-accounting.js";
import { normalisationScale, rolloverRate } from "./reward-math.js";
import { toConfig } from "./reward-token-registry.js";
import type { RewardTokenConfig } from "./types.js";

export class EmissionScheduler {
	private readonly logger: Logger;

	constructor(
		private readonly ctx: ProtocolContext,
		private readonly accounting: RewardAccounting,
	) {
		this.logger = ctx.logger.child({ component: "emissions" });
	}

	/** Register a reward token with its distributor and window length. */
	addReward(
		caller: Caller,
		token: Address,
		distributor: Address,
		duration: number,
	): Result<RewardTokenConfig, ProtocolError> {
		return this.ctx.uow.run("emissions.addReward", (): Result<RewardTokenConfig, ProtocolError> => {
			const allowed = requireRole(caller, Role.Admin, "addReward");
			if (!allowed.ok) return allowed;
			const decimals = this.ctx.ledger.decimals(token);
			if (!decimals.ok) return decimals;

			const added = this.accounting.registry.add({
				token,
				decimals: decimals.value,
				distributor,
				duration,
			});
			if (!added.ok) return added;

			this.ctx.events.record({
				type: "reward_token_added",
				token,
				distributor,
				duration,
				decimals: decimals.value,
			});
			this.logger.info({ token, distributor, duration }, "reward token added");
			return ok(toConfig(added.value));
		});
	}

	/** Drop a reward token whose window has lapsed; other tokens keep their data. */
	removeReward(caller: Caller, token: Address): Result<void, ProtocolError> {
		return this.ctx.uow.run("emissions.removeReward", (): Result<void, ProtocolError> => {
			const allowed = requireRole(caller, Role.Admin, "removeReward");
			if (!allowed.ok) return allowed;
			const removed = this.accounting.registry.remove(token, this.ctx.clock.now());
			if (!removed.ok) return removed;
			this.ctx.events.record({ type: "reward_token_removed", token });
			this.logger.info({ token }, "reward token removed");
			return done();
		});
	}

	/**
	 * Pull `amount` from the distributor and start a new emission window.
	 * @returns the resulting schedule
	 */
	notifyRewardAmount(
		caller: Caller,
		token: Address,
		amount: bigint,
	): Result<RewardTokenConfig, ProtocolError> {
		return this.ctx.uow.run(
			"emissions.notifyRewardAmount",
			(): Result<RewardTokenConfig, ProtocolError> => {
				const found = this.accounting.registry.require(token);
				if (!found.ok) return found;
				const entry = found.value;
				const allowed = requireAddress(caller, entry.distributor, "notifyRewardAmount");
				if (!allowed.ok) return allowed;
				const positive = requirePositive(amount, "Reward amount");
				if (!positive.ok) return positive;

				this.accounting.settle();
				const { ledger, clock } = this.ctx;
				const pool = this.accounting.pool;
				const pulled = ledger.transferFrom(token, pool, caller.address, pool, amount);
				if (!pulled.ok) return pulled;

				const now = clock.now();
				const rate = rolloverRate({
					amount,
					decimals: entry.decimals,
					duration: entry.duration,
					now,
					periodFinish: entry.periodFinish,
					currentRate: entry.rewardRate,
				});

				// Rate must be payable from what the pool actually holds.
				let available = ledger.balanceOf(token, pool);
				if (token === this.accounting.stakingToken) available -= this.accounting.totalSupply();
				const scale = normalisationScale(entry.decimals);
				if ((rate * BigInt(entry.duration)) / scale > available) {
					return err(new RewardTooHighError(undefined, { token, rate, available }));
				}

				entry.rewardRate = rate;
				entry.lastUpdateTime = now;
				entry.periodFinish = now + entry.duration;
				this.ctx.events.record({
					type: "reward_added",
					token,
					amount,
					rewardRate: rate,
					periodFinish: entry.periodFinish,
				});
				this.logger.info(
					{ token, amount, rewardRate: rate, periodFinish: entry.periodFinish },
					"reward window funded",
				);
				return ok(toConfig(entry));
			},
		);
	}

	/** Change the window length once the current window has lapsed. */
	setRewardsDuration(caller: Caller, token: Address, duration: number): Result<void, ProtocolError> {
		return this.ctx.uow.run("emissions.setRewardsDuration", (): Result<void, ProtocolError> => {
			const found = this.accounting.registry.require(token);
			if (!found.ok) return found;
			const entry = found.value;
			const allowed = requireAddress(caller, entry.distributor, "setRewardsDuration");
			if (!allowed.ok) return allowed;
			if (this.ctx.clock.now() <= entry.periodFinish) {
				return err(
					new LifecycleError(
						"Previous rewards period must be complete before changing the duration",
						{ token, periodFinish: entry.periodFinish },
					),
				);
			}
			if (!Number.isInteger(duration) || duration <= 0) {
				return err(
					new InvalidInputError("Reward duration must be a positive number of seconds", {
						duration,
					}),
				);
			}
			entry.duration = duration;
			this.ctx.events.record({ type: "rewards_duration_updated", token, duration });
			this.logger.info({ token, duration }, "reward duration updated");
			return done();
		});
	}

	setRewardsDistributor(
		caller: Caller,
		token: Address,
		distributor: Address,
	): Result<void, ProtocolError> {
		return this.ctx.uow.run("emissions.setRewardsDistributor", (): Result<void, ProtocolError> => {
			const allowed = requireRole(caller, Role.Admin, "setRewardsDistributor");
			if (!allowed.ok) return allowed;
			const found = this.accounting.registry.require(token);
			if (!found.ok) return found;
			if (isZeroAddress(distributor)) {
				return err(new InvalidInputError("Rewards distributor cannot be the zero address"));
			}
			found.value.distributor = distributor;
			this.ctx.events.record({ type: "rewards_distributor_updated", token, distributor });
			this.logger.info({ token, distributor }, "reward distributor updated");
			return done();
		});
	}
}
