/**
 * RewardAccounting — stake balances and per-token reward accrual.
 *
 * Every balance-affecting operation settles all registered reward tokens
 * for the account, in registry order, before the balance changes. Each
 * public mutation runs in its own unit of work.
 */

import { type Caller, Role, requireRole } from "../access/caller.js";
import type { ProtocolContext } from "../context/protocol-context.js";
import type { Logger } from "../lib/logger/index.js";
import { requirePositive } from "../shared/amounts.js";
import {
	DepositsPausedError,
	InsufficientBalanceError,
	InvalidInputError,
	type NotFoundError,
	type ProtocolError,
} from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { type Result, done, err, ok } from "../shared/result.js";
import { JournaledMap } from "../transaction/journaled-map.js";
import type { Snapshottable } from "../transaction/types.js";
import {
	earned,
	lastTimeApplicable,
	normalisationScale,
	rewardPerToken,
} from "./reward-math.js";
import { type RewardEntry, RewardTokenRegistry, toConfig } from "./reward-token-registry.js";
import type { ExitResult, RewardPayout, RewardTokenConfig } from "./types.js";

/** Scalar stake state; per-account balances are journaled. */
export interface StakeState {
	readonly totalSupply: bigint;
	readonly paused: boolean;
}

export interface RewardAccountingOptions {
	/** Token users stake; also the compounding target */
	readonly stakingToken: Address;
	/** Address holding staked principal and reward funds */
	readonly pool: Address;
}

export class RewardAccounting implements Snapshottable<StakeState> {
	readonly stakingToken: Address;
	readonly pool: Address;
	readonly registry: RewardTokenRegistry;

	private supply = 0n;
	private readonly balances: JournaledMap<Address, bigint>;
	private depositsPaused = false;
	private readonly logger: Logger;

	constructor(
		private readonly ctx: ProtocolContext,
		options: RewardAccountingOptions,
	) {
		this.stakingToken = options.stakingToken;
		this.pool = options.pool;
		this.logger = ctx.logger.child({ component: "rewards" });
		this.registry = new RewardTokenRegistry(ctx.uow);
		this.balances = new JournaledMap(ctx.uow);
		ctx.uow.register("rewards.registry", this.registry);
		ctx.uow.register("rewards.stakes", this);
	}

	// ── Views ──────────────────────────────────────────────────────

	totalSupply(): bigint {
		return this.supply;
	}

	balanceOf(account: Address): bigint {
		return this.balances.get(account) ?? 0n;
	}

	paused(): boolean {
		return this.depositsPaused;
	}

	rewardTokens(): Address[] {
		return this.registry.tokens();
	}

	rewardData(token: Address): Result<RewardTokenConfig, NotFoundError> {
		const entry = this.registry.require(token);
		return entry.ok ? ok(toConfig(entry.value)) : entry;
	}

	lastTimeRewardApplicable(token: Address): Result<number, NotFoundError> {
		return this.view(token, (e) => lastTimeApplicable(this.ctx.clock.now(), e.periodFinish));
	}

	rewardPerToken(token: Address): Result<bigint, NotFoundError> {
		return this.view(token, (e) => this.currentRewardPerToken(e));
	}

	earned(account: Address, token: Address): Result<bigint, NotFoundError> {
		return this.view(token, (e) => this.earnedOn(e, account));
	}

	/** Base units emitted over one full window at the current rate. */
	getRewardForDuration(token: Address): Result<bigint, NotFoundError> {
		return this.view(
			token,
			(e) => (e.rewardRate * BigInt(e.duration)) / normalisationScale(e.decimals),
		);
	}

	/** Current emission in the token's own base units per second. */
	rewardRatePerSecond(token: Address): Result<bigint, NotFoundError> {
		return this.view(token, (e) => e.rewardRate / normalisationScale(e.decimals));
	}

	// ── Staking ────────────────────────────────────────────────────

	/** Pull `amount` of the staking token from the caller and stake it. */
	stake(caller: Caller, amount: bigint): Result<void, ProtocolError> {
		const account = caller.address;
		return this.ctx.uow.run("rewards.stake", (): Result<void, ProtocolError> => {
			if (this.depositsPaused) return err(new DepositsPausedError());
			const positive = requirePositive(amount, "Stake amount");
			if (!positive.ok) return positive;

			this.settle(account);
			const pulled = this.ctx.ledger.transferFrom(
				this.stakingToken,
				this.pool,
				account,
				this.pool,
				amount,
			);
			if (!pulled.ok) return pulled;

			this.supply += amount;
			this.balances.set(account, this.balanceOf(account) + amount);
			this.ctx.events.record({ type: "staked", account, amount });
			this.logger.debug({ account, amount, totalSupply: this.supply }, "staked");
			return done();
		});
	}

	/** Unstake and return `amount` to the caller. Allowed while deposits are paused. */
	withdraw(caller: Caller, amount: bigint): Result<void, ProtocolError> {
		const account = caller.address;
		return this.ctx.uow.run("rewards.withdraw", (): Result<void, ProtocolError> => {
			const positive = requirePositive(amount, "Withdraw amount");
			if (!positive.ok) return positive;
			const balance = this.balanceOf(account);
			if (amount > balance) {
				return err(
					new InsufficientBalanceError("Withdraw amount exceeds staked balance", {
						account,
						balance,
						amount,
					}),
				);
			}

			this.settle(account);
			this.supply -= amount;
			this.balances.set(account, balance - amount);
			const sent = this.ctx.ledger.transfer(this.stakingToken, this.pool, account, amount);
			if (!sent.ok) return sent;

			this.ctx.events.record({ type: "withdrawn", account, amount });
			this.logger.debug({ account, amount, totalSupply: this.supply }, "withdrawn");
			return done();
		});
	}

	/**
	 * Settle and pay every reward token the caller has accrued.
	 * @returns nonzero payouts keyed by token, in registry order
	 */
	getReward(caller: Caller): Result<RewardPayout, ProtocolError> {
		const account = caller.address;
		return this.ctx.uow.run("rewards.getReward", (): Result<RewardPayout, ProtocolError> => {
			this.settle(account);
			const paid = new Map<Address, bigint>();
			for (const entry of this.registry.list()) {
				const amount = entry.accrued.get(account) ?? 0n;
				if (amount === 0n) continue;
				entry.accrued.set(account, 0n);
				const sent = this.ctx.ledger.transfer(entry.token, this.pool, account, amount);
				if (!sent.ok) return sent;
				paid.set(entry.token, amount);
				this.ctx.events.record({ type: "reward_paid", account, token: entry.token, amount });
			}
			if (paid.size > 0) this.logger.debug({ account, tokens: paid.size }, "rewards paid");
			return ok(paid);
		});
	}

	/** Withdraw the whole balance and claim every reward in one step. */
	exit(caller: Caller): Result<ExitResult, ProtocolError> {
		return this.ctx.uow.run("rewards.exit", (): Result<ExitResult, ProtocolError> => {
			const balance = this.balanceOf(caller.address);
			if (balance === 0n) {
				return err(new InvalidInputError("Nothing to withdraw", { account: caller.address }));
			}
			const withdrawn = this.withdraw(caller, balance);
			if (!withdrawn.ok) return withdrawn;
			const rewards = this.getReward(caller);
			if (!rewards.ok) return rewards;
			return ok({ withdrawn: balance, rewards: rewards.value });
		});
	}

	// ── Administration ─────────────────────────────────────────────

	pauseDeposits(caller: Caller): Result<void, ProtocolError> {
		return this.setPaused(caller, true);
	}

	unpauseDeposits(caller: Caller): Result<void, ProtocolError> {
		return this.setPaused(caller, false);
	}

	/** Send tokens that are neither staked principal nor rewards to the admin. */
	recoverERC20(caller: Caller, token: Address, amount: bigint): Result<void, ProtocolError> {
		return this.ctx.uow.run("rewards.recover", (): Result<void, ProtocolError> => {
			const allowed = requireRole(caller, Role.Admin, "recoverERC20");
			if (!allowed.ok) return allowed;
			if (token === this.stakingToken) {
				return err(new InvalidInputError("Cannot recover the staking token", { token }));
			}
			if (this.registry.has(token)) {
				return err(new InvalidInputError("Cannot recover a registered reward token", { token }));
			}
			const sent = this.ctx.ledger.transfer(token, this.pool, caller.address, amount);
			if (!sent.ok) return sent;
			this.ctx.events.record({ type: "recovered", token, amount, to: caller.address });
			this.logger.info({ token, amount }, "recovered tokens");
			return done();
		});
	}

	// ── Settlement ─────────────────────────────────────────────────

	/**
	 * Bring every accumulator up to now and, given an account, move its
	 * pending share into `accrued`. Callers must be inside a unit of work.
	 */
	settle(account?: Address): void {
		const now = this.ctx.clock.now();
		for (const entry of this.registry.list()) {
			entry.rewardPerTokenStored = this.currentRewardPerToken(entry);
			entry.lastUpdateTime = lastTimeApplicable(now, entry.periodFinish);
			if (account !== undefined) {
				entry.accrued.set(account, this.earnedOn(entry, account));
				entry.paid.set(account, entry.rewardPerTokenStored);
			}
		}
	}

	// ── Unit-of-work participation ─────────────────────────────────

	snapshot(): StakeState {
		return { totalSupply: this.supply, paused: this.depositsPaused };
	}

	restore(state: StakeState): void {
		this.supply = state.totalSupply;
		this.depositsPaused = state.paused;
	}

	// ── Internal ──────────────────────────────────────────────────

	private currentRewardPerToken(entry: RewardEntry): bigint {
		return rewardPerToken(
			entry.rewardPerTokenStored,
			entry.rewardRate,
			entry.lastUpdateTime,
			lastTimeApplicable(this.ctx.clock.now(), entry.periodFinish),
			this.supply,
		);
	}

	private earnedOn(entry: RewardEntry, account: Address): bigint {
		return earned(
			this.balanceOf(account),
			this.currentRewardPerToken(entry),
			entry.paid.get(account) ?? 0n,
			entry.accrued.get(account) ?? 0n,
			entry.decimals,
		);
	}

	private view<T>(token: Address, read: (entry: RewardEntry) => T): Result<T, NotFoundError> {
		const entry = this.registry.require(token);
		return entry.ok ? ok(read(entry.value)) : entry;
	}

	private setPaused(caller: Caller, paused: boolean): Result<void, ProtocolError> {
		const action = paused ? "pauseDeposits" : "unpauseDeposits";
		const allowed = requireRole(caller, Role.Guardian, action);
		if (!allowed.ok) return allowed;
		if (this.depositsPaused === paused) return done();
		return this.ctx.uow.run("rewards.pause", () => {
			this.depositsPaused = paused;
			this.ctx.events.record(
				paused
					? { type: "deposits_paused", by: caller.address }
					: { type: "deposits_unpaused", by: caller.address },
			);
			this.logger.info({ by: caller.address }, paused ? "deposits paused" : "deposits unpaused");
			return done();
		});
	}
}
