/**
 * StrategyRewardProcessor — harvests an account and applies its mode.
 *
 * Compound swaps every non-staking reward into the staking token and
 * restakes the total. Reinvest restakes the staking-token reward and
 * deposits each other reward into the owner's satellite strategy. The
 * whole call is one unit of work; Reinvest validates every satellite
 * before the harvest runs.
 */

import { type Caller, Role, caller as asCaller, requireRole } from "../access/caller.js";
import type { ProtocolContext } from "../context/protocol-context.js";
import type { Logger } from "../lib/logger/index.js";
import type { RewardAccounting } from "../rewards/reward-accounting.js";
import type { RewardPayout } from "../rewards/types.js";
import {
	InvalidInputError,
	LengthMismatchError,
	OwnershipMismatchError,
	type ProtocolError,
} from "../shared/errors.js";
import type { Address, PoolId } from "../shared/identifiers.js";
import { type Result, done, err, ok } from "../shared/result.js";
import type { SwapGateway } from "../swap/swap-gateway.js";
import type { AccountBook, AccountRecord } from "./account-book.js";
import {
	CompoundMode,
	type ProcessingOutcome,
	type ReinvestReceipt,
	type SatelliteRoute,
	type SatelliteStrategy,
	type StrategyRegistry,
} from "./types.js";

export interface RewardProcessorOptions {
	/** Pool used for Compound swaps of tokens the account has no route for */
	readonly compoundPool: PoolId;
}

interface ReinvestStep {
	readonly token: Address;
	readonly satellite: SatelliteStrategy;
	readonly route: SatelliteRoute;
}

export class StrategyRewardProcessor {
	private readonly logger: Logger;

	constructor(
		private readonly ctx: ProtocolContext,
		private readonly accounting: RewardAccounting,
		private readonly book: AccountBook,
		private readonly gateway: SwapGateway,
		private readonly strategies: StrategyRegistry,
		private readonly options: RewardProcessorOptions,
	) {
		this.logger = ctx.logger.child({ component: "processor" });
	}

	/**
	 * Harvest `account` and compound or reinvest the rewards.
	 * @param satellites one per non-staking reward token, in registry order; ignored when compounding
	 */
	processRewards(
		caller: Caller,
		account: Address,
		satellites: readonly SatelliteStrategy[] = [],
	): Result<ProcessingOutcome, ProtocolError> {
		return this.ctx.uow.run("processor.processRewards", (): Result<ProcessingOutcome, ProtocolError> => {
			const allowed = requireRole(caller, Role.Backend, "processRewards");
			if (!allowed.ok) return allowed;
			const found = this.book.record(account);
			if (!found.ok) return found;
			const record = found.value;

			let plan: ReinvestStep[] = [];
			if (record.mode === CompoundMode.Reinvest) {
				const planned = this.planReinvest(account, record, satellites);
				if (!planned.ok) return planned;
				plan = planned.value;
			}

			const harvest = this.accounting.getReward(asCaller(account));
			if (!harvest.ok) return harvest;
			const harvested = harvest.value;
			if (harvested.size === 0) {
				return ok({ account, mode: record.mode, harvested, restaked: 0n, reinvested: [] });
			}

			const applied =
				record.mode === CompoundMode.Compound
					? this.compound(account, record, harvested)
					: this.reinvest(account, plan, harvested);
			if (!applied.ok) return applied;

			const { restaked, reinvested } = applied.value;
			if (restaked > 0n) {
				const staked = this.restake(account, restaked);
				if (!staked.ok) return staked;
			}

			this.ctx.events.record({ type: "rewards_processed", account, mode: record.mode, restaked });
			this.logger.info(
				{ account, mode: record.mode, restaked, reinvested: reinvested.length },
				"rewards processed",
			);
			return ok({ account, mode: record.mode, harvested, restaked, reinvested });
		});
	}

	// ── Modes ──────────────────────────────────────────────────────

	private compound(
		account: Address,
		record: AccountRecord,
		harvested: RewardPayout,
	): Result<{ restaked: bigint; reinvested: ReinvestReceipt[] }, ProtocolError> {
		const stakingToken = this.accounting.stakingToken;
		let restaked = harvested.get(stakingToken) ?? 0n;
		for (const [token, amount] of harvested) {
			if (token === stakingToken || amount === 0n) continue;
			const swapped = this.gateway.swap({
				account,
				tokenIn: token,
				tokenOut: stakingToken,
				amountIn: amount,
				slippageBps: this.book.slippage.getAccountSlippage(account),
				pool: record.routes.get(token)?.swapPool ?? this.options.compoundPool,
			});
			if (!swapped.ok) return swapped;
			restaked += swapped.value.amountOut;
		}
		return ok({ restaked, reinvested: [] });
	}

	private reinvest(
		account: Address,
		plan: readonly ReinvestStep[],
		harvested: RewardPayout,
	): Result<{ restaked: bigint; reinvested: ReinvestReceipt[] }, ProtocolError> {
		const reinvested: ReinvestReceipt[] = [];
		for (const step of plan) {
			const amountIn = harvested.get(step.token) ?? 0n;
			if (amountIn === 0n) continue;
			const { satellite } = step;

			const asset = satellite.asset();
			let deposited = amountIn;
			if (asset !== step.token) {
				const swapped = this.gateway.swap({
					account,
					tokenIn: step.token,
					tokenOut: asset,
					amountIn,
					slippageBps: this.book.slippage.getAccountSlippage(account),
					pool: step.route.swapPool,
				});
				if (!swapped.ok) return swapped;
				deposited = swapped.value.amountOut;
			}

			const approved = this.ctx.ledger.approve(asset, account, satellite.address, deposited);
			if (!approved.ok) return approved;
			satellite.deposit(account, deposited);
			this.ctx.events.record({
				type: "reinvested",
				account,
				token: step.token,
				satellite: satellite.address,
				amount: deposited,
			});
			reinvested.push({ token: step.token, satellite: satellite.address, amountIn, deposited });
		}
		return ok({ restaked: harvested.get(this.accounting.stakingToken) ?? 0n, reinvested });
	}

	// ── Helpers ────────────────────────────────────────────────────

	/** Match every supplied satellite against the account's routes and owner. */
	private planReinvest(
		account: Address,
		record: AccountRecord,
		satellites: readonly SatelliteStrategy[],
	): Result<ReinvestStep[], ProtocolError> {
		const tokens = this.accounting
			.rewardTokens()
			.filter((token) => token !== this.accounting.stakingToken);
		if (satellites.length !== tokens.length) {
			return err(
				new LengthMismatchError(
					"Satellite count does not match the non-staking reward tokens",
					tokens.length,
					satellites.length,
					{ account },
				),
			);
		}

		const plan: ReinvestStep[] = [];
		for (const [i, token] of tokens.entries()) {
			const satellite = satellites[i];
			if (satellite === undefined) continue;
			const route = record.routes.get(token);
			if (route === undefined || route.satellite !== satellite.address) {
				return err(
					new InvalidInputError("Satellite does not match the configured route", {
						account,
						token,
						satellite: satellite.address,
					}),
				);
			}
			const owned = this.checkOwnership(record.owner, satellite);
			if (!owned.ok) return owned;
			plan.push({ token, satellite, route });
		}
		return ok(plan);
	}

	private checkOwnership(
		owner: Address,
		satellite: SatelliteStrategy,
	): Result<void, OwnershipMismatchError> {
		if (!this.strategies.isUserStrategy(owner, satellite.address)) {
			return err(
				new OwnershipMismatchError("Satellite is not a strategy of the account owner", {
					owner,
					satellite: satellite.address,
				}),
			);
		}
		const reported = satellite.owner();
		if (reported !== owner) {
			return err(
				new OwnershipMismatchError("Satellite owner does not match the account owner", {
					owner,
					satellite: satellite.address,
					reported,
				}),
			);
		}
		return done();
	}

	private restake(account: Address, amount: bigint): Result<void, ProtocolError> {
		const approved = this.ctx.ledger.approve(
			this.accounting.stakingToken,
			account,
			this.accounting.pool,
			amount,
		);
		if (!approved.ok) return approved;
		return this.accounting.stake(asCaller(account), amount);
	}
}
