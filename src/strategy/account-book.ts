/**
 * AccountBook — per-user staking accounts.
 *
 * An account stakes in the pool on behalf of its owner. The owner moves
 * principal in and out and chooses what happens to rewards; only the
 * backend harvests them (see StrategyRewardProcessor).
 */

import { type Caller, caller as asCaller, requireAddress } from "../access/caller.js";
import type { ProtocolContext } from "../context/protocol-context.js";
import type { Logger } from "../lib/logger/index.js";
import type { RewardAccounting } from "../rewards/reward-accounting.js";
import type { ExitResult } from "../rewards/types.js";
import { requirePositive } from "../shared/amounts.js";
import {
	InvalidInputError,
	LifecycleError,
	NotFoundError,
	type ProtocolError,
} from "../shared/errors.js";
import { type Address, type PoolId, isZeroAddress } from "../shared/identifiers.js";
import { type Result, done, err, ok } from "../shared/result.js";
import { SlippageGuard, type SlippageLimits } from "../slippage/slippage-guard.js";
import { JournaledMap } from "../transaction/journaled-map.js";
import {
	type AccountDirectory,
	type AccountPosition,
	CompoundMode,
	type SatelliteRoute,
} from "./types.js";

export interface AccountRecord {
	readonly owner: Address;
	readonly mode: CompoundMode;
	readonly routes: ReadonlyMap<Address, SatelliteRoute>;
}

export class AccountBook implements AccountDirectory {
	readonly slippage: SlippageGuard;
	private readonly accounts: JournaledMap<Address, AccountRecord>;
	private readonly logger: Logger;

	constructor(
		private readonly ctx: ProtocolContext,
		private readonly accounting: RewardAccounting,
		limits: SlippageLimits,
	) {
		this.logger = ctx.logger.child({ component: "accounts" });
		this.accounts = new JournaledMap(ctx.uow);
		this.slippage = new SlippageGuard(ctx, this, limits);
	}

	// ── Views ──────────────────────────────────────────────────────

	ownerOf(account: Address): Address | undefined {
		return this.accounts.get(account)?.owner;
	}

	record(account: Address): Result<AccountRecord, NotFoundError> {
		const found = this.accounts.get(account);
		if (found) return ok(found);
		return err(new NotFoundError(`Unknown staking account ${account}`, { account }));
	}

	accountsOf(owner: Address): Address[] {
		return [...this.accounts].filter(([, r]) => r.owner === owner).map(([account]) => account);
	}

	position(account: Address): Result<AccountPosition, NotFoundError> {
		const found = this.record(account);
		if (!found.ok) return found;
		const pending = new Map<Address, bigint>();
		for (const token of this.accounting.rewardTokens()) {
			const amount = this.accounting.earned(account, token);
			if (amount.ok) pending.set(token, amount.value);
		}
		return ok({
			account,
			owner: found.value.owner,
			mode: found.value.mode,
			staked: this.accounting.balanceOf(account),
			slippageBps: this.slippage.getAccountSlippage(account),
			routes: found.value.routes,
			pending,
		});
	}

	// ── Registration and settings ──────────────────────────────────

	/** Register `account` for the caller. New accounts compound. */
	registerAccount(caller: Caller, account: Address): Result<void, ProtocolError> {
		return this.ctx.uow.run("accounts.register", (): Result<void, ProtocolError> => {
			if (isZeroAddress(account)) {
				return err(new InvalidInputError("Account cannot be the zero address"));
			}
			if (this.accounts.has(account)) {
				return err(new LifecycleError("Account already registered", { account }));
			}
			const owner = caller.address;
			this.accounts.set(account, { owner, mode: CompoundMode.Compound, routes: new Map() });
			this.ctx.events.record({ type: "account_registered", account, owner });
			this.logger.info({ account, owner }, "account registered");
			return done();
		});
	}

	setCompoundMode(caller: Caller, account: Address, mode: CompoundMode): Result<void, ProtocolError> {
		return this.ctx.uow.run("accounts.setCompoundMode", (): Result<void, ProtocolError> => {
			const owned = this.requireOwner(caller, account, "setCompoundMode");
			if (!owned.ok) return owned;
			this.accounts.set(account, { ...owned.value, mode });
			this.ctx.events.record({ type: "compound_mode_updated", account, mode });
			this.logger.info({ account, mode }, "compound mode updated");
			return done();
		});
	}

	/** Route a reward token to a satellite strategy for Reinvest mode. */
	setSatelliteRoute(
		caller: Caller,
		account: Address,
		token: Address,
		satellite: Address,
		swapPool: PoolId,
	): Result<void, ProtocolError> {
		return this.ctx.uow.run("accounts.setSatelliteRoute", (): Result<void, ProtocolError> => {
			const owned = this.requireOwner(caller, account, "setSatelliteRoute");
			if (!owned.ok) return owned;
			if (!this.accounting.registry.has(token)) {
				return err(new NotFoundError(`Unknown reward token ${token}`, { token }));
			}
			if (token === this.accounting.stakingToken) {
				return err(new InvalidInputError("The staking token is always restaked", { token }));
			}
			if (isZeroAddress(satellite)) {
				return err(new InvalidInputError("Satellite cannot be the zero address"));
			}
			const routes = new Map(owned.value.routes);
			routes.set(token, { satellite, swapPool });
			this.accounts.set(account, { ...owned.value, routes });
			this.ctx.events.record({
				type: "satellite_route_updated",
				account,
				token,
				satellite,
				swapPool,
			});
			return done();
		});
	}

	// ── Principal ──────────────────────────────────────────────────

	/** Pull `amount` of the staking token from the owner and stake it as the account. */
	deposit(caller: Caller, account: Address, amount: bigint): Result<void, ProtocolError> {
		return this.ctx.uow.run("accounts.deposit", (): Result<void, ProtocolError> => {
			const owned = this.requireOwner(caller, account, "deposit");
			if (!owned.ok) return owned;
			const positive = requirePositive(amount, "Deposit amount");
			if (!positive.ok) return positive;

			const { ledger } = this.ctx;
			const token = this.accounting.stakingToken;
			const pulled = ledger.transferFrom(token, account, owned.value.owner, account, amount);
			if (!pulled.ok) return pulled;
			const approved = ledger.approve(token, account, this.accounting.pool, amount);
			if (!approved.ok) return approved;
			return this.accounting.stake(asCaller(account), amount);
		});
	}

	/** Unstake `amount` and return it to the owner. */
	withdraw(caller: Caller, account: Address, amount: bigint): Result<void, ProtocolError> {
		return this.ctx.uow.run("accounts.withdraw", (): Result<void, ProtocolError> => {
			const owned = this.requireOwner(caller, account, "withdraw");
			if (!owned.ok) return owned;
			const withdrawn = this.accounting.withdraw(asCaller(account), amount);
			if (!withdrawn.ok) return withdrawn;
			return this.ctx.ledger.transfer(
				this.accounting.stakingToken,
				account,
				owned.value.owner,
				amount,
			);
		});
	}

	/** Exit the pool and hand principal and every reward to the owner. */
	withdrawAll(caller: Caller, account: Address): Result<ExitResult, ProtocolError> {
		return this.ctx.uow.run("accounts.withdrawAll", (): Result<ExitResult, ProtocolError> => {
			const owned = this.requireOwner(caller, account, "withdrawAll");
			if (!owned.ok) return owned;
			const exited = this.accounting.exit(asCaller(account));
			if (!exited.ok) return exited;

			const { owner } = owned.value;
			const { ledger } = this.ctx;
			const principal = ledger.transfer(
				this.accounting.stakingToken,
				account,
				owner,
				exited.value.withdrawn,
			);
			if (!principal.ok) return principal;
			for (const [token, amount] of exited.value.rewards) {
				const sent = ledger.transfer(token, account, owner, amount);
				if (!sent.ok) return sent;
			}
			this.logger.info({ account, withdrawn: exited.value.withdrawn }, "account exited");
			return ok(exited.value);
		});
	}

	private requireOwner(
		caller: Caller,
		account: Address,
		action: string,
	): Result<AccountRecord, ProtocolError> {
		const found = this.record(account);
		if (!found.ok) return found;
		const allowed = requireAddress(caller, found.value.owner, action);
		return allowed.ok ? found : allowed;
	}
}
