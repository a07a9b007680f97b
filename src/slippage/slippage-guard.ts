/**
 * SlippageGuard — per-account swap tolerance with a registry-wide default.
 *
 * An account value of 0 defers to the default. Both are capped by the
 * configured maximum.
 */

import { type Caller, Role, requireAddress, requireRole } from "../access/caller.js";
import type { ProtocolContext } from "../context/protocol-context.js";
import type { Logger } from "../lib/logger/index.js";
import { InvalidInputError, NotFoundError, type ProtocolError } from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { type Result, done, err } from "../shared/result.js";
import type { AccountDirectory } from "../strategy/types.js";
import { JournaledMap } from "../transaction/journaled-map.js";
import type { Snapshottable } from "../transaction/types.js";

export interface SlippageLimits {
	readonly defaultSlippageBps: number;
	readonly maxSlippageBps: number;
}

export class SlippageGuard implements Snapshottable<number> {
	readonly maxSlippageBps: number;
	private defaultBps: number;
	private readonly accounts: JournaledMap<Address, number>;
	private readonly logger: Logger;

	constructor(
		private readonly ctx: ProtocolContext,
		private readonly directory: AccountDirectory,
		limits: SlippageLimits,
	) {
		if (limits.defaultSlippageBps <= 0 || limits.defaultSlippageBps > limits.maxSlippageBps) {
			throw new InvalidInputError("Default slippage must be within 1..maxSlippageBps", {
				...limits,
			});
		}
		this.maxSlippageBps = limits.maxSlippageBps;
		this.defaultBps = limits.defaultSlippageBps;
		this.accounts = new JournaledMap(ctx.uow);
		this.logger = ctx.logger.child({ component: "slippage" });
		ctx.uow.register("slippage", this);
	}

	/** Owner-only; 0 resets the account to the default. */
	setAccountSlippage(caller: Caller, account: Address, bps: number): Result<void, ProtocolError> {
		return this.ctx.uow.run("slippage.setAccount", (): Result<void, ProtocolError> => {
			const owner = this.directory.ownerOf(account);
			if (owner === undefined) {
				return err(new NotFoundError(`Unknown staking account ${account}`, { account }));
			}
			const allowed = requireAddress(caller, owner, "setAccountSlippage");
			if (!allowed.ok) return allowed;
			if (!Number.isInteger(bps) || bps < 0 || bps > this.maxSlippageBps) {
				return err(this.outOfRange(bps, 0));
			}
			if (bps === 0) {
				this.accounts.delete(account);
			} else {
				this.accounts.set(account, bps);
			}
			this.ctx.events.record({ type: "account_slippage_updated", account, slippageBps: bps });
			this.logger.info({ account, slippageBps: bps }, "account slippage updated");
			return done();
		});
	}

	/** Admin-only; must be nonzero. */
	setDefaultSlippage(caller: Caller, bps: number): Result<void, ProtocolError> {
		return this.ctx.uow.run("slippage.setDefault", (): Result<void, ProtocolError> => {
			const allowed = requireRole(caller, Role.Admin, "setDefaultSlippage");
			if (!allowed.ok) return allowed;
			if (!Number.isInteger(bps) || bps <= 0 || bps > this.maxSlippageBps) {
				return err(this.outOfRange(bps, 1));
			}
			this.defaultBps = bps;
			this.ctx.events.record({ type: "default_slippage_updated", slippageBps: bps });
			this.logger.info({ slippageBps: bps }, "default slippage updated");
			return done();
		});
	}

	/** Effective tolerance: the account's own value, else the default. */
	getAccountSlippage(account: Address): number {
		return this.accounts.get(account) ?? this.defaultBps;
	}

	defaultSlippage(): number {
		return this.defaultBps;
	}

	// ── Unit-of-work participation ─────────────────────────────────

	/** Default only; account overrides are journaled. */
	snapshot(): number {
		return this.defaultBps;
	}

	restore(defaultBps: number): void {
		this.defaultBps = defaultBps;
	}

	private outOfRange(bps: number, min: number): InvalidInputError {
		return new InvalidInputError(`Slippage must be within ${min}..${this.maxSlippageBps} bps`, {
			slippageBps: bps,
		});
	}
}
