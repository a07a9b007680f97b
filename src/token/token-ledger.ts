/**
 * TokenLedger — in-memory ERC-20 balances and allowances.
 *
 * Every token movement in the protocol goes through the ledger, so a unit
 * of work can undo transfers made by any component. Balances and
 * allowances are journaled per key; the token list and supplies are
 * snapshotted.
 */

import type { EventLog } from "../events/event-log.js";
import {
	InsufficientAllowanceError,
	InsufficientBalanceError,
	InvalidInputError,
	LifecycleError,
	NotFoundError,
	type ProtocolError,
} from "../shared/errors.js";
import { type Address, ZERO_ADDRESS, isZeroAddress } from "../shared/identifiers.js";
import { type Result, done, err, ok } from "../shared/result.js";
import { JournaledMap } from "../transaction/journaled-map.js";
import type { Snapshottable } from "../transaction/types.js";
import type { UnitOfWork } from "../transaction/unit-of-work.js";
import type { TokenMetadata } from "./types.js";

export interface LedgerState {
	readonly tokens: ReadonlyMap<Address, TokenMetadata>;
	readonly supply: ReadonlyMap<Address, bigint>;
}

const balanceKey = (token: Address, holder: Address): string => `${token}/${holder}`;
const allowanceKey = (token: Address, owner: Address, spender: Address): string =>
	`${token}/${owner}/${spender}`;

export class TokenLedger implements Snapshottable<LedgerState> {
	private tokens = new Map<Address, TokenMetadata>();
	private supply = new Map<Address, bigint>();
	private readonly balances: JournaledMap<string, bigint>;
	private readonly allowances: JournaledMap<string, bigint>;

	constructor(
		private readonly uow: UnitOfWork,
		private readonly events: EventLog,
	) {
		this.balances = new JournaledMap(uow);
		this.allowances = new JournaledMap(uow);
	}

	// ── Registry ───────────────────────────────────────────────────

	registerToken(meta: TokenMetadata): Result<void, ProtocolError> {
		if (this.tokens.has(meta.address)) {
			return err(
				new LifecycleError(`Token ${meta.symbol} is already registered`, { token: meta.address }),
			);
		}
		if (!Number.isInteger(meta.decimals) || meta.decimals < 0 || meta.decimals > 36) {
			return err(
				new InvalidInputError("Token decimals must be an integer within 0..36", {
					decimals: meta.decimals,
				}),
			);
		}
		this.tokens.set(meta.address, { ...meta });
		return done();
	}

	isRegistered(token: Address): boolean {
		return this.tokens.has(token);
	}

	metadata(token: Address): Result<TokenMetadata, NotFoundError> {
		const meta = this.tokens.get(token);
		return meta ? ok(meta) : err(new NotFoundError(`Unknown token ${token}`, { token }));
	}

	decimals(token: Address): Result<number, NotFoundError> {
		const meta = this.metadata(token);
		return meta.ok ? ok(meta.value.decimals) : meta;
	}

	// ── Views ──────────────────────────────────────────────────────

	balanceOf(token: Address, holder: Address): bigint {
		return this.balances.get(balanceKey(token, holder)) ?? 0n;
	}

	allowance(token: Address, owner: Address, spender: Address): bigint {
		return this.allowances.get(allowanceKey(token, owner, spender)) ?? 0n;
	}

	totalSupply(token: Address): bigint {
		return this.supply.get(token) ?? 0n;
	}

	// ── Mutations ──────────────────────────────────────────────────

	mint(token: Address, to: Address, amount: bigint): Result<void, ProtocolError> {
		return this.uow.run("token.mint", () => {
			const checked = this.checkMovement(token, to, amount);
			if (!checked.ok) return checked;
			this.credit(token, to, amount);
			this.supply.set(token, this.totalSupply(token) + amount);
			this.events.record({ type: "transfer", token, from: ZERO_ADDRESS, to, amount });
			return done();
		});
	}

	transfer(
		token: Address,
		from: Address,
		to: Address,
		amount: bigint,
	): Result<void, ProtocolError> {
		return this.uow.run("token.transfer", () => this.move(token, from, to, amount));
	}

	approve(
		token: Address,
		owner: Address,
		spender: Address,
		amount: bigint,
	): Result<void, ProtocolError> {
		return this.uow.run("token.approve", () => {
			if (!this.tokens.has(token)) {
				return err(new NotFoundError(`Unknown token ${token}`, { token }));
			}
			if (isZeroAddress(spender)) {
				return err(new InvalidInputError("Cannot approve the zero address"));
			}
			if (amount < 0n) {
				return err(new InvalidInputError("Allowance must not be negative", { amount }));
			}
			this.allowances.set(allowanceKey(token, owner, spender), amount);
			this.events.record({ type: "approval", token, owner, spender, amount });
			return done();
		});
	}

	/** Move `amount` from `from` to `to` on behalf of `spender`, consuming its allowance. */
	transferFrom(
		token: Address,
		spender: Address,
		from: Address,
		to: Address,
		amount: bigint,
	): Result<void, ProtocolError> {
		return this.uow.run("token.transferFrom", () => {
			const allowed = this.allowance(token, from, spender);
			if (allowed < amount) {
				return err(
					new InsufficientAllowanceError("Transfer amount exceeds allowance", {
						token,
						owner: from,
						spender,
						allowance: allowed,
						amount,
					}),
				);
			}
			this.allowances.set(allowanceKey(token, from, spender), allowed - amount);
			return this.move(token, from, to, amount);
		});
	}

	// ── Unit-of-work participation ─────────────────────────────────

	snapshot(): LedgerState {
		return { tokens: new Map(this.tokens), supply: new Map(this.supply) };
	}

	restore(state: LedgerState): void {
		this.tokens = new Map(state.tokens);
		this.supply = new Map(state.supply);
	}

	// ── Internal ──────────────────────────────────────────────────

	private move(
		token: Address,
		from: Address,
		to: Address,
		amount: bigint,
	): Result<void, ProtocolError> {
		const checked = this.checkMovement(token, to, amount);
		if (!checked.ok) return checked;
		const balance = this.balanceOf(token, from);
		if (balance < amount) {
			return err(
				new InsufficientBalanceError("Transfer amount exceeds balance", {
					token,
					holder: from,
					balance,
					amount,
				}),
			);
		}
		this.balances.set(balanceKey(token, from), balance - amount);
		this.credit(token, to, amount);
		this.events.record({ type: "transfer", token, from, to, amount });
		return done();
	}

	private checkMovement(token: Address, to: Address, amount: bigint): Result<void, ProtocolError> {
		if (!this.tokens.has(token)) {
			return err(new NotFoundError(`Unknown token ${token}`, { token }));
		}
		if (isZeroAddress(to)) {
			return err(new InvalidInputError("Cannot transfer to the zero address", { token }));
		}
		if (amount < 0n) {
			return err(new InvalidInputError("Transfer amount must not be negative", { amount }));
		}
		return done();
	}

	private credit(token: Address, to: Address, amount: bigint): void {
		this.balances.set(balanceKey(token, to), this.balanceOf(token, to) + amount);
	}
}
