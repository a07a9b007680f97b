/**
 * SwapGateway — price-checked token conversion through an external venue.
 *
 * A swap runs as one unit of work: the compound fee pre-hook, the venue
 * allowance, settlement and the output check either all happen or none
 * does. The venue's own quote is never trusted beyond the oracle bound.
 */

import { type Caller, Role, requireRole } from "../access/caller.js";
import type { ProtocolContext } from "../context/protocol-context.js";
import type { Logger } from "../lib/logger/index.js";
import type { PriceChecker } from "../pricing/types.js";
import { applyBps, requirePositive } from "../shared/amounts.js";
import {
	ConfigError,
	ExternalCallError,
	InvalidInputError,
	NotFoundError,
	type ProtocolError,
} from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { type Result, done, err, ok } from "../shared/result.js";
import type { Snapshottable } from "../transaction/types.js";
import { type OrderHook, buildAppData, feeHook } from "./app-data.js";
import type {
	SellOrder,
	SwapGatewayOptions,
	SwapReceipt,
	SwapRequest,
	SwapVenue,
} from "./types.js";

export class SwapGateway implements Snapshottable<ReadonlySet<Address>> {
	private approved = new Set<Address>();
	private readonly logger: Logger;

	constructor(
		private readonly ctx: ProtocolContext,
		private readonly checker: PriceChecker,
		private readonly venue: SwapVenue,
		private readonly options: SwapGatewayOptions,
	) {
		if (options.compoundFeeBps > 0 && options.feeRecipient === undefined) {
			throw new ConfigError("feeRecipient is required when compoundFeeBps is nonzero");
		}
		this.logger = ctx.logger.child({ component: "swap" });
		ctx.uow.register("swap.approved", this);
	}

	// ── Allow-list ─────────────────────────────────────────────────

	/** Allow `token` to be sold. It must already have a price feed. */
	approveToken(caller: Caller, token: Address): Result<void, ProtocolError> {
		return this.ctx.uow.run("swap.approveToken", (): Result<void, ProtocolError> => {
			const allowed = requireRole(caller, Role.Admin, "approveToken");
			if (!allowed.ok) return allowed;
			if (!this.checker.isTokenConfigured(token)) {
				return err(
					new NotFoundError(`No price feed configured for ${token}`, { token }),
				);
			}
			if (this.approved.has(token)) return done();
			this.approved.add(token);
			this.ctx.events.record({ type: "token_swap_approved", token });
			this.logger.info({ token }, "token approved for swaps");
			return done();
		});
	}

	isApproved(token: Address): boolean {
		return this.approved.has(token);
	}

	// ── Quotes ─────────────────────────────────────────────────────

	/** Fails when `amountOutProposed` is below the oracle-implied minimum at `slippageBps`. */
	quoteAndCheck(
		amountIn: bigint,
		tokenIn: Address,
		tokenOut: Address,
		amountOutProposed: bigint,
		slippageBps: number,
	): Result<void, ProtocolError> {
		return this.checker.checkPrice(amountIn, tokenIn, tokenOut, amountOutProposed, slippageBps);
	}

	/** Fee the gateway would take from `amountIn`. */
	feeFor(amountIn: bigint): bigint {
		return applyBps(amountIn, this.options.compoundFeeBps);
	}

	// ── Execution ──────────────────────────────────────────────────

	/**
	 * Sell `amountIn` of `tokenIn` held by `account` for `tokenOut`.
	 * The output lands in `account`.
	 */
	swap(request: SwapRequest): Result<SwapReceipt, ProtocolError> {
		const { account, tokenIn, tokenOut, amountIn, slippageBps, pool } = request;
		return this.ctx.uow.run("swap.execute", (): Result<SwapReceipt, ProtocolError> => {
			const positive = requirePositive(amountIn, "Swap amount");
			if (!positive.ok) return positive;
			if (tokenIn === tokenOut) {
				return err(new InvalidInputError("Cannot swap a token for itself", { token: tokenIn }));
			}
			if (!this.approved.has(tokenIn)) {
				return err(
					new InvalidInputError(`Token ${tokenIn} is not approved for swaps`, { token: tokenIn }),
				);
			}
			const validFor = this.checker.maxTimePriceValid(tokenIn);
			if (!validFor.ok) return validFor;

			const fee = this.feeFor(amountIn);
			const sellAmount = amountIn - fee;
			const proposed = this.venue.quote(tokenIn, tokenOut, sellAmount, pool);
			const checked = this.quoteAndCheck(sellAmount, tokenIn, tokenOut, proposed, slippageBps);
			if (!checked.ok) return checked;

			const hooks: OrderHook[] = [];
			const { ledger } = this.ctx;
			const approvedVenue = ledger.approve(tokenIn, account, this.venue.address, amountIn);
			if (!approvedVenue.ok) return approvedVenue;

			if (fee > 0n) {
				const recipient = this.options.feeRecipient;
				if (recipient === undefined) {
					return err(new ConfigError("feeRecipient is required when compoundFeeBps is nonzero"));
				}
				hooks.push(
					feeHook({
						token: tokenIn,
						from: account,
						recipient,
						amount: fee,
						gasLimit: this.options.hookGasLimit,
					}),
				);
				const paid = ledger.transferFrom(tokenIn, this.venue.address, account, recipient, fee);
				if (!paid.ok) return paid;
			}

			const order: SellOrder = {
				owner: account,
				sellToken: tokenIn,
				buyToken: tokenOut,
				sellAmount,
				buyAmount: proposed,
				receiver: account,
				validTo: this.ctx.clock.now() + validFor.value,
				appData: buildAppData(this.options.appCode, hooks).hash,
				pool,
			};

			const before = ledger.balanceOf(tokenOut, account);
			this.venue.settle(order);
			const amountOut = ledger.balanceOf(tokenOut, account) - before;
			if (amountOut < order.buyAmount) {
				return err(
					new ExternalCallError("Swap venue delivered less than the order minimum", {
						tokenIn,
						tokenOut,
						buyAmount: order.buyAmount,
						amountOut,
					}),
				);
			}

			this.ctx.events.record({
				type: "swap_executed",
				account,
				tokenIn,
				tokenOut,
				amountIn,
				amountOut,
				fee,
			});
			this.logger.debug({ account, tokenIn, tokenOut, amountIn, amountOut, fee }, "swap executed");
			return ok({ order, fee, amountOut });
		});
	}

	// ── Unit-of-work participation ─────────────────────────────────

	snapshot(): ReadonlySet<Address> {
		return new Set(this.approved);
	}

	restore(state: ReadonlySet<Address>): void {
		this.approved = new Set(state);
	}
}
