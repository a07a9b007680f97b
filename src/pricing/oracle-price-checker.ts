/**
 * OraclePriceChecker — bounds swap outputs by chained oracle prices.
 *
 * Each token is priced in a common quote currency by walking its feed
 * hops. An answer older than the hop's heartbeat, or not positive, makes
 * the whole price unusable; the checker never falls back to a stale value.
 */

import { type Caller, Role, requireRole } from "../access/caller.js";
import type { ProtocolContext } from "../context/protocol-context.js";
import type { Logger } from "../lib/logger/index.js";
import { WAD, isValidBps, minimumOutput, pow10 } from "../shared/amounts.js";
import {
	InvalidInputError,
	NotFoundError,
	PriceCheckError,
	type ProtocolError,
} from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { type Result, done, err, ok } from "../shared/result.js";
import type { Snapshottable } from "../transaction/types.js";
import type { FeedHop, PriceChecker, TokenPriceConfig } from "./types.js";

export class OraclePriceChecker
	implements PriceChecker, Snapshottable<ReadonlyMap<Address, TokenPriceConfig>>
{
	private configs = new Map<Address, TokenPriceConfig>();
	private readonly logger: Logger;

	constructor(private readonly ctx: ProtocolContext) {
		this.logger = ctx.logger.child({ component: "pricing" });
		ctx.uow.register("pricing.configs", this);
	}

	/** Set the feed path for `token`, replacing any previous one. */
	configureToken(
		caller: Caller,
		token: Address,
		config: TokenPriceConfig,
	): Result<void, ProtocolError> {
		return this.ctx.uow.run("pricing.configureToken", (): Result<void, ProtocolError> => {
			const allowed = requireRole(caller, Role.Admin, "configureToken");
			if (!allowed.ok) return allowed;
			if (config.hops.length === 0) {
				return err(new InvalidInputError("A price feed path needs at least one hop", { token }));
			}
			if (config.hops.some((h) => !Number.isInteger(h.heartbeat) || h.heartbeat <= 0)) {
				return err(new InvalidInputError("Feed heartbeat must be a positive number of seconds"));
			}
			if (!Number.isInteger(config.maxTimePriceValid) || config.maxTimePriceValid <= 0) {
				return err(
					new InvalidInputError("maxTimePriceValid must be a positive number of seconds", {
						maxTimePriceValid: config.maxTimePriceValid,
					}),
				);
			}
			const known = this.ctx.ledger.decimals(token);
			if (!known.ok) return known;

			this.configs.set(token, {
				hops: [...config.hops],
				maxTimePriceValid: config.maxTimePriceValid,
			});
			this.ctx.events.record({ type: "price_feed_configured", token, hops: config.hops.length });
			this.logger.info(
				{ token, feeds: config.hops.map((h) => h.feed.description) },
				"price feed configured",
			);
			return done();
		});
	}

	isTokenConfigured(token: Address): boolean {
		return this.configs.has(token);
	}

	maxTimePriceValid(token: Address): Result<number, NotFoundError> {
		const config = this.configs.get(token);
		if (config) return ok(config.maxTimePriceValid);
		return err(new NotFoundError(`No price feed configured for ${token}`, { token }));
	}

	/** Price of one whole `token` in the quote currency, scaled by 1e18. */
	priceOf(token: Address): Result<bigint, ProtocolError> {
		const config = this.configs.get(token);
		if (!config) {
			return err(new NotFoundError(`No price feed configured for ${token}`, { token }));
		}
		let price = WAD;
		for (const hop of config.hops) {
			const answer = this.readHop(token, hop);
			if (!answer.ok) return answer;
			price = hop.reverse ? (price * WAD) / answer.value : (price * answer.value) / WAD;
		}
		if (price === 0n) {
			return err(new PriceCheckError(`Price of ${token} rounds to zero`, { token }));
		}
		return ok(price);
	}

	/** Oracle-implied output for selling `amountIn` of `tokenIn` for `tokenOut`. */
	expectedOut(
		amountIn: bigint,
		tokenIn: Address,
		tokenOut: Address,
	): Result<bigint, ProtocolError> {
		const { ledger } = this.ctx;
		const decimalsIn = ledger.decimals(tokenIn);
		if (!decimalsIn.ok) return decimalsIn;
		const decimalsOut = ledger.decimals(tokenOut);
		if (!decimalsOut.ok) return decimalsOut;
		const priceIn = this.priceOf(tokenIn);
		if (!priceIn.ok) return priceIn;
		const priceOut = this.priceOf(tokenOut);
		if (!priceOut.ok) return priceOut;

		return ok(
			(amountIn * priceIn.value * pow10(decimalsOut.value)) /
				(priceOut.value * pow10(decimalsIn.value)),
		);
	}

	/** Fails unless `amountOutProposed` is at least the expected output less `slippageBps`. */
	checkPrice(
		amountIn: bigint,
		tokenIn: Address,
		tokenOut: Address,
		amountOutProposed: bigint,
		slippageBps: number,
	): Result<void, ProtocolError> {
		if (!isValidBps(slippageBps)) {
			return err(new InvalidInputError("Slippage must be within 0..10000 bps", { slippageBps }));
		}
		const expected = this.expectedOut(amountIn, tokenIn, tokenOut);
		if (!expected.ok) return expected;
		const minOut = minimumOutput(expected.value, slippageBps);
		if (amountOutProposed < minOut) {
			return err(
				new PriceCheckError("Proposed output is below the oracle-implied minimum", {
					tokenIn,
					tokenOut,
					amountIn,
					amountOutProposed,
					minOut,
					slippageBps,
				}),
			);
		}
		return done();
	}

	// ── Unit-of-work participation ─────────────────────────────────

	snapshot(): ReadonlyMap<Address, TokenPriceConfig> {
		return new Map(this.configs);
	}

	restore(state: ReadonlyMap<Address, TokenPriceConfig>): void {
		this.configs = new Map(state);
	}

	// ── Internal ──────────────────────────────────────────────────

	/** Answer normalised to 18 decimals. */
	private readHop(token: Address, hop: FeedHop): Result<bigint, PriceCheckError> {
		const { answer, updatedAt } = hop.feed.latestRoundData();
		const feed = hop.feed.description;
		if (answer <= 0n) {
			return err(
				new PriceCheckError(`Feed ${feed} returned a non-positive answer`, { token, answer }),
			);
		}
		const age = this.ctx.clock.now() - updatedAt;
		if (age > hop.heartbeat) {
			return err(
				new PriceCheckError(`Feed ${feed} is stale`, { token, age, heartbeat: hop.heartbeat }),
			);
		}
		const decimals = hop.feed.decimals();
		const normalised = decimals <= 18 ? answer * pow10(18 - decimals) : answer / pow10(decimals - 18);
		if (normalised === 0n) {
			return err(new PriceCheckError(`Feed ${feed} answer rounds to zero`, { token, answer }));
		}
		return ok(normalised);
	}
}
