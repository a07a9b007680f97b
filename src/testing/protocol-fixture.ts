/**
 * Fully wired protocol over in-process fakes.
 *
 * Prices (USD, 8-decimal feeds): STK 2, USDC 1, WBTC 60_000, WETH 3_000.
 * The venue quotes exactly the oracle rate for every pair it knows.
 */

import { type ProtocolContext, createProtocolContext } from "../context/protocol-context.js";
import type { Logger } from "../lib/logger/index.js";
import { type Protocol, createProtocol } from "../protocol/create-protocol.js";
import { type ProtocolConfig, DEFAULT_PROTOCOL_CONFIG } from "../shared/config.js";
import { type Address, type PoolId, address, poolId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { Duration, FakeClock } from "../shared/time.js";
import { CompoundMode } from "../strategy/types.js";
import type { TokenMetadata } from "../token/types.js";
import { FixedRateSwapVenue } from "./fixed-rate-swap-venue.js";
import {
	ALL_TOKENS,
	DISTRIBUTOR,
	POOL,
	STAKE,
	USDC,
	WBTC,
	WETH,
	admin,
	distributor,
	user,
} from "./fixtures.js";
import { InMemorySatelliteStrategy, InMemoryStrategyRegistry } from "./in-memory-strategies.js";
import { StaticPriceFeed } from "./static-price-feed.js";

export const VENUE = address(`0x${"5e".repeat(20)}`);
export const COMPOUND_POOL: PoolId = poolId("stk-default");
export const USDC_WETH_POOL: PoolId = poolId("usdc-weth");

/** Feed heartbeat and order validity used for every token. */
export const HEARTBEAT = Duration.hours(1);
export const MAX_TIME_PRICE_VALID = Duration.minutes(30);

const USD_PRICES: ReadonlyArray<readonly [TokenMetadata, bigint]> = [
	[STAKE, 2n],
	[USDC, 1n],
	[WBTC, 60_000n],
	[WETH, 3_000n],
];

export interface ProtocolFixture {
	readonly clock: FakeClock;
	readonly ctx: ProtocolContext;
	readonly protocol: Protocol;
	readonly venue: FixedRateSwapVenue;
	readonly strategies: InMemoryStrategyRegistry;
	readonly feeds: ReadonlyMap<Address, StaticPriceFeed>;
	/** Register `token` as a reward over `duration` and fund it with `amount` */
	fundReward(token: TokenMetadata, amount: bigint, duration?: number): void;
	/** Register `account` for `owner`, mint `amount` STK to the owner and deposit it */
	openAccount(owner: Address, account: Address, amount: bigint, mode?: CompoundMode): void;
	/** Deploy a satellite for `owner` accepting `asset` and list it in the strategy registry */
	satellite(at: Address, owner: Address, asset: TokenMetadata): InMemorySatelliteStrategy;
}

export function protocolFixture(
	overrides: Partial<ProtocolConfig> = {},
	logger?: Logger,
): ProtocolFixture {
	const clock = new FakeClock();
	const ctx = createProtocolContext({ clock, ...(logger !== undefined && { logger }) });
	for (const token of ALL_TOKENS) unwrap(ctx.ledger.registerToken(token));

	const venue = new FixedRateSwapVenue(ctx.ledger, VENUE);
	const strategies = new InMemoryStrategyRegistry();
	const protocol = createProtocol({
		context: ctx,
		stakingToken: STAKE.address,
		pool: POOL,
		venue,
		strategies,
		compoundPool: COMPOUND_POOL,
		config: { ...DEFAULT_PROTOCOL_CONFIG, ...overrides },
	});

	const feeds = new Map<Address, StaticPriceFeed>();
	for (const [token, usd] of USD_PRICES) {
		const feed = new StaticPriceFeed(`${token.symbol} / USD`, 8, usd * 10n ** 8n, clock.now());
		feeds.set(token.address, feed);
		unwrap(
			protocol.pricing.configureToken(admin(), token.address, {
				hops: [{ feed, reverse: false, heartbeat: HEARTBEAT }],
				maxTimePriceValid: MAX_TIME_PRICE_VALID,
			}),
		);
		unwrap(protocol.gateway.approveToken(admin(), token.address));
	}
	for (const [tokenIn, usdIn] of USD_PRICES) {
		for (const [tokenOut, usdOut] of USD_PRICES) {
			if (tokenIn === tokenOut) continue;
			// base-unit rate = usdIn * 10^decOut / (usdOut * 10^decIn)
			venue.setRate(
				tokenIn.address,
				tokenOut.address,
				usdIn * 10n ** BigInt(tokenOut.decimals),
				usdOut * 10n ** BigInt(tokenIn.decimals),
			);
		}
	}

	return {
		clock,
		ctx,
		protocol,
		venue,
		strategies,
		feeds,
		fundReward(token, amount, duration = Duration.weeks(1)) {
			if (!protocol.accounting.registry.has(token.address)) {
				unwrap(
					protocol.scheduler.addReward(admin(), token.address, DISTRIBUTOR, duration),
				);
			}
			unwrap(ctx.ledger.mint(token.address, DISTRIBUTOR, amount));
			unwrap(ctx.ledger.approve(token.address, DISTRIBUTOR, POOL, amount));
			unwrap(protocol.scheduler.notifyRewardAmount(distributor(), token.address, amount));
		},
		openAccount(owner, account, amount, mode = CompoundMode.Compound) {
			unwrap(protocol.accounts.registerAccount(user(owner), account));
			if (mode !== CompoundMode.Compound) {
				unwrap(protocol.accounts.setCompoundMode(user(owner), account, mode));
			}
			unwrap(ctx.ledger.mint(STAKE.address, owner, amount));
			unwrap(ctx.ledger.approve(STAKE.address, owner, account, amount));
			unwrap(protocol.accounts.deposit(user(owner), account, amount));
		},
		satellite(at, owner, asset) {
			strategies.add(owner, at);
			return new InMemorySatelliteStrategy(ctx.ledger, at, owner, asset.address);
		},
	};
}
