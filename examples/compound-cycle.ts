/**
 * Compound cycle — one account, one week of USDC rewards, one harvest.
 *
 * Wires the protocol over the in-process venue and price feeds, funds the
 * emission, then lets the backend swap the USDC into STK and restake it.
 *
 * Run: npx tsx examples/compound-cycle.ts
 */

import {
	type Address,
	Duration,
	FakeClock,
	Role,
	type TokenMetadata,
	address,
	caller,
	createLogger,
	createProtocol,
	createProtocolContext,
	poolId,
	unwrap,
} from "../src/index.js";
import { fromBaseUnits, toBaseUnits } from "../src/lib/ethereum/units.js";
import { FixedRateSwapVenue } from "../src/testing/fixed-rate-swap-venue.js";
import { InMemoryStrategyRegistry } from "../src/testing/in-memory-strategies.js";
import { StaticPriceFeed } from "../src/testing/static-price-feed.js";

const addr = (byte: string): Address => address(`0x${byte.repeat(20)}`);

const STK: TokenMetadata = { address: addr("57"), symbol: "STK", decimals: 18 };
const USDC: TokenMetadata = { address: addr("0c"), symbol: "USDC", decimals: 6 };
const POOL = addr("50");
const OWNER = addr("a1");
const ACCOUNT = addr("ac");
const DISTRIBUTOR = addr("d1");

const admin = caller(addr("ad"), [Role.Admin]);
const backend = caller(addr("be"), [Role.Backend]);
const owner = caller(OWNER);
const distributor = caller(DISTRIBUTOR);

const clock = new FakeClock();
const ctx = createProtocolContext({ clock, logger: createLogger({ level: "warn" }) });
unwrap(ctx.ledger.registerToken(STK));
unwrap(ctx.ledger.registerToken(USDC));

// 1 USDC buys 0.5 STK
const venue = new FixedRateSwapVenue(ctx.ledger, addr("5e")).setRate(
	USDC.address,
	STK.address,
	5n * 10n ** 11n,
);
const protocol = createProtocol({
	context: ctx,
	stakingToken: STK.address,
	pool: POOL,
	venue,
	strategies: new InMemoryStrategyRegistry(),
	compoundPool: poolId("stk-usdc"),
});

for (const [token, usd] of [
	[STK, 2n],
	[USDC, 1n],
] as const) {
	const feed = new StaticPriceFeed(`${token.symbol} / USD`, 8, usd * 10n ** 8n, clock.now());
	unwrap(
		protocol.pricing.configureToken(admin, token.address, {
			hops: [{ feed, reverse: false, heartbeat: Duration.days(1) }],
			maxTimePriceValid: Duration.minutes(30),
		}),
	);
	unwrap(protocol.gateway.approveToken(admin, token.address));
}

// ── Stake ────────────────────────────────────────────────────────────

const principal = toBaseUnits("1000", STK.decimals);
unwrap(protocol.accounts.registerAccount(owner, ACCOUNT));
unwrap(ctx.ledger.mint(STK.address, OWNER, principal));
unwrap(ctx.ledger.approve(STK.address, OWNER, ACCOUNT, principal));
unwrap(protocol.accounts.deposit(owner, ACCOUNT, principal));

// ── Fund a week of rewards ───────────────────────────────────────────

const funding = toBaseUnits("1000", USDC.decimals);
unwrap(protocol.scheduler.addReward(admin, USDC.address, DISTRIBUTOR, Duration.weeks(1)));
unwrap(ctx.ledger.mint(USDC.address, DISTRIBUTOR, funding));
unwrap(ctx.ledger.approve(USDC.address, DISTRIBUTOR, POOL, funding));
unwrap(protocol.scheduler.notifyRewardAmount(distributor, USDC.address, funding));

clock.advance(Duration.days(3) + Duration.hours(12));
const halfway = unwrap(protocol.accounting.earned(ACCOUNT, USDC.address));
console.log(`Earned at 3.5 days: ${fromBaseUnits(halfway, USDC.decimals)} USDC`);

// ── Harvest and compound ─────────────────────────────────────────────

clock.advance(Duration.days(3) + Duration.hours(12));
const outcome = unwrap(protocol.processor.processRewards(backend, ACCOUNT));
for (const [token, amount] of outcome.harvested) {
	console.log(`Harvested ${fromBaseUnits(amount, USDC.decimals)} of ${token}`);
}
console.log(`Restaked ${fromBaseUnits(outcome.restaked, STK.decimals)} STK`);

const position = unwrap(protocol.accounts.position(ACCOUNT));
console.log(`Staked now: ${fromBaseUnits(position.staked, STK.decimals)} STK`);
console.log(`Events published: ${ctx.events.history().length}`);
