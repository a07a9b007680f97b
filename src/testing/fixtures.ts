/**
 * Test fixtures — well-known addresses, tokens and a wired reward pool.
 */

import { type Caller, Role, caller } from "../access/caller.js";
import { type ProtocolContext, createProtocolContext } from "../context/protocol-context.js";
import { EmissionScheduler } from "../rewards/emission-scheduler.js";
import { RewardAccounting } from "../rewards/reward-accounting.js";
import { type Address, address } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import type { TokenMetadata } from "../token/types.js";

const addr = (byte: string): Address => address(`0x${byte.repeat(20)}`);

// ── Actors ───────────────────────────────────────────────────────────

export const ADMIN = addr("ad");
export const BACKEND = addr("be");
export const GUARDIAN = addr("9a");
export const DISTRIBUTOR = addr("d1");
export const FEE_RECIPIENT = addr("fe");
export const POOL = addr("50");
export const ALICE = addr("a1");
export const BOB = addr("b0");
export const CAROL = addr("c0");

// ── Tokens ───────────────────────────────────────────────────────────

export const STAKE: TokenMetadata = { address: addr("57"), symbol: "STK", decimals: 18 };
export const USDC: TokenMetadata = { address: addr("0c"), symbol: "USDC", decimals: 6 };
export const WBTC: TokenMetadata = { address: addr("0b"), symbol: "WBTC", decimals: 8 };
export const WETH: TokenMetadata = { address: addr("0e"), symbol: "WETH", decimals: 18 };

export const ALL_TOKENS: readonly TokenMetadata[] = [STAKE, USDC, WBTC, WETH];

export const admin = (): Caller => caller(ADMIN, [Role.Admin]);
export const backend = (): Caller => caller(BACKEND, [Role.Backend]);
export const guardian = (): Caller => caller(GUARDIAN, [Role.Guardian]);
export const distributor = (): Caller => caller(DISTRIBUTOR);
export const user = (who: Address): Caller => caller(who);

/** Whole-token amount in base units. */
export function units(whole: bigint | number, token: TokenMetadata): bigint {
	return BigInt(whole) * 10n ** BigInt(token.decimals);
}

// ── Reward pool ──────────────────────────────────────────────────────

export interface RewardsFixture {
	readonly clock: FakeClock;
	readonly ctx: ProtocolContext;
	readonly accounting: RewardAccounting;
	readonly scheduler: EmissionScheduler;
	/** Register `token` as a reward paid by DISTRIBUTOR over `duration` seconds */
	addReward(token: TokenMetadata, duration: number): void;
	/** Mint to DISTRIBUTOR, approve the pool and notify */
	fund(token: TokenMetadata, amount: bigint): void;
	/** Mint, approve and stake for `who` */
	stake(who: Address, amount: bigint): void;
}

export function rewardsFixture(clock: FakeClock = new FakeClock()): RewardsFixture {
	const ctx = createProtocolContext({ clock });
	for (const token of ALL_TOKENS) unwrap(ctx.ledger.registerToken(token));
	const accounting = new RewardAccounting(ctx, { stakingToken: STAKE.address, pool: POOL });
	const scheduler = new EmissionScheduler(ctx, accounting);

	return {
		clock,
		ctx,
		accounting,
		scheduler,
		addReward(token, duration) {
			unwrap(scheduler.addReward(admin(), token.address, DISTRIBUTOR, duration));
		},
		fund(token, amount) {
			unwrap(ctx.ledger.mint(token.address, DISTRIBUTOR, amount));
			unwrap(ctx.ledger.approve(token.address, DISTRIBUTOR, POOL, amount));
			unwrap(scheduler.notifyRewardAmount(distributor(), token.address, amount));
		},
		stake(who, amount) {
			unwrap(ctx.ledger.mint(STAKE.address, who, amount));
			unwrap(ctx.ledger.approve(STAKE.address, who, POOL, amount));
			unwrap(accounting.stake(user(who), amount));
		},
	};
}
