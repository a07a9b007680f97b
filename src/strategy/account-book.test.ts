import { beforeEach, describe, expect, it } from "vitest";
import { address, poolId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { Duration } from "../shared/time.js";
import { ALICE, BOB, POOL, STAKE, USDC, WETH, units, user } from "../testing/fixtures.js";
import { type ProtocolFixture, protocolFixture } from "../testing/protocol-fixture.js";
import { CompoundMode } from "./types.js";

const ACCOUNT = address(`0x${"ac".repeat(20)}`);
const SATELLITE = address(`0x${"e1".repeat(20)}`);

describe("AccountBook", () => {
	let f: ProtocolFixture;

	beforeEach(() => {
		f = protocolFixture();
	});

	describe("registerAccount", () => {
		it("records the owner and defaults to compounding", () => {
			unwrap(f.protocol.accounts.registerAccount(user(ALICE), ACCOUNT));

			expect(f.protocol.accounts.ownerOf(ACCOUNT)).toBe(ALICE);
			expect(unwrap(f.protocol.accounts.record(ACCOUNT)).mode).toBe(CompoundMode.Compound);
			expect(f.protocol.accounts.accountsOf(ALICE)).toEqual([ACCOUNT]);
			expect(f.ctx.events.ofType("account_registered")).toEqual([
				{ type: "account_registered", account: ACCOUNT, owner: ALICE },
			]);
		});

		it("refuses to register an account twice", () => {
			unwrap(f.protocol.accounts.registerAccount(user(ALICE), ACCOUNT));

			const again = f.protocol.accounts.registerAccount(user(BOB), ACCOUNT);

			expect(!again.ok && again.error.code).toBe("LIFECYCLE_VIOLATION");
			expect(f.protocol.accounts.ownerOf(ACCOUNT)).toBe(ALICE);
		});
	});

	describe("principal", () => {
		it("stakes the owner's deposit as the account", () => {
			f.openAccount(ALICE, ACCOUNT, units(1_000, STAKE));

			expect(f.protocol.accounting.balanceOf(ACCOUNT)).toBe(units(1_000, STAKE));
			expect(f.ctx.ledger.balanceOf(STAKE.address, ALICE)).toBe(0n);
			expect(f.ctx.ledger.balanceOf(STAKE.address, POOL)).toBe(units(1_000, STAKE));
		});

		it("fails the deposit without the owner's allowance", () => {
			unwrap(f.protocol.accounts.registerAccount(user(ALICE), ACCOUNT));
			unwrap(f.ctx.ledger.mint(STAKE.address, ALICE, units(10, STAKE)));

			const result = f.protocol.accounts.deposit(user(ALICE), ACCOUNT, units(10, STAKE));

			expect(!result.ok && result.error.code).toBe("INSUFFICIENT_ALLOWANCE");
			expect(f.ctx.ledger.balanceOf(STAKE.address, ALICE)).toBe(units(10, STAKE));
		});

		it("lets only the owner move principal", () => {
			f.openAccount(ALICE, ACCOUNT, units(1_000, STAKE));

			const deposit = f.protocol.accounts.deposit(user(BOB), ACCOUNT, 1n);
			const withdraw = f.protocol.accounts.withdraw(user(BOB), ACCOUNT, 1n);

			expect(!deposit.ok && deposit.error.message).toBe(`deposit is restricted to ${ALICE}`);
			expect(!withdraw.ok && withdraw.error.code).toBe("UNAUTHORIZED");
		});

		it("returns withdrawn principal to the owner", () => {
			f.openAccount(ALICE, ACCOUNT, units(1_000, STAKE));

			unwrap(f.protocol.accounts.withdraw(user(ALICE), ACCOUNT, units(400, STAKE)));

			expect(f.protocol.accounting.balanceOf(ACCOUNT)).toBe(units(600, STAKE));
			expect(f.ctx.ledger.balanceOf(STAKE.address, ALICE)).toBe(units(400, STAKE));
			expect(f.ctx.ledger.balanceOf(STAKE.address, ACCOUNT)).toBe(0n);
		});

		it("hands principal and rewards to the owner on withdrawAll", () => {
			f.openAccount(ALICE, ACCOUNT, units(1_000, STAKE));
			f.fundReward(USDC, units(1_000, USDC));
			f.clock.advance(Duration.days(3) + Duration.hours(12));

			const exited = unwrap(f.protocol.accounts.withdrawAll(user(ALICE), ACCOUNT));

			expect(exited.withdrawn).toBe(units(1_000, STAKE));
			expect(exited.rewards).toEqual(new Map([[USDC.address, 499_999_999n]]));
			expect(f.ctx.ledger.balanceOf(STAKE.address, ALICE)).toBe(units(1_000, STAKE));
			expect(f.ctx.ledger.balanceOf(USDC.address, ALICE)).toBe(499_999_999n);
			expect(f.ctx.ledger.balanceOf(USDC.address, ACCOUNT)).toBe(0n);
		});
	});

	describe("settings", () => {
		beforeEach(() => {
			f.openAccount(ALICE, ACCOUNT, units(1_000, STAKE));
			f.fundReward(USDC, units(1_000, USDC));
		});

		it("switches the compound mode for the owner only", () => {
			const stranger = f.protocol.accounts.setCompoundMode(user(BOB), ACCOUNT, CompoundMode.Reinvest);
			unwrap(f.protocol.accounts.setCompoundMode(user(ALICE), ACCOUNT, CompoundMode.Reinvest));

			expect(stranger.ok).toBe(false);
			expect(unwrap(f.protocol.accounts.record(ACCOUNT)).mode).toBe(CompoundMode.Reinvest);
		});

		it("routes registered non-staking reward tokens only", () => {
			const pool = poolId("usdc-weth");
			const staking = f.protocol.accounts.setSatelliteRoute(
				user(ALICE),
				ACCOUNT,
				STAKE.address,
				SATELLITE,
				pool,
			);
			const unknown = f.protocol.accounts.setSatelliteRoute(
				user(ALICE),
				ACCOUNT,
				WETH.address,
				SATELLITE,
				pool,
			);
			unwrap(
				f.protocol.accounts.setSatelliteRoute(user(ALICE), ACCOUNT, USDC.address, SATELLITE, pool),
			);

			expect(!staking.ok && staking.error.message).toBe("The staking token is always restaked");
			expect(!unknown.ok && unknown.error.code).toBe("NOT_FOUND");
			expect(unwrap(f.protocol.accounts.record(ACCOUNT)).routes.get(USDC.address)).toEqual({
				satellite: SATELLITE,
				swapPool: pool,
			});
		});

		it("reports the position with pending rewards and effective slippage", () => {
			f.clock.advance(Duration.days(3) + Duration.hours(12));
			unwrap(f.protocol.slippage.setAccountSlippage(user(ALICE), ACCOUNT, 250));

			const position = unwrap(f.protocol.accounts.position(ACCOUNT));

			expect(position.owner).toBe(ALICE);
			expect(position.staked).toBe(units(1_000, STAKE));
			expect(position.slippageBps).toBe(250);
			expect(position.pending).toEqual(new Map([[USDC.address, 499_999_999n]]));
		});
	});
});
