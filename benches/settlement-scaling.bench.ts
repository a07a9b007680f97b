import { bench, describe } from "vitest";
import { type Address, address } from "../src/shared/identifiers.js";
import { unwrap } from "../src/shared/result.js";
import { Duration, FakeClock } from "../src/shared/time.js";
import {
	ALICE,
	STAKE,
	USDC,
	WBTC,
	WETH,
	rewardsFixture,
	units,
	user,
} from "../src/testing/fixtures.js";

const WEEK = Duration.weeks(1);

function staker(i: number): Address {
	return address(`0x${(i + 1).toString(16).padStart(40, "0")}`);
}

// Per-operation cost should not move with the number of other stakers.
for (const stakers of [10, 1_000, 5_000]) {
	describe(`stake + getReward with ${stakers} other stakers`, () => {
		const clock = new FakeClock();
		const f = rewardsFixture(clock);
		for (const token of [USDC, WBTC, WETH]) {
			f.addReward(token, WEEK);
			f.fund(token, units(1_000, token));
		}
		for (let i = 0; i < stakers; i++) f.stake(staker(i), units(10, STAKE));
		f.stake(ALICE, units(10, STAKE));

		bench("one account", () => {
			clock.advance(1);
			unwrap(f.ctx.ledger.mint(STAKE.address, ALICE, 1n));
			unwrap(f.ctx.ledger.approve(STAKE.address, ALICE, f.accounting.pool, 1n));
			unwrap(f.accounting.stake(user(ALICE), 1n));
			unwrap(f.accounting.getReward(user(ALICE)));
		});
	});
}
