import { bench, describe } from "vitest";
import { earned, rewardPerToken, rolloverRate, scaledRate } from "../src/rewards/reward-math.js";
import { unwrap } from "../src/shared/result.js";
import { Duration, FakeClock } from "../src/shared/time.js";
import {
	ALICE,
	BOB,
	STAKE,
	USDC,
	WBTC,
	WETH,
	rewardsFixture,
	units,
	user,
} from "../src/testing/fixtures.js";

const WEEK = Duration.weeks(1);
const WAD = 10n ** 18n;

describe("reward math", () => {
	const rate = scaledRate(units(1_000, USDC), USDC.decimals, WEEK);

	bench("rewardPerToken + earned 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			const rpt = rewardPerToken(0n, rate, 0, i * 60, 1_000n * WAD);
			earned(500n * WAD, rpt, 0n, 0n, USDC.decimals);
		}
	});

	bench("rolloverRate 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			rolloverRate({
				amount: units(1_000, USDC),
				decimals: USDC.decimals,
				duration: WEEK,
				now: i,
				periodFinish: WEEK,
				currentRate: rate,
			});
		}
	});
});

describe("settlement", () => {
	const clock = new FakeClock();
	const f = rewardsFixture(clock);
	for (const token of [USDC, WBTC, WETH]) {
		f.addReward(token, WEEK);
		f.fund(token, units(1_000, token));
	}
	f.stake(ALICE, units(1_000, STAKE));
	f.stake(BOB, units(1_000, STAKE));

	bench("stake + getReward across three reward tokens", () => {
		clock.advance(1);
		unwrap(f.ctx.ledger.mint(f.accounting.stakingToken, ALICE, 1n));
		unwrap(f.ctx.ledger.approve(f.accounting.stakingToken, ALICE, f.accounting.pool, 1n));
		unwrap(f.accounting.stake(user(ALICE), 1n));
		unwrap(f.accounting.getReward(user(BOB)));
	});
});
