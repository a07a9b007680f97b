import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { address } from "../shared/identifiers.js";
import { forecastEmissions } from "./emission-forecast.js";
import type { RewardTokenConfig } from "./types.js";

const config: RewardTokenConfig = {
	token: address(`0x${"0c".repeat(20)}`),
	decimals: 6,
	distributor: address(`0x${"d1".repeat(20)}`),
	duration: 86_400,
	periodFinish: 2_000,
	// 1 whole token per second, normalised to 18 decimals
	rewardRate: 10n ** 18n,
	rewardPerTokenStored: 0n,
	lastUpdateTime: 1_000,
};

describe("forecastEmissions", () => {
	it("scales the rate to day, week and year", () => {
		const f = forecastEmissions({ config, now: 1_500, totalStaked: 0n, stakingDecimals: 18 });
		expect(f.active).toBe(true);
		expect(f.perSecond.toString()).toBe("1");
		expect(f.perDay.toString()).toBe("86400");
		expect(f.perWeek.toString()).toBe("604800");
		expect(f.perYear.toString()).toBe("31536000");
		expect(f.remaining.toString()).toBe("500");
		expect(f.apr).toBeUndefined();
	});

	it("reports zero once the window has ended", () => {
		const f = forecastEmissions({ config, now: 2_000, totalStaked: 10n, stakingDecimals: 18 });
		expect(f.active).toBe(false);
		expect(f.perDay.isZero()).toBe(true);
		expect(f.remaining.isZero()).toBe(true);
	});

	it("estimates APR from prices and total stake", () => {
		const f = forecastEmissions({
			config,
			now: 1_000,
			totalStaked: 31_536_000n * 10n ** 18n,
			stakingDecimals: 18,
			rewardPrice: Decimal.from("0.5"),
			stakingPrice: Decimal.from("2"),
		});
		// 31_536_000 * 0.5 / (31_536_000 * 2)
		expect(f.apr?.toString()).toBe("0.25");
	});
});
