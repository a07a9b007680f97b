/**
 * Emission forecast — human-scale view of a reward schedule.
 *
 * The scaled rate is already normalised to 18 decimals, so whole-token
 * figures come straight from it without the token's own decimals.
 */

import { Decimal } from "../shared/decimal.js";
import { Duration } from "../shared/time.js";
import type { RewardTokenConfig } from "./types.js";

export interface EmissionForecastInput {
	readonly config: RewardTokenConfig;
	readonly now: number;
	/** Total staked, staking-token base units */
	readonly totalStaked: bigint;
	readonly stakingDecimals: number;
	/** Quote-currency price of one whole reward token */
	readonly rewardPrice?: Decimal;
	/** Quote-currency price of one whole staking token */
	readonly stakingPrice?: Decimal;
}

export interface EmissionForecast {
	/** True while the current window is still emitting */
	readonly active: boolean;
	readonly perSecond: Decimal;
	readonly perDay: Decimal;
	readonly perWeek: Decimal;
	readonly perYear: Decimal;
	/** Whole tokens still to be emitted in the current window */
	readonly remaining: Decimal;
	/** Annualised reward value over staked value; undefined without prices or stake */
	readonly apr: Decimal | undefined;
}

const YEAR = Duration.days(365);

export function forecastEmissions(input: EmissionForecastInput): EmissionForecast {
	const { config, now } = input;
	const active = now < config.periodFinish;
	const perSecond = active ? Decimal.fromUnits(config.rewardRate, 18) : Decimal.zero();
	const over = (seconds: number) => perSecond.mul(Decimal.from(seconds));
	const remaining = active
		? Decimal.fromUnits(config.rewardRate * BigInt(config.periodFinish - now), 18)
		: Decimal.zero();
	const perYear = over(YEAR);

	let apr: Decimal | undefined;
	if (input.rewardPrice && input.stakingPrice && input.totalStaked > 0n) {
		const stakedValue = Decimal.fromUnits(input.totalStaked, input.stakingDecimals).mul(
			input.stakingPrice,
		);
		apr = stakedValue.isZero() ? undefined : perYear.mul(input.rewardPrice).div(stakedValue);
	}

	return {
		active,
		perSecond,
		perDay: over(Duration.days(1)),
		perWeek: over(Duration.weeks(1)),
		perYear,
		remaining,
		apr,
	};
}
