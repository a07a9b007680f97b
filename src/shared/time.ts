/**
 * Time utilities — injectable block clock.
 *
 * Emission schedules are expressed in whole seconds, like block timestamps.
 * All protocol code reads `Clock.now()` so tests can move time by hand.
 */

/** Source of the current timestamp, in whole seconds since the epoch. */
export interface Clock {
	now(): number;
}

/** Wall clock truncated to whole seconds. */
export const SystemClock: Clock = {
	now: () => Math.floor(Date.now() / 1_000),
};

/** Controllable clock for deterministic tests. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startSec = 1_700_000_000) {
		this.time = startSec;
	}

	now(): number {
		return this.time;
	}

	advance(seconds: number): void {
		if (!Number.isInteger(seconds) || seconds < 0) {
			throw new Error(`FakeClock.advance: expected a non-negative integer, got ${seconds}`);
		}
		this.time += seconds;
	}

	set(seconds: number): void {
		this.time = seconds;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Human-readable durations in seconds. */
export const Duration = {
	seconds: (n: number) => n,
	minutes: (n: number) => n * 60,
	hours: (n: number) => n * 3_600,
	days: (n: number) => n * 86_400,
	weeks: (n: number) => n * 604_800,
} as const;
