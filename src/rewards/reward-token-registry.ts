/**
 * RewardTokenRegistry — indexed arena of reward token schedules.
 *
 * Entries live in a dense array (iteration order = settlement order) with an
 * address → index map. Removal swaps the last entry into the hole, so every
 * other entry keeps its data; only its position may change.
 * Per-account accumulator state is stored on the entry it belongs to and
 * journaled per account; snapshots cover only the schedules.
 */

import {
	InvalidInputError,
	LifecycleError,
	NotFoundError,
	type ProtocolError,
} from "../shared/errors.js";
import { type Address, isZeroAddress } from "../shared/identifiers.js";
import { type Result, done, err, ok } from "../shared/result.js";
import { JournaledMap } from "../transaction/journaled-map.js";
import type { Snapshottable } from "../transaction/types.js";
import type { UnitOfWork } from "../transaction/unit-of-work.js";
import { MAX_REWARD_DECIMALS, MIN_REWARD_DECIMALS, type RewardTokenConfig } from "./types.js";

/** Mutable schedule plus per-account state; internal to the rewards module. */
export interface RewardEntry {
	readonly token: Address;
	readonly decimals: number;
	distributor: Address;
	duration: number;
	periodFinish: number;
	rewardRate: bigint;
	rewardPerTokenStored: bigint;
	lastUpdateTime: number;
	/** Accumulator value each account was last settled at */
	readonly paid: JournaledMap<Address, bigint>;
	/** Settled but unclaimed base units per account */
	readonly accrued: JournaledMap<Address, bigint>;
}

export interface NewRewardToken {
	readonly token: Address;
	readonly decimals: number;
	readonly distributor: Address;
	readonly duration: number;
}

export class RewardTokenRegistry implements Snapshottable<RegistrySnapshot> {
	private entries: RewardEntry[] = [];
	private index = new Map<Address, number>();

	constructor(private readonly uow: UnitOfWork) {}

	get size(): number {
		return this.entries.length;
	}

	has(token: Address): boolean {
		return this.index.has(token);
	}

	find(token: Address): RewardEntry | undefined {
		const i = this.index.get(token);
		return i === undefined ? undefined : this.entries[i];
	}

	require(token: Address): Result<RewardEntry, NotFoundError> {
		const entry = this.find(token);
		if (entry) return ok(entry);
		return err(new NotFoundError(`Reward token ${token} is not registered`, { token }));
	}

	/** Entries in settlement order. */
	list(): readonly RewardEntry[] {
		return this.entries;
	}

	tokens(): Address[] {
		return this.entries.map((e) => e.token);
	}

	config(token: Address): RewardTokenConfig | undefined {
		const entry = this.find(token);
		return entry ? toConfig(entry) : undefined;
	}

	add(params: NewRewardToken): Result<RewardEntry, ProtocolError> {
		if (this.has(params.token)) {
			return err(new LifecycleError("Reward token already registered", { token: params.token }));
		}
		if (!Number.isInteger(params.duration) || params.duration <= 0) {
			return err(
				new InvalidInputError("Reward duration must be a positive number of seconds", {
					duration: params.duration,
				}),
			);
		}
		if (params.decimals < MIN_REWARD_DECIMALS || params.decimals > MAX_REWARD_DECIMALS) {
			return err(
				new InvalidInputError(
					`Reward token decimals must be within ${MIN_REWARD_DECIMALS}..${MAX_REWARD_DECIMALS}`,
					{ token: params.token, decimals: params.decimals },
				),
			);
		}
		if (isZeroAddress(params.distributor)) {
			return err(new InvalidInputError("Rewards distributor cannot be the zero address"));
		}

		const entry: RewardEntry = {
			token: params.token,
			decimals: params.decimals,
			distributor: params.distributor,
			duration: params.duration,
			periodFinish: 0,
			rewardRate: 0n,
			rewardPerTokenStored: 0n,
			lastUpdateTime: 0,
			paid: new JournaledMap(this.uow),
			accrued: new JournaledMap(this.uow),
		};
		this.index.set(entry.token, this.entries.length);
		this.entries.push(entry);
		return ok(entry);
	}

	/** Swap-remove a token whose emission window has lapsed. */
	remove(token: Address, now: number): Result<void, ProtocolError> {
		const i = this.index.get(token);
		const entry = i === undefined ? undefined : this.entries[i];
		if (i === undefined || entry === undefined) {
			return err(new NotFoundError(`Reward token ${token} is not registered`, { token }));
		}
		if (now <= entry.periodFinish) {
			return err(
				new LifecycleError("Reward period still active", {
					token,
					periodFinish: entry.periodFinish,
				}),
			);
		}

		const last = this.entries.pop();
		if (last && last !== entry) {
			this.entries[i] = last;
			this.index.set(last.token, i);
		}
		this.index.delete(token);
		return done();
	}

	// ── Unit-of-work participation ─────────────────────────────────

	snapshot(): RegistrySnapshot {
		return this.entries.map((entry) => ({ entry, saved: toConfig(entry) }));
	}

	/** Writes saved state back into the same entry objects, so held references stay live. */
	restore(snapshot: RegistrySnapshot): void {
		for (const { entry, saved } of snapshot) {
			entry.distributor = saved.distributor;
			entry.duration = saved.duration;
			entry.periodFinish = saved.periodFinish;
			entry.rewardRate = saved.rewardRate;
			entry.rewardPerTokenStored = saved.rewardPerTokenStored;
			entry.lastUpdateTime = saved.lastUpdateTime;
		}
		this.entries = snapshot.map((s) => s.entry);
		this.index = new Map(this.entries.map((e, i) => [e.token, i]));
	}
}

export type RegistrySnapshot = ReadonlyArray<{
	readonly entry: RewardEntry;
	readonly saved: RewardTokenConfig;
}>;

export function toConfig(entry: RewardEntry): RewardTokenConfig {
	return {
		token: entry.token,
		decimals: entry.decimals,
		distributor: entry.distributor,
		duration: entry.duration,
		periodFinish: entry.periodFinish,
		rewardRate: entry.rewardRate,
		rewardPerTokenStored: entry.rewardPerTokenStored,
		lastUpdateTime: entry.lastUpdateTime,
	};
}
