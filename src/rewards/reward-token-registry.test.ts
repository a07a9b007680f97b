import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../shared/errors.js";
import { address } from "../shared/identifiers.js";
import { err } from "../shared/result.js";
import { UnitOfWork } from "../transaction/unit-of-work.js";
import { RewardTokenRegistry } from "./reward-token-registry.js";

const A = address(`0x${"0a".repeat(20)}`);
const B = address(`0x${"0b".repeat(20)}`);
const C = address(`0x${"0c".repeat(20)}`);
const DIST = address(`0x${"d1".repeat(20)}`);

function registryWith(...tokens: string[]): RewardTokenRegistry {
	const registry = new RewardTokenRegistry(new UnitOfWork());
	for (const token of tokens) {
		registry.add({ token: address(token), decimals: 18, distributor: DIST, duration: 100 });
	}
	return registry;
}

describe("RewardTokenRegistry", () => {
	it("keeps insertion order", () => {
		expect(registryWith(A, B, C).tokens()).toEqual([A, B, C]);
	});

	it("swap-removes and re-indexes the moved entry", () => {
		const registry = registryWith(A, B, C);
		const c = registry.find(C);
		expect(registry.remove(A, 1).ok).toBe(true);
		expect(registry.tokens()).toEqual([C, B]);
		expect(registry.find(C)).toBe(c);
		expect(registry.has(A)).toBe(false);
		expect(registry.size).toBe(2);
	});

	it("removes the last entry without moving others", () => {
		const registry = registryWith(A, B);
		expect(registry.remove(B, 1).ok).toBe(true);
		expect(registry.tokens()).toEqual([A]);
	});

	it("refuses to remove an active window", () => {
		const registry = registryWith(A);
		const entry = registry.find(A);
		if (entry) entry.periodFinish = 500;
		const result = registry.remove(A, 500);
		expect(!result.ok && result.error.code).toBe("LIFECYCLE_VIOLATION");
	});

	it("rejects decimals outside 1..18", () => {
		const registry = new RewardTokenRegistry(new UnitOfWork());
		const result = registry.add({ token: A, decimals: 19, distributor: DIST, duration: 1 });
		expect(!result.ok && result.error.code).toBe("INVALID_INPUT");
	});

	it("restores schedules into the same entry objects", () => {
		const registry = registryWith(A, B);
		const a = registry.find(A);
		if (!a) throw new Error("missing entry");
		const saved = registry.snapshot();

		a.rewardRate = 99n;
		registry.remove(B, 1);
		registry.add({ token: C, decimals: 6, distributor: DIST, duration: 1 });
		registry.restore(saved);

		expect(registry.find(A)).toBe(a);
		expect(a.rewardRate).toBe(0n);
		expect(registry.tokens()).toEqual([A, B]);
		expect(registry.has(C)).toBe(false);
	});

	it("undoes per-account writes made in a failed run", () => {
		const uow = new UnitOfWork();
		const registry = new RewardTokenRegistry(uow);
		uow.register("registry", registry);
		registry.add({ token: A, decimals: 18, distributor: DIST, duration: 100 });
		const a = registry.find(A);
		if (!a) throw new Error("missing entry");
		a.accrued.set(DIST, 5n);

		const result = uow.run("settle", () => {
			a.accrued.set(DIST, 6n);
			a.paid.set(DIST, 42n);
			return err(new InvalidInputError("abort"));
		});

		expect(result.ok).toBe(false);
		expect(a.accrued.get(DIST)).toBe(5n);
		expect(a.paid.has(DIST)).toBe(false);
	});
});
