import { describe, expect, it } from "vitest";
import { ExternalCallError, InvalidInputError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import { JournaledMap } from "./journaled-map.js";
import type { Snapshottable } from "./types.js";
import { UnitOfWork } from "./unit-of-work.js";

class Counter implements Snapshottable<number> {
	value = 0;

	snapshot(): number {
		return this.value;
	}

	restore(state: number): void {
		this.value = state;
	}
}

function setup(): { uow: UnitOfWork; counter: Counter; commits: string[] } {
	const uow = new UnitOfWork();
	const counter = new Counter();
	const commits: string[] = [];
	uow.register("counter", counter);
	uow.onCommit(() => commits.push(`commit@${counter.value}`));
	return { uow, counter, commits };
}

describe("UnitOfWork", () => {
	it("keeps changes and fires commit hooks on success", () => {
		const { uow, counter, commits } = setup();
		const result = uow.run("inc", () => {
			counter.value += 5;
			return ok(counter.value);
		});
		expect(result).toEqual(ok(5));
		expect(counter.value).toBe(5);
		expect(commits).toEqual(["commit@5"]);
	});

	it("restores participants when the operation returns an error", () => {
		const { uow, counter, commits } = setup();
		counter.value = 3;
		const failure = new InvalidInputError("nope");
		const result = uow.run("fail", () => {
			counter.value = 99;
			return err(failure);
		});
		expect(result).toEqual(err(failure));
		expect(counter.value).toBe(3);
		expect(commits).toEqual([]);
	});

	it("classifies thrown errors and rolls back", () => {
		const { uow, counter } = setup();
		const result = uow.run("throw", () => {
			counter.value = 7;
			throw new RangeError("venue exploded");
		});
		expect(counter.value).toBe(0);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ExternalCallError);
			expect(result.error.message).toBe("venue exploded");
		}
	});

	it("treats nested runs as savepoints", () => {
		const { uow, counter, commits } = setup();
		const result = uow.run("outer", () => {
			counter.value = 1;
			const inner = uow.run("inner", () => {
				counter.value = 2;
				return err(new InvalidInputError("inner failed"));
			});
			expect(inner.ok).toBe(false);
			expect(counter.value).toBe(1);
			counter.value += 10;
			return ok(undefined);
		});
		expect(result.ok).toBe(true);
		expect(counter.value).toBe(11);
		expect(commits).toEqual(["commit@11"]);
	});

	it("rolls back a committed inner run when the outer run fails", () => {
		const { uow, counter, commits } = setup();
		uow.run("outer", () => {
			uow.run("inner", () => {
				counter.value = 2;
				return ok(undefined);
			});
			return err(new InvalidInputError("outer failed"));
		});
		expect(counter.value).toBe(0);
		expect(commits).toEqual([]);
	});

	it("reports whether a run is active", () => {
		const { uow } = setup();
		let inside = false;
		uow.run("probe", () => {
			inside = uow.active;
			return ok(undefined);
		});
		expect(inside).toBe(true);
		expect(uow.active).toBe(false);
	});

	it("refuses registration mid-run", () => {
		const { uow } = setup();
		const result = uow.run("register", () => {
			uow.register("late", new Counter());
			return ok(undefined);
		});
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toContain('cannot register "late"');
	});

	describe("journal", () => {
		it("undoes only the keys a failed run wrote", () => {
			const uow = new UnitOfWork();
			const balances = new JournaledMap<string, bigint>(uow);
			balances.set("alice", 10n).set("bob", 20n);

			const result = uow.run("move", () => {
				balances.set("alice", 4n);
				balances.set("carol", 6n);
				balances.delete("bob");
				return err(new InvalidInputError("abort"));
			});

			expect(result.ok).toBe(false);
			expect([...balances]).toEqual([
				["alice", 10n],
				["bob", 20n],
			]);
		});

		it("restores the oldest value when a key is written twice", () => {
			const uow = new UnitOfWork();
			const balances = new JournaledMap<string, bigint>(uow);
			balances.set("alice", 1n);
			uow.run("twice", () => {
				balances.set("alice", 2n);
				balances.set("alice", 3n);
				throw new Error("boom");
			});
			expect(balances.get("alice")).toBe(1n);
		});

		it("keeps an inner commit undoable by the outer run", () => {
			const uow = new UnitOfWork();
			const balances = new JournaledMap<string, bigint>(uow);
			uow.run("outer", () => {
				const inner = uow.run("inner", () => {
					balances.set("alice", 5n);
					return ok(undefined);
				});
				expect(inner.ok).toBe(true);
				expect(balances.get("alice")).toBe(5n);
				return err(new InvalidInputError("outer failed"));
			});
			expect(balances.has("alice")).toBe(false);
			expect(balances.size).toBe(0);
		});

		it("leaves the outer run's writes when only the inner run fails", () => {
			const uow = new UnitOfWork();
			const balances = new JournaledMap<string, bigint>(uow);
			const result = uow.run("outer", () => {
				balances.set("alice", 1n);
				uow.run("inner", () => {
					balances.set("alice", 2n);
					balances.set("bob", 2n);
					return err(new InvalidInputError("inner failed"));
				});
				return ok(undefined);
			});
			expect(result.ok).toBe(true);
			expect(balances.get("alice")).toBe(1n);
			expect(balances.has("bob")).toBe(false);
		});

		it("treats writes outside a run as permanent", () => {
			const uow = new UnitOfWork();
			const balances = new JournaledMap<string, bigint>(uow);
			balances.set("alice", 1n);
			uow.run("noop", () => err(new InvalidInputError("abort")));
			expect(balances.get("alice")).toBe(1n);
		});
	});
});
