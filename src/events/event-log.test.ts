import { describe, expect, it } from "vitest";
import { createLogger } from "../lib/logger/index.js";
import { address } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { InvalidInputError } from "../shared/errors.js";
import { UnitOfWork } from "../transaction/unit-of-work.js";
import { EventLog } from "./event-log.js";
import type { ProtocolEvent } from "./protocol-events.js";

const ACCOUNT = address(`0x${"ac".repeat(20)}`);
const TOKEN = address(`0x${"70".repeat(20)}`);

function staked(amount: bigint): ProtocolEvent {
	return { type: "staked", account: ACCOUNT, amount };
}

describe("EventLog", () => {
	it("publishes buffered events on flush with sequence and timestamp", () => {
		const clock = new FakeClock(1_000);
		const log = new EventLog(clock);
		log.record(staked(5n));
		clock.advance(10);
		log.record({ type: "withdrawn", account: ACCOUNT, amount: 2n });
		expect(log.history()).toEqual([]);
		expect(log.pendingCount).toBe(2);

		log.flush();
		expect(log.pendingCount).toBe(0);
		expect(log.history()).toEqual([
			{ sequence: 1, timestamp: 1_000, event: staked(5n) },
			{ sequence: 2, timestamp: 1_010, event: { type: "withdrawn", account: ACCOUNT, amount: 2n } },
		]);
	});

	it("filters by type", () => {
		const log = new EventLog(new FakeClock());
		log.record(staked(1n));
		log.record({ type: "reward_paid", account: ACCOUNT, token: TOKEN, amount: 3n });
		log.flush();
		const paid = log.ofType("reward_paid");
		expect(paid).toHaveLength(1);
		expect(paid[0]?.token).toBe(TOKEN);
	});

	it("delivers to typed and wildcard subscribers until unsubscribed", () => {
		const log = new EventLog(new FakeClock());
		const typed: bigint[] = [];
		const all: string[] = [];
		const stop = log.on("staked", (event) => typed.push(event.amount));
		log.onAny((event) => all.push(event.type));

		log.record(staked(4n));
		log.record({ type: "deposits_paused", by: ACCOUNT });
		log.flush();
		stop();
		log.record(staked(9n));
		log.flush();

		expect(typed).toEqual([4n]);
		expect(all).toEqual(["staked", "deposits_paused", "staked"]);
	});

	it("keeps delivering when a subscriber throws and logs the failure", () => {
		const lines: string[] = [];
		const logger = createLogger({ level: "error", destination: { write: (l) => lines.push(l) } });
		const log = new EventLog(new FakeClock(), logger);
		const seen: number[] = [];
		log.onAny(() => {
			throw new Error("subscriber bug");
		});
		log.onAny((_event, record) => seen.push(record.sequence));

		log.record(staked(1n));
		log.flush();

		expect(seen).toEqual([1]);
		expect(lines).toHaveLength(1);
		expect(JSON.parse(lines[0] ?? "{}").msg).toBe("event subscriber threw");
	});

	it("drops buffered events of a rolled-back unit of work", () => {
		const log = new EventLog(new FakeClock());
		const uow = new UnitOfWork();
		uow.register("events", log);
		uow.onCommit(() => log.flush());

		uow.run("ok", () => {
			log.record(staked(1n));
			return ok(undefined);
		});
		uow.run("fails", () => {
			log.record(staked(2n));
			return err(new InvalidInputError("rejected"));
		});

		expect(log.ofType("staked").map((e) => e.amount)).toEqual([1n]);
		expect(log.pendingCount).toBe(0);
	});
});
