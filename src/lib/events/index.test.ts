import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type TestEvents = {
	staked: (account: string, amount: bigint) => void;
	flushed: () => void;
};

describe("TypedEmitter", () => {
	it("delivers typed arguments to on() handlers", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("staked", handler);
		emitter.emit("staked", "0xabc", 5n);

		expect(handler).toHaveBeenCalledWith("0xabc", 5n);
	});

	it("off() detaches a handler", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("flushed", handler);
		emitter.off("flushed", handler);
		emitter.emit("flushed");

		expect(handler).not.toHaveBeenCalled();
	});

	it("once() fires a single time", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.once("flushed", handler);
		emitter.emit("flushed");
		emitter.emit("flushed");

		expect(handler).toHaveBeenCalledTimes(1);
	});

	it("reports listener counts and clears them", () => {
		const emitter = new TypedEmitter<TestEvents>();
		emitter.on("flushed", () => {});
		emitter.on("flushed", () => {});
		expect(emitter.listenerCount("flushed")).toBe(2);

		emitter.removeAllListeners();
		expect(emitter.listenerCount("flushed")).toBe(0);
	});

	it("emit() returns false without listeners", () => {
		const emitter = new TypedEmitter<TestEvents>();
		expect(emitter.emit("flushed")).toBe(false);
	});
});
