/**
 * UnitOfWork — all-or-nothing execution of protocol operations.
 *
 * Two kinds of state take part. Small participants are snapshotted before
 * every `run`. Large keyed state journals the inverse of each write into
 * the current run's frame (see JournaledMap). When the wrapped function
 * returns an error or throws, the frame is replayed in reverse and every
 * snapshot is restored.
 * Nested runs act as savepoints: an inner failure rolls back only the
 * inner work, and the outer run decides what happens to the rest.
 * A committed inner frame is handed to its parent, so a later outer
 * failure still undoes it. Commit hooks (event publication) fire once,
 * when the outermost run succeeds.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { type ProtocolError, classifyError } from "../shared/errors.js";
import { type Result, err } from "../shared/result.js";
import type { Snapshottable } from "./types.js";

interface Participant {
	readonly name: string;
	/** Captures current state and returns the function that restores it. */
	capture(): () => void;
}

export class UnitOfWork {
	private readonly participants: Participant[] = [];
	private readonly commitHooks: Array<() => void> = [];
	/** Undo steps per open run, innermost last */
	private readonly frames: Array<Array<() => void>> = [];

	constructor(private readonly logger: Logger = silentLogger()) {}

	register<S>(name: string, component: Snapshottable<S>): void {
		if (this.active) {
			throw new Error(`UnitOfWork: cannot register "${name}" while a unit of work is running`);
		}
		this.participants.push({
			name,
			capture: () => {
				const state = component.snapshot();
				return () => component.restore(state);
			},
		});
	}

	/** Hook invoked after the outermost run commits. */
	onCommit(hook: () => void): void {
		this.commitHooks.push(hook);
	}

	/** True while any run is executing. */
	get active(): boolean {
		return this.frames.length > 0;
	}

	/** Record how to undo a write made inside the current run. */
	journal(undo: () => void): void {
		this.frames[this.frames.length - 1]?.push(undo);
	}

	/**
	 * Execute `fn` atomically.
	 * Thrown exceptions are classified (non-protocol errors become
	 * ExternalCallError) and returned, never rethrown.
	 */
	run<T, E extends ProtocolError>(
		label: string,
		fn: () => Result<T, E>,
	): Result<T, E | ProtocolError> {
		const restorers = this.participants.map((p) => p.capture());
		const frame: Array<() => void> = [];
		this.frames.push(frame);

		let result: Result<T, E | ProtocolError>;
		try {
			result = fn();
		} catch (thrown: unknown) {
			result = err(classifyError(thrown));
		} finally {
			this.frames.pop();
		}

		if (!result.ok) {
			for (let i = frame.length - 1; i >= 0; i--) {
				frame[i]?.();
			}
			for (let i = restorers.length - 1; i >= 0; i--) {
				restorers[i]?.();
			}
			this.logger.warn(
				{ operation: label, code: result.error.code, nested: this.active },
				`rolled back: ${result.error.message}`,
			);
			return result;
		}

		const parent = this.frames[this.frames.length - 1];
		if (parent) {
			for (const undo of frame) parent.push(undo);
		} else {
			this.logger.debug({ operation: label }, "committed");
			for (const hook of this.commitHooks) hook();
		}
		return result;
	}
}
