/**
 * EventLog — buffered, typed record of protocol events.
 *
 * `record` buffers; `flush` stamps sequence numbers, appends to history and
 * notifies subscribers. The unit of work flushes on commit and truncates
 * the buffer on rollback through `snapshot`/`restore`.
 */

import type { Snapshottable } from "../transaction/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { Clock } from "../shared/time.js";
import {
	type EventOfType,
	type ProtocolEvent,
	type ProtocolEventType,
	isEventOfType,
} from "./protocol-events.js";

export interface EventRecord {
	readonly sequence: number;
	readonly timestamp: number;
	readonly event: ProtocolEvent;
}

type Channels = { published: (record: EventRecord) => void };

export class EventLog implements Snapshottable<number> {
	private readonly pending: Array<{ timestamp: number; event: ProtocolEvent }> = [];
	private readonly published: EventRecord[] = [];
	private readonly emitter = new TypedEmitter<Channels>();
	private nextSequence = 1;

	constructor(
		private readonly clock: Clock,
		private readonly logger: Logger = silentLogger(),
	) {}

	record(event: ProtocolEvent): void {
		this.pending.push({ timestamp: this.clock.now(), event });
	}

	/** Publish everything buffered so far. */
	flush(): void {
		const batch = this.pending.splice(0, this.pending.length);
		for (const { timestamp, event } of batch) {
			const record: EventRecord = { sequence: this.nextSequence++, timestamp, event };
			this.published.push(record);
			this.emitter.emit("published", record);
		}
	}

	/**
	 * Subscribe to one event type.
	 * @returns unsubscribe function
	 */
	on<K extends ProtocolEventType>(
		type: K,
		handler: (event: EventOfType<K>, record: EventRecord) => void,
	): () => void {
		return this.listen((record) => {
			const { event } = record;
			if (isEventOfType(event, type)) handler(event, record);
		});
	}

	/** Subscribe to every event. */
	onAny(handler: (event: ProtocolEvent, record: EventRecord) => void): () => void {
		return this.listen((record) => handler(record.event, record));
	}

	history(): readonly EventRecord[] {
		return this.published;
	}

	ofType<K extends ProtocolEventType>(type: K): EventOfType<K>[] {
		const matches: EventOfType<K>[] = [];
		for (const { event } of this.published) {
			if (isEventOfType(event, type)) matches.push(event);
		}
		return matches;
	}

	get pendingCount(): number {
		return this.pending.length;
	}

	// ── Unit-of-work participation ─────────────────────────────────

	snapshot(): number {
		return this.pending.length;
	}

	restore(length: number): void {
		this.pending.length = length;
	}

	// ── Internal ──────────────────────────────────────────────────

	private listen(listener: (record: EventRecord) => void): () => void {
		// A throwing subscriber must not stop delivery to the others.
		const guarded = (record: EventRecord): void => {
			try {
				listener(record);
			} catch (error: unknown) {
				this.logger.error(
					{ err: error, type: record.event.type, sequence: record.sequence },
					"event subscriber threw",
				);
			}
		};
		this.emitter.on("published", guarded);
		return () => {
			this.emitter.off("published", guarded);
		};
	}
}
