import { EventEmitter } from "eventemitter3";

/**
 * Event map: keys are channel names, values are handler signatures.
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/**
 * Type-safe event emitter over eventemitter3.
 *
 * @example
 * ```ts
 * type Events = { committed: (count: number) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("committed", (n) => n.toFixed());
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler);
		return this;
	}

	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	removeAllListeners(): this {
		this.ee.removeAllListeners();
		return this;
	}
}
