/**
 * JournaledMap — a Map whose writes inside a unit of work are undoable.
 *
 * Each write records the previous value of its key with the running
 * UnitOfWork, so rolling back costs one step per key touched rather than
 * a copy of the whole map. Writes outside a run are permanent.
 */

import type { UnitOfWork } from "./unit-of-work.js";

export class JournaledMap<K, V extends NonNullable<unknown>> implements Iterable<[K, V]> {
	private readonly store = new Map<K, V>();

	constructor(private readonly uow: UnitOfWork) {}

	get size(): number {
		return this.store.size;
	}

	get(key: K): V | undefined {
		return this.store.get(key);
	}

	has(key: K): boolean {
		return this.store.has(key);
	}

	set(key: K, value: V): this {
		this.remember(key);
		this.store.set(key, value);
		return this;
	}

	delete(key: K): boolean {
		if (!this.store.has(key)) return false;
		this.remember(key);
		return this.store.delete(key);
	}

	keys(): IterableIterator<K> {
		return this.store.keys();
	}

	values(): IterableIterator<V> {
		return this.store.values();
	}

	entries(): IterableIterator<[K, V]> {
		return this.store.entries();
	}

	[Symbol.iterator](): IterableIterator<[K, V]> {
		return this.store.entries();
	}

	private remember(key: K): void {
		if (!this.uow.active) return;
		const previous = this.store.get(key);
		// Undo writes go straight to the store so they are not journaled again.
		this.uow.journal(
			previous === undefined
				? () => this.store.delete(key)
				: () => this.store.set(key, previous),
		);
	}
}
