import type { Clock } from '../types.js';

export interface AsyncCacheOptions {
	/** Entries older than this are recomputed. Unset means no expiry. */
	ttlMs?: number;
	/** Oldest entries are evicted past this size. */
	maxEntries?: number;
	clock?: Clock;
}

interface Entry<V> {
	value: V;
	expiresAt: number;
}

/**
 * Get-or-compute cache for tool handlers shared across conversations.
 * Concurrent misses on one key share a single computation; failures are
 * not cached.
 */
export class AsyncCache<K, V> {
	private readonly entries = new Map<K, Entry<V>>();
	private readonly inFlight = new Map<K, Promise<V>>();
	private readonly ttlMs: number;
	private readonly maxEntries: number;
	private readonly clock: Clock;

	constructor(options: AsyncCacheOptions = {}) {
		this.ttlMs = options.ttlMs ?? Number.POSITIVE_INFINITY;
		this.maxEntries = options.maxEntries ?? 500;
		this.clock = options.clock ?? Date.now;
	}

	get size(): number {
		return this.entries.size;
	}

	peek(key: K): V | undefined {
		const entry = this.entries.get(key);
		if (!entry) return undefined;
		if (entry.expiresAt <= this.clock()) {
			this.entries.delete(key);
			return undefined;
		}
		return entry.value;
	}

	getOrCompute(key: K, compute: () => Promise<V>): Promise<V> {
		const entry = this.entries.get(key);
		if (entry && entry.expiresAt > this.clock()) {
			return Promise.resolve(entry.value);
		}

		const existing = this.inFlight.get(key);
		if (existing) return existing;

		const pending = compute()
			.then((value) => {
				this.store(key, value);
				return value;
			})
			.finally(() => {
				this.inFlight.delete(key);
			});

		this.inFlight.set(key, pending);
		return pending;
	}

	invalidate(key: K): void {
		this.entries.delete(key);
	}

	clear(): void {
		this.entries.clear();
	}

	private store(key: K, value: V): void {
		this.entries.delete(key);
		this.entries.set(key, { value, expiresAt: this.clock() + this.ttlMs });
		while (this.entries.size > this.maxEntries) {
			const oldest = this.entries.keys().next();
			if (oldest.done) break;
			this.entries.delete(oldest.value);
		}
	}
}
