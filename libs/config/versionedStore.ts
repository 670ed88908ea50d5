/**
 * Versioned key → value store backing the tenant configuration cache.
 *
 * - Entries are replaced whole, never mutated in place.
 * - Every eviction bumps the key's generation; a write carries the
 *   generation observed before its fetch started and is dropped when the
 *   key has been evicted (or the store cleared) since.
 * - Eviction markers are bounded like the entries. A marker pushed out
 *   raises a floor every unmarked key's generation starts from, so a write
 *   begun before the dropped eviction is still rejected.
 * - Expiry, when configured, is handled by the LRU itself.
 */

import { LRUCache } from 'lru-cache';

export interface VersionedEntry<T> {
    readonly value: T;
    /** Monotonic across the store */
    readonly version: number;
    readonly storedAt: string;
}

export interface VersionedStoreOptions {
    /** Maximum number of entries retained */
    maxEntries?: number;
    /** Entry lifetime in milliseconds; no expiry when absent */
    ttlMs?: number;
}

const DEFAULT_MAX_ENTRIES = 1000;

export class VersionedStore<T extends object> {
    private readonly cache: LRUCache<string, VersionedEntry<T>>;
    private readonly invalidatedAt: LRUCache<string, number>;
    private readonly maxMarkers: number;
    private retiredAt = 0;
    private clearedAt = 0;
    private counter = 0;

    constructor(options: VersionedStoreOptions = {}) {
        const max = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
        this.cache = new LRUCache<string, VersionedEntry<T>>({
            max,
            ...(options.ttlMs !== undefined && options.ttlMs > 0 ? { ttl: options.ttlMs } : {})
        });
        this.invalidatedAt = new LRUCache<string, number>({ max });
        this.maxMarkers = max;
    }

    public get(key: string): VersionedEntry<T> | undefined {
        return this.cache.get(key);
    }

    public has(key: string): boolean {
        return this.cache.has(key);
    }

    /**
     * Token to hand back to put(); changes whenever the key is invalidated.
     */
    public generation(key: string): number {
        return Math.max(this.invalidatedAt.get(key) ?? this.retiredAt, this.clearedAt);
    }

    /**
     * Stores the value unless the key was invalidated after `generation`
     * was taken. Returns whether the write happened.
     */
    public put(key: string, value: T, generation: number): boolean {
        if (this.generation(key) !== generation) {
            return false;
        }
        this.cache.set(key, Object.freeze({
            value,
            version: ++this.counter,
            storedAt: new Date().toISOString()
        }));
        return true;
    }

    public evict(key: string): boolean {
        if (!this.invalidatedAt.has(key) && this.invalidatedAt.size >= this.maxMarkers) {
            this.retiredAt = Math.max(this.retiredAt, this.invalidatedAt.pop() ?? 0);
        }
        this.invalidatedAt.set(key, ++this.counter);
        return this.cache.delete(key);
    }

    public clear(): void {
        this.clearedAt = ++this.counter;
        this.retiredAt = 0;
        this.invalidatedAt.clear();
        this.cache.clear();
    }

    public get size(): number {
        return this.cache.size;
    }

    /** Number of eviction markers currently held. */
    public get trackedEvictions(): number {
        return this.invalidatedAt.size;
    }
}
