/**
 * @fileoverview Aggregate Cache
 *
 * Caches computed aggregates keyed by the identity of the input record set
 * plus the requested dimension, so repeated report requests over the same
 * data reuse earlier work.
 *
 * ## Guarantees
 * - At most one computation per (record set, dimension) while an entry is
 *   live: concurrent callers share the same in-flight promise.
 * - Entries expire after the TTL (AGGREGATE_CACHE_TTL by default). Every
 *   miss sweeps out expired entries, and the oldest entries are dropped once
 *   more than maxEntries are held.
 * - A failed computation is evicted so the next request retries it.
 *
 * Record sets are identified by reference, through a WeakMap, so a cached
 * entry never keeps a discarded record set alive through its key.
 */

import { AGGREGATE_CACHE_MAX_ENTRIES, AGGREGATE_CACHE_TTL } from './constants.js';
import { createLogger } from './logger.js';

const log = createLogger('AggregateCache');

/**
 * Cache entry for one (record set, dimension) pair.
 *
 * @property key - `${recordSetId}:${dimension}`
 * @property timestamp - When the computation started (ms since epoch)
 * @property value - The shared computation
 */
interface CacheEntry<T> {
    key: string;
    timestamp: number;
    value: Promise<T>;
}

export interface AggregateCacheOptions {
    /** Entry lifetime in ms; 0 disables expiry */
    ttlMs?: number;
    /** Entry limit; the oldest entries go first */
    maxEntries?: number;
    /** Clock, injectable for tests */
    now?: () => number;
}

export interface CacheStats {
    hits: number;
    misses: number;
    size: number;
}

export class AggregateCache<T> {
    private readonly entries = new Map<string, CacheEntry<T>>();
    private readonly ids = new WeakMap<object, number>();
    private nextId = 1;
    private readonly ttlMs: number;
    private readonly maxEntries: number;
    private readonly now: () => number;
    private hits = 0;
    private misses = 0;

    constructor(options: AggregateCacheOptions = {}) {
        this.ttlMs = options.ttlMs ?? AGGREGATE_CACHE_TTL;
        this.maxEntries = Math.max(1, options.maxEntries ?? AGGREGATE_CACHE_MAX_ENTRIES);
        this.now = options.now ?? Date.now;
    }

    /**
     * Builds the cache key from the record set's identity and the dimension.
     */
    getCacheKey(source: object, dimension: string): string {
        let id = this.ids.get(source);
        if (id === undefined) {
            id = this.nextId++;
            this.ids.set(source, id);
        }
        return `${id}:${dimension}`;
    }

    private isExpired(entry: CacheEntry<T>): boolean {
        return this.ttlMs > 0 && this.now() - entry.timestamp > this.ttlMs;
    }

    /**
     * Drops expired entries, then the oldest ones until there is room for one more.
     * Map iteration follows insertion order, so the first keys are the oldest.
     */
    private prune(): void {
        for (const [key, entry] of this.entries) {
            if (this.isExpired(entry)) this.entries.delete(key);
        }
        for (const key of this.entries.keys()) {
            if (this.entries.size < this.maxEntries) break;
            this.entries.delete(key);
        }
    }

    /**
     * Returns the cached value for (source, dimension), computing it once if
     * absent or expired.
     *
     * @param source - The input record set (compared by reference).
     * @param dimension - The requested dimension.
     * @param compute - Produces the value on a miss.
     */
    getOrCompute(source: object, dimension: string, compute: () => Promise<T> | T): Promise<T> {
        const key = this.getCacheKey(source, dimension);
        const cached = this.entries.get(key);
        if (cached && !this.isExpired(cached)) {
            this.hits++;
            return cached.value;
        }

        this.misses++;
        log.debug(`Computing ${dimension} (key ${key})`);

        // Run compute inside the promise so a synchronous throw becomes a rejection.
        const value = new Promise<T>((resolve) => resolve(compute()));
        const entry: CacheEntry<T> = { key, timestamp: this.now(), value };
        this.entries.delete(key);
        this.prune();
        this.entries.set(key, entry);

        value.catch((error: unknown) => {
            if (this.entries.get(key) === entry) {
                this.entries.delete(key);
            }
            log.debug(`Evicted failed computation for ${key}`, error);
        });

        return value;
    }

    /**
     * True when a live entry exists for (source, dimension).
     */
    has(source: object, dimension: string): boolean {
        const entry = this.entries.get(this.getCacheKey(source, dimension));
        return entry !== undefined && !this.isExpired(entry);
    }

    /**
     * Drops every entry for a record set, or everything when none is given.
     */
    invalidate(source?: object): void {
        if (!source) {
            this.entries.clear();
            return;
        }
        const id = this.ids.get(source);
        if (id === undefined) return;
        for (const key of this.entries.keys()) {
            if (key.startsWith(`${id}:`)) this.entries.delete(key);
        }
    }

    stats(): CacheStats {
        return { hits: this.hits, misses: this.misses, size: this.entries.size };
    }
}
