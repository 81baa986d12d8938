/**
 * In-Memory Response Cache
 * 
 * Bounded, worker-private implementation of IResponseCache.
 * Every operation runs under one mutex so a lookup never observes a half-done eviction.
 */

import { createHash } from 'crypto';
import { IResponseCache } from '../../interfaces/IResponseCache';
import { normalizePrompt } from '../../PromptClassifier';
import { Mutex } from '../../utils/Mutex';

export const DEFAULT_CACHE_MAX_SIZE = 1000;

export class InMemoryResponseCache implements IResponseCache {
    private cache: Map<string, string> = new Map();
    private mutex = new Mutex();
    private evictions = 0;

    constructor(private readonly maxSize: number = DEFAULT_CACHE_MAX_SIZE) {
        if (!Number.isInteger(maxSize) || maxSize < 1) {
            throw new Error(`Cache max size must be a positive integer, got ${maxSize}`);
        }
    }

    keyFor(prompt: string): string {
        return createHash('sha256').update(normalizePrompt(prompt)).digest('hex');
    }

    async get(key: string): Promise<string | null> {
        return this.mutex.runExclusive(() => this.cache.get(key) ?? null);
    }

    async set(key: string, value: string): Promise<void> {
        await this.mutex.runExclusive(() => {
            this.cache.set(key, value);
            if (this.cache.size > this.maxSize) {
                this.evictOldest();
            }
        });
    }

    async size(): Promise<number> {
        return this.mutex.runExclusive(() => this.cache.size);
    }

    async keys(): Promise<string[]> {
        return this.mutex.runExclusive(() => Array.from(this.cache.keys()));
    }

    async clear(): Promise<void> {
        await this.mutex.runExclusive(() => this.cache.clear());
    }

    /**
     * Number of eviction passes run so far
     */
    getEvictionCount(): number {
        return this.evictions;
    }

    /**
     * Drop the oldest entries (insertion order), keeping the newest half
     */
    private evictOldest(): void {
        const keep = Math.max(1, Math.floor(this.maxSize / 2));
        const keysToDelete = Array.from(this.cache.keys()).slice(0, this.cache.size - keep);

        for (const key of keysToDelete) {
            this.cache.delete(key);
        }
        this.evictions++;
    }
}
