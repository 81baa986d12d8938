/**
 * Response Cache Interface
 * 
 * Worker-local store of previously produced responses keyed by prompt hash.
 */

export interface IResponseCache {
    /**
     * Deterministic key for a prompt
     */
    keyFor(prompt: string): string;

    /**
     * Get cached response
     */
    get(key: string): Promise<string | null>;

    /**
     * Store a response, replacing any previous value for the key.
     * Evicts when the bound is exceeded.
     */
    set(key: string, value: string): Promise<void>;

    /**
     * Number of entries
     */
    size(): Promise<number>;

    /**
     * Keys in insertion order, oldest first
     */
    keys(): Promise<string[]>;

    /**
     * Remove all entries
     */
    clear(): Promise<void>;
}
