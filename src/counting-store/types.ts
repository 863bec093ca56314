// =================================================================
// Counting Store: shared, atomically incremented, expiring counters
// =================================================================

export interface CountingStore {
    /** Store kind (for logs and the health endpoint) */
    name: string;

    /**
     * Increment `key` and return the new count. When this call creates
     * the key it also expires after `windowSeconds`, in the same atomic
     * step. Rejects with StoreUnavailableError when the store fails.
     */
    incrementAndGet(key: string, windowSeconds: number): Promise<number>;

    /** Resolves when the store answers, rejects otherwise */
    ping(): Promise<void>;

    /** Release connections on shutdown */
    disconnect(): Promise<void>;
}
