import { CountingStore } from './types';

// =================================================================
// IN-MEMORY COUNTING STORE
// =================================================================
// Same contract as the Redis store, for local development and tests.
// Counts live in this process only: two gateway instances using it
// each see half the traffic and together admit twice the limit.
// =================================================================

interface Counter {
    count: number;
    expiresAt: number;
}

export class InMemoryCountingStore implements CountingStore {
    name = 'memory';
    private counters: Map<string, Counter> = new Map();

    constructor(private now: () => number = Date.now) {}

    async incrementAndGet(key: string, windowSeconds: number): Promise<number> {
        const now = this.now();
        let counter = this.counters.get(key);

        if (!counter || now >= counter.expiresAt) {
            this.cleanup(now);
            counter = { count: 0, expiresAt: now + windowSeconds * 1000 };
            this.counters.set(key, counter);
        }

        counter.count++;
        return counter.count;
    }

    async ping(): Promise<void> {}

    async disconnect(): Promise<void> {
        this.counters.clear();
    }

    private cleanup(now: number): void {
        for (const [key, counter] of this.counters) {
            if (now >= counter.expiresAt) {
                this.counters.delete(key);
            }
        }
    }
}
