import { CountingStore } from './types';
import { RedisCountingStore } from './redis-counting-store';
import { InMemoryCountingStore } from './in-memory-counting-store';

export type { CountingStore } from './types';
export { RedisCountingStore } from './redis-counting-store';
export { InMemoryCountingStore } from './in-memory-counting-store';

export interface CountingStoreConfig {
    redisUrl: string;
    storeTimeoutMs: number;
}

/**
 * Redis when a URL is configured (startup fails if it is unreachable),
 * otherwise the in-memory store.
 */
export async function createCountingStore(config: CountingStoreConfig): Promise<CountingStore> {
    if (!config.redisUrl) {
        console.warn('No REDIS_URL configured: using in-memory counting store (limits are per process)');
        return new InMemoryCountingStore();
    }

    const store = RedisCountingStore.fromUrl(config.redisUrl, { commandTimeoutMs: config.storeTimeoutMs });
    await store.connect();
    console.log(`Connected to Redis at ${redactUrl(config.redisUrl)}`);
    return store;
}

function redactUrl(raw: string): string {
    const url = new URL(raw);
    if (url.password) url.password = '***';
    return url.toString();
}
