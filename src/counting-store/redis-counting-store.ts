import Redis from 'ioredis';
import { CountingStore } from './types';
import { StoreUnavailableError, errorMessage } from '../errors';

// =================================================================
// REDIS COUNTING STORE
// =================================================================
//
// Every gateway instance talks to the same Redis, so a client's
// count is shared no matter which instance it hits.
//
// INCR and EXPIRE run inside one Lua script. Issued as two commands,
// two instances could both see a fresh key and both set the TTL,
// pushing the window's expiry forward every time.
//
//   INCR ratelimit:10.0.0.1:GET:29034551  → 1  → EXPIRE 60
//   INCR ratelimit:10.0.0.1:GET:29034551  → 2  (TTL untouched)
// =================================================================

const INCREMENT_WITH_EXPIRY = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
    redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return count
`;

export interface RedisCountingStoreOptions {
    /** Per-command timeout, so a hung Redis fails fast */
    commandTimeoutMs: number;
}

export class RedisCountingStore implements CountingStore {
    name = 'redis';

    constructor(private client: Redis) {
        this.client.on('error', (err: Error) => {
            console.error(`[store:redis] connection error: ${err.message}`);
        });
    }

    static fromUrl(url: string, options: RedisCountingStoreOptions): RedisCountingStore {
        const client = new Redis(url, {
            lazyConnect: true,
            commandTimeout: options.commandTimeoutMs,
            maxRetriesPerRequest: 1,
            enableOfflineQueue: false,
            retryStrategy: (times: number) => Math.min(times * 100, 3000),
        });
        return new RedisCountingStore(client);
    }

    async connect(): Promise<void> {
        try {
            await this.client.connect();
            await this.client.ping();
        } catch (err) {
            this.client.disconnect();
            throw new StoreUnavailableError(`Failed to connect to Redis: ${errorMessage(err)}`, { cause: err });
        }
    }

    async incrementAndGet(key: string, windowSeconds: number): Promise<number> {
        let reply: unknown;
        try {
            reply = await this.client.eval(INCREMENT_WITH_EXPIRY, 1, key, windowSeconds);
        } catch (err) {
            throw new StoreUnavailableError(`Redis increment failed for ${key}: ${errorMessage(err)}`, { cause: err });
        }

        if (typeof reply !== 'number') {
            throw new StoreUnavailableError(`Redis returned a non-integer count for ${key}`);
        }
        return reply;
    }

    async ping(): Promise<void> {
        try {
            await this.client.ping();
        } catch (err) {
            throw new StoreUnavailableError(`Redis ping failed: ${errorMessage(err)}`, { cause: err });
        }
    }

    async disconnect(): Promise<void> {
        try {
            await this.client.quit();
        } catch (err) {
            console.error(`[store:redis] disconnect error: ${errorMessage(err)}`);
            this.client.disconnect();
        }
    }
}
