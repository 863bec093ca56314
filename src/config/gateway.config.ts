import { ConfigError } from '../errors';

// =================================================================
// GATEWAY CONFIGURATION
// =================================================================
// Read once from the environment at startup. Nothing here changes
// while the process runs.
//
//   RATE_LIMITS=GET:5,POST:5,PUT:5,DELETE:5
//   RATE_LIMIT_WINDOW_SECONDS=60
//
// gives every client 5 GETs, 5 POSTs, ... per fixed 60s window.
// =================================================================

/** What to do with a method that has no entry in `limits`. */
export type UnlistedMethodPolicy = 'allow' | 'reject';

/**
 * What to do when the counting store cannot be reached.
 * `open` admits the request, `closed` rejects it with 503.
 */
export type StoreFailurePolicy = 'open' | 'closed';

export interface RateLimitConfig {
    /** Max requests per window, keyed by upper-case HTTP method */
    limits: Readonly<Record<string, number>>;
    windowSeconds: number;
    keyPrefix: string;
    unlistedMethodPolicy: UnlistedMethodPolicy;
    storeFailurePolicy: StoreFailurePolicy;
}

export interface GatewayConfig {
    port: number;
    backendUrl: string;
    /** Empty means the single-process in-memory store */
    redisUrl: string;
    storeTimeoutMs: number;
    rateLimit: RateLimitConfig;
    maxConcurrentRequests: number;
    backendTimeoutMs: number;
    healthTimeoutMs: number;
    bodyLimitBytes: number;
    corsOrigins: string[];
    trustProxy: boolean;
}

export const DEFAULT_RATE_LIMITS = 'GET:5,POST:5,PUT:5,DELETE:5';

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): GatewayConfig {
    return {
        port: readInteger(env, 'PORT', 4000, 0),
        backendUrl: readUrl(env, 'BACKEND_URL', 'http://127.0.0.1:8001'),
        redisUrl: (env.REDIS_URL ?? '').trim(),
        storeTimeoutMs: readInteger(env, 'STORE_TIMEOUT_MS', 1000, 1),
        rateLimit: {
            limits: parseRateLimits(env.RATE_LIMITS ?? DEFAULT_RATE_LIMITS),
            windowSeconds: readInteger(env, 'RATE_LIMIT_WINDOW_SECONDS', 60, 1),
            keyPrefix: env.RATE_LIMIT_KEY_PREFIX || 'ratelimit',
            unlistedMethodPolicy: readChoice(env, 'UNLISTED_METHOD_POLICY', ['allow', 'reject'], 'allow'),
            storeFailurePolicy: readChoice(env, 'STORE_FAILURE_POLICY', ['open', 'closed'], 'open'),
        },
        maxConcurrentRequests: readInteger(env, 'MAX_CONCURRENT_REQUESTS', 5, 1),
        backendTimeoutMs: readInteger(env, 'BACKEND_TIMEOUT_MS', 5000, 1),
        healthTimeoutMs: readInteger(env, 'HEALTH_TIMEOUT_MS', 2000, 1),
        bodyLimitBytes: readInteger(env, 'BODY_LIMIT_BYTES', 10 * 1024 * 1024, 0),
        corsOrigins: (env.CORS_ORIGINS ?? '*').split(',').map(o => o.trim()).filter(Boolean),
        trustProxy: env.TRUST_PROXY === 'true',
    };
}

/**
 * Parse `METHOD:limit` pairs separated by commas.
 * Methods are upper-cased; limits must be positive integers.
 */
export function parseRateLimits(raw: string): Record<string, number> {
    const limits: Record<string, number> = {};

    for (const entry of raw.split(',')) {
        const trimmed = entry.trim();
        if (!trimmed) continue;

        const [method, value, ...rest] = trimmed.split(':');
        if (!method || value === undefined || rest.length > 0) {
            throw new ConfigError('RATE_LIMITS', `expected METHOD:limit, got "${trimmed}"`);
        }

        const limit = Number(value.trim());
        if (!Number.isInteger(limit) || limit < 1) {
            throw new ConfigError('RATE_LIMITS', `limit for ${method.trim()} must be a positive integer`);
        }

        limits[method.trim().toUpperCase()] = limit;
    }

    return limits;
}

function readInteger(env: Env, name: string, fallback: number, min: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigError(name, `expected an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

function readUrl(env: Env, name: string, fallback: string): string {
    const raw = env[name] || fallback;

    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        throw new ConfigError(name, `"${raw}" is not a valid URL`);
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ConfigError(name, `unsupported protocol ${url.protocol}`);
    }
    return raw;
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;

    const match = choices.find(choice => choice === raw.toLowerCase());
    if (!match) {
        throw new ConfigError(name, `expected one of ${choices.join(', ')}, got "${raw}"`);
    }
    return match;
}
