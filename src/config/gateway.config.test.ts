import { describe, it, expect } from 'vitest';
import { loadConfig, parseRateLimits } from './gateway.config';
import { ConfigError } from '../errors';

describe('loadConfig', () => {
    it('falls back to defaults for an empty environment', () => {
        const config = loadConfig({});

        expect(config.port).toBe(4000);
        expect(config.backendUrl).toBe('http://127.0.0.1:8001');
        expect(config.redisUrl).toBe('');
        expect(config.maxConcurrentRequests).toBe(5);
        expect(config.backendTimeoutMs).toBe(5000);
        expect(config.rateLimit).toEqual({
            limits: { GET: 5, POST: 5, PUT: 5, DELETE: 5 },
            windowSeconds: 60,
            keyPrefix: 'ratelimit',
            unlistedMethodPolicy: 'allow',
            storeFailurePolicy: 'open',
        });
        expect(config.corsOrigins).toEqual(['*']);
        expect(config.trustProxy).toBe(false);
    });

    it('reads overrides from the environment', () => {
        const config = loadConfig({
            PORT: '8080',
            BACKEND_URL: 'https://backend.internal:9443/api',
            REDIS_URL: ' redis://cache:6379/1 ',
            RATE_LIMITS: 'get:10,patch:2',
            RATE_LIMIT_WINDOW_SECONDS: '30',
            UNLISTED_METHOD_POLICY: 'REJECT',
            STORE_FAILURE_POLICY: 'closed',
            MAX_CONCURRENT_REQUESTS: '20',
            CORS_ORIGINS: 'https://a.example, https://b.example',
            TRUST_PROXY: 'true',
        });

        expect(config.port).toBe(8080);
        expect(config.backendUrl).toBe('https://backend.internal:9443/api');
        expect(config.redisUrl).toBe('redis://cache:6379/1');
        expect(config.rateLimit.limits).toEqual({ GET: 10, PATCH: 2 });
        expect(config.rateLimit.windowSeconds).toBe(30);
        expect(config.rateLimit.unlistedMethodPolicy).toBe('reject');
        expect(config.rateLimit.storeFailurePolicy).toBe('closed');
        expect(config.maxConcurrentRequests).toBe(20);
        expect(config.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
        expect(config.trustProxy).toBe(true);
    });

    it('rejects a zero concurrency cap', () => {
        expect(() => loadConfig({ MAX_CONCURRENT_REQUESTS: '0' })).toThrow(ConfigError);
    });

    it('rejects a backend URL that is not http(s)', () => {
        expect(() => loadConfig({ BACKEND_URL: 'ftp://files.internal' }))
            .toThrow('BACKEND_URL: unsupported protocol ftp:');
    });

    it('rejects an unknown store failure policy', () => {
        expect(() => loadConfig({ STORE_FAILURE_POLICY: 'maybe' }))
            .toThrow('STORE_FAILURE_POLICY: expected one of open, closed, got "maybe"');
    });
});

describe('parseRateLimits', () => {
    it('ignores blank entries and surrounding whitespace', () => {
        expect(parseRateLimits(' GET : 3 ,, POST:1 ')).toEqual({ GET: 3, POST: 1 });
    });

    it('rejects entries without a limit', () => {
        expect(() => parseRateLimits('GET')).toThrow('RATE_LIMITS: expected METHOD:limit, got "GET"');
    });

    it('rejects non-positive limits', () => {
        expect(() => parseRateLimits('GET:0')).toThrow('RATE_LIMITS: limit for GET must be a positive integer');
    });
});
