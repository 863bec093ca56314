import { RateLimitDecision, RateLimiter } from './types';
import { CountingStore } from '../counting-store';
import { RateLimitConfig } from '../config';
import { GatewayMetrics } from '../metrics/gateway-metrics';
import { errorMessage } from '../errors';

// =================================================================
// FIXED WINDOW RATE LIMITER
// =================================================================
//
// HOW IT WORKS:
//   Divide time into fixed windows aligned to the epoch.
//   Count requests per (client, method, window). Reset at the boundary.
//
//   Window 10:00-10:01: [■■■■■     ] 5/5  → allowed
//   Window 10:00-10:01: [■■■■■■    ] 6/5  → rejected
//   Window 10:01-10:02: [■         ] 1/5  → allowed
//
// IMPLEMENTATION:
//   Key: "<prefix>:<clientIP>:<METHOD>:<windowNumber>"
//   windowNumber = Math.floor(unixSeconds / windowSeconds)
//   The count lives in the shared counting store, never in this
//   process, so every gateway instance sees the same number.
//
// BOUNDARY BURST (accepted):
//   5 requests at 10:00:59 and 5 more at 10:01:00 all pass.
//   A client can reach 2x the limit across one boundary.
// =================================================================

export class FixedWindowRateLimiter implements RateLimiter {
    name = 'fixed-window';

    constructor(
        private store: CountingStore,
        private config: RateLimitConfig,
        private metrics: GatewayMetrics,
        private now: () => number = Date.now,
    ) {}

    async evaluate(identity: string, method: string): Promise<RateLimitDecision> {
        this.metrics.recordProcessed();

        const decision = await this.decide(identity, method.toUpperCase());
        if (!decision.allowed) {
            this.metrics.recordBlocked();
        }
        return decision;
    }

    /** Store key for this client and method in the current window */
    keyFor(identity: string, method: string): string {
        const windowNumber = Math.floor(this.now() / 1000 / this.config.windowSeconds);
        return `${this.config.keyPrefix}:${identity}:${method}:${windowNumber}`;
    }

    private async decide(identity: string, method: string): Promise<RateLimitDecision> {
        const limit = this.config.limits[method];

        if (limit === undefined) {
            if (this.config.unlistedMethodPolicy === 'reject') {
                return { allowed: false, reason: 'method-not-allowed', method };
            }
            return { allowed: true, limit: null, remaining: null };
        }

        const { windowSeconds } = this.config;
        let count: number;

        try {
            count = await this.store.incrementAndGet(this.keyFor(identity, method), windowSeconds);
        } catch (err) {
            if (this.config.storeFailurePolicy === 'closed') {
                console.error(`[rate-limit] store unavailable, rejecting ${method} from ${identity}: ${errorMessage(err)}`);
                return { allowed: false, reason: 'store-unavailable' };
            }
            console.warn(`[rate-limit] store unavailable, admitting ${method} from ${identity}: ${errorMessage(err)}`);
            return { allowed: true, limit: null, remaining: null };
        }

        if (count > limit) {
            return {
                allowed: false,
                reason: 'rate-exceeded',
                limit,
                windowSeconds,
                retryAfter: windowSeconds,
            };
        }

        return {
            allowed: true,
            limit,
            remaining: limit - count,
        };
    }
}
