import { Response } from 'express';
import { GatewayMiddleware, GatewayContext, NextFunction } from './types';
import { RateLimiter, RateLimitRejection } from '../rate-limiters/types';

// =================================================================
// RATE LIMIT MIDDLEWARE
// =================================================================
// Asks the limiter for a decision. On rejection it answers the
// client itself and does NOT call next(): the proxy never runs, so
// a rejected request never reaches the backend.
//
//   rate-exceeded       → 429 + Retry-After
//   method-not-allowed  → 405
//   store-unavailable   → 503
// =================================================================

export function tooManyRequestsDetail(limit: number, windowSeconds: number, retryAfter: number): string {
    return `Too Many Requests. Limit: ${limit} per ${windowSeconds}s. Please retry after ${retryAfter} seconds.`;
}

export class RateLimitMiddleware implements GatewayMiddleware {
    name = 'rate-limit';

    constructor(private limiter: RateLimiter) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { req, res, clientKey } = ctx;

        const decision = await this.limiter.evaluate(clientKey, req.method);
        ctx.decision = decision;

        if (decision.allowed) {
            ctx.stage = 'rate-checked';
            if (decision.limit !== null) {
                res.setHeader('X-RateLimit-Limit', String(decision.limit));
            }
            if (decision.remaining !== null) {
                res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
            }
            await next();
            return;
        }

        ctx.stage = 'rejected';
        reject(res, decision);
    }
}

function reject(res: Response, decision: RateLimitRejection): void {
    switch (decision.reason) {
        case 'rate-exceeded':
            res.setHeader('Retry-After', String(decision.retryAfter));
            res.setHeader('X-RateLimit-Limit', String(decision.limit));
            res.setHeader('X-RateLimit-Remaining', '0');
            res.status(429).json({
                detail: tooManyRequestsDetail(decision.limit, decision.windowSeconds, decision.retryAfter),
            });
            return;
        case 'method-not-allowed':
            res.status(405).json({ detail: `Method ${decision.method} is not allowed` });
            return;
        case 'store-unavailable':
            res.status(503).json({ detail: 'Rate limiter unavailable' });
            return;
    }
}
