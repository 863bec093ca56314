// =================================================================
// Rate Limiter Interface
// =================================================================

export type RateLimitDecision =
    | {
        allowed: true;
        /** Limit for this method, null when none applies */
        limit: number | null;
        /** Requests left in the current window, null when unknown */
        remaining: number | null;
    }
    | {
        allowed: false;
        reason: 'rate-exceeded';
        limit: number;
        windowSeconds: number;
        /** Seconds the client should wait before retrying */
        retryAfter: number;
    }
    | {
        allowed: false;
        reason: 'method-not-allowed';
        method: string;
    }
    | {
        allowed: false;
        reason: 'store-unavailable';
    };

export type RateLimitRejection = Extract<RateLimitDecision, { allowed: false }>;

export interface RateLimiter {
    /** Decide whether `identity` may make one more `method` request */
    evaluate(identity: string, method: string): Promise<RateLimitDecision>;

    /** Algorithm name (for headers and logs) */
    name: string;
}
