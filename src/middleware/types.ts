// =================================================================
// MIDDLEWARE TYPES
// =================================================================
//
// Every middleware receives a GatewayContext and a next() function.
//
// GatewayContext carries data between middleware:
//   - The Express req/res
//   - The client identity used for rate limiting and X-Forwarded-For
//   - How far the request got (stage), for the access log
//
// next() passes control to the next middleware in the chain.
// If a middleware doesn't call next(), the chain stops.
// This is how rate limiting rejects requests: it never calls next().
// =================================================================

import { Request, Response } from 'express';
import { RateLimitDecision } from '../rate-limiters/types';

//   received ─► rate-checked ─► admitted ─► forwarded ─► responded
//                    │              │
//                    ▼              ▼
//                 rejected        failed ─► responded
export type RequestStage =
    | 'received'
    | 'rate-checked'
    | 'rejected'
    | 'admitted'
    | 'forwarded'
    | 'failed'
    | 'responded';

export interface GatewayContext {
    req: Request;
    res: Response;
    startTime: number;

    clientKey: string;
    stage: RequestStage;

    // Set by the rate limit middleware
    decision?: RateLimitDecision;
    // Internal failure description, logged but never sent to the client
    failure?: string;
}

export type NextFunction = () => Promise<void>;

export interface GatewayMiddleware {
    name: string;
    handle(ctx: GatewayContext, next: NextFunction): Promise<void>;
}
