import { GatewayContext, GatewayMiddleware } from './types';
import { Request, Response } from 'express';
import { errorMessage } from '../errors';

// =================================================================
// MIDDLEWARE PIPELINE
// =================================================================
//
// Chains middleware together in order.
// Each middleware calls next() to continue, or doesn't to stop.
//
//   pipeline.use(logger);     // 1st
//   pipeline.use(cors);       // 2nd
//   pipeline.use(rateLimit);  // 3rd, might stop here (429/405/503)
//   pipeline.use(proxy);      // 4th, final destination
//
// The order MATTERS:
//   Logger runs first (always logs, even rejected requests)
//   CORS runs second (rejected responses still need CORS headers)
//   Rate limit before proxy (no backend call for a rejected request)
// =================================================================

export const INTERNAL_ERROR_DETAIL = 'Internal Gateway error';

/** Address the request came from, as Express resolved it under `trust proxy` */
export function clientIdentity(req: Request): string {
    return req.ip || req.socket.remoteAddress || 'unknown';
}

export class MiddlewarePipeline {
    private middleware: GatewayMiddleware[] = [];

    use(mw: GatewayMiddleware): MiddlewarePipeline {
        this.middleware.push(mw);
        return this;
    }

    /**
     * Run the chain for one request. An error thrown by any middleware
     * is logged with the request's identity and answered with a generic
     * 500; its message never reaches the client.
     */
    async execute(req: Request, res: Response): Promise<void> {
        const ctx: GatewayContext = {
            req,
            res,
            startTime: Date.now(),
            clientKey: clientIdentity(req),
            stage: 'received',
        };

        let index = 0;

        const next = async (): Promise<void> => {
            if (index >= this.middleware.length) return;

            const mw = this.middleware[index];
            index++;

            try {
                await mw.handle(ctx, next);
            } catch (err) {
                ctx.stage = 'failed';
                ctx.failure = `${mw.name}: ${errorMessage(err)}`;
                console.error(
                    `[pipeline] ${mw.name} failed for ${ctx.clientKey} ${req.method} ${req.originalUrl}: ${errorMessage(err)}`,
                );

                if (!res.headersSent) {
                    res.status(500).json({ detail: INTERNAL_ERROR_DETAIL });
                }
            }
        };

        await next();
    }

    getMiddlewareNames(): string[] {
        return this.middleware.map(m => m.name);
    }
}
