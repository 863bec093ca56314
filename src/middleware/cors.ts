import { GatewayMiddleware, GatewayContext, NextFunction } from './types';

// =================================================================
// CORS MIDDLEWARE
// =================================================================
// Adds CORS headers to ALL responses (even 429, 503).
// Answers browser preflights itself: an OPTIONS request carrying
// Access-Control-Request-Method. Any other OPTIONS is an ordinary
// request and continues down the chain.
// =================================================================

const DEFAULT_ALLOWED_HEADERS = 'Content-Type, Authorization, X-API-Key';

export class CorsMiddleware implements GatewayMiddleware {
    name = 'cors';

    constructor(
        private allowedOrigins: string[] = ['*'],
        private allowedMethods: string[] = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'],
    ) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { req, res } = ctx;
        const allowedOrigin = this.resolveOrigin(req.headers.origin);

        if (allowedOrigin) {
            res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
            if (allowedOrigin !== '*') {
                res.setHeader('Access-Control-Allow-Credentials', 'true');
                res.vary('Origin');
            }
        }

        const isPreflight = req.method === 'OPTIONS' && req.headers['access-control-request-method'] !== undefined;
        if (!isPreflight) {
            await next();
            return;
        }

        if (allowedOrigin) {
            res.setHeader('Access-Control-Allow-Methods', this.allowedMethods.join(', '));
            res.setHeader(
                'Access-Control-Allow-Headers',
                req.headers['access-control-request-headers'] ?? DEFAULT_ALLOWED_HEADERS,
            );
            res.setHeader('Access-Control-Max-Age', '600');
        }

        ctx.stage = 'responded';
        res.status(204).end();
    }

    private resolveOrigin(origin: string | undefined): string | undefined {
        if (this.allowedOrigins.includes('*')) return '*';
        if (origin && this.allowedOrigins.includes(origin)) return origin;
        return undefined;
    }
}
