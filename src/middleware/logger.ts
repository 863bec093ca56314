import { GatewayMiddleware, GatewayContext, NextFunction } from './types';

// =================================================================
// LOGGER MIDDLEWARE
// =================================================================
// Runs FIRST, logs every request, even rejected ones.
// The line is written once the response is sent, so it carries the
// final status, timing and how far the request got.
// =================================================================

export class LoggerMiddleware implements GatewayMiddleware {
    name = 'logger';

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { req, res, startTime } = ctx;

        res.on('finish', () => {
            const elapsed = Date.now() - startTime;
            const failure = ctx.failure ? ` (${ctx.failure})` : '';
            console.log(
                `${ctx.clientKey} ${req.method} ${req.originalUrl} → ${ctx.stage} [${res.statusCode}] ${elapsed}ms${failure}`,
            );
            ctx.stage = 'responded';
        });

        res.on('close', () => {
            if (res.writableFinished) return;
            console.warn(
                `${ctx.clientKey} ${req.method} ${req.originalUrl} → client disconnected during ${ctx.stage}`,
            );
        });

        await next();
    }
}
