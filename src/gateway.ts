import express, { Express } from 'express';
import { MiddlewarePipeline } from './middleware/pipeline';
import { LoggerMiddleware } from './middleware/logger';
import { CorsMiddleware } from './middleware/cors';
import { RateLimitMiddleware } from './middleware/rate-limit';
import { ProxyMiddleware } from './middleware/proxy';
import { RateLimiter } from './rate-limiters/types';
import { AdmissionController } from './admission/admission-controller';
import { Forwarder } from './forwarder/types';
import { HealthService } from './health/health-service';

// =================================================================
// API GATEWAY: RATE LIMIT + BOUNDED CONCURRENCY + PROXY
// =================================================================
//
//   GET /health     → gateway report, never rate limited or forwarded
//   ANY /{*path}    → logger → cors → rate-limit → proxy → backend
//
// The app holds no state of its own; everything it needs is passed
// in, so tests can build one around in-process stand-ins.
// =================================================================

export interface GatewayDependencies {
    limiter: RateLimiter;
    admission: AdmissionController;
    forwarder: Forwarder;
    health: HealthService;
    bodyLimitBytes: number;
    corsOrigins: string[];
    trustProxy: boolean;
}

export function createGateway(deps: GatewayDependencies): Express {
    const app = express();

    app.disable('x-powered-by');
    app.set('trust proxy', deps.trustProxy);

    app.get('/health', async (_req, res) => {
        res.json(await deps.health.check());
    });

    const pipeline = new MiddlewarePipeline()
        .use(new LoggerMiddleware())
        .use(new CorsMiddleware(deps.corsOrigins))
        .use(new RateLimitMiddleware(deps.limiter))
        .use(new ProxyMiddleware(deps.admission, deps.forwarder, deps.bodyLimitBytes));

    app.all('/{*path}', (req, res) => pipeline.execute(req, res));

    return app;
}
