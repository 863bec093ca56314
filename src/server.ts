import http from 'http';
import { GatewayConfig } from './config';
import { createCountingStore } from './counting-store';
import { GatewayMetrics } from './metrics/gateway-metrics';
import { FixedWindowRateLimiter } from './rate-limiters/fixed-window';
import { AdmissionController } from './admission/admission-controller';
import { BackendForwarder } from './forwarder/forwarder';
import { HealthService } from './health/health-service';
import { createGateway } from './gateway';

export interface RunningGateway {
    server: http.Server;
    port: number;
    close(): Promise<void>;
}

/**
 * Connect the counting store, build the gateway and start listening.
 * Fails before binding the port when the store cannot be reached.
 */
export async function startGateway(config: GatewayConfig): Promise<RunningGateway> {
    const store = await createCountingStore(config);
    const metrics = new GatewayMetrics();
    const limiter = new FixedWindowRateLimiter(store, config.rateLimit, metrics);
    const admission = new AdmissionController(config.maxConcurrentRequests);
    const forwarder = new BackendForwarder({ baseUrl: config.backendUrl, timeoutMs: config.backendTimeoutMs });
    const health = new HealthService(store, forwarder, metrics, admission, config.healthTimeoutMs);

    const app = createGateway({
        limiter,
        admission,
        forwarder,
        health,
        bodyLimitBytes: config.bodyLimitBytes,
        corsOrigins: config.corsOrigins,
        trustProxy: config.trustProxy,
    });

    const server = http.createServer(app);
    try {
        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(config.port, () => {
                server.off('error', reject);
                resolve();
            });
        });
    } catch (err) {
        forwarder.close();
        await store.disconnect();
        throw err;
    }

    const address = server.address();
    const port = address !== null && typeof address !== 'string' ? address.port : config.port;

    printBanner(config, port, store.name);

    return {
        server,
        port,
        close: async () => {
            await new Promise<void>((resolve, reject) => {
                server.close(err => (err ? reject(err) : resolve()));
                server.closeIdleConnections();
            });
            forwarder.close();
            await store.disconnect();
            console.log('Gateway stopped');
        },
    };
}

function printBanner(config: GatewayConfig, port: number, storeName: string): void {
    const limits = Object.entries(config.rateLimit.limits)
        .map(([method, limit]) => `${method}:${limit}`)
        .join(', ');

    console.log('');
    console.log('='.repeat(65));
    console.log('Rate Limit Gateway');
    console.log('='.repeat(65));
    console.log('');
    console.log(`  Gateway: http://localhost:${port}`);
    console.log(`  Backend: ${config.backendUrl}`);
    console.log(`  Store: ${storeName}`);
    console.log(`  Limits: ${limits} per ${config.rateLimit.windowSeconds}s`);
    console.log(`  Unlisted methods: ${config.rateLimit.unlistedMethodPolicy}`);
    console.log(`  Store failure: fail-${config.rateLimit.storeFailurePolicy}`);
    console.log(`  Max concurrent backend calls: ${config.maxConcurrentRequests}`);
    console.log('');
    console.log('  GET /health → gateway status');
    console.log('');
}
