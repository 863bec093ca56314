import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import { startGateway, RunningGateway } from './server';
import { createBackend } from './backends';
import { loadConfig } from './config';
import { listen, RunningServer } from './test-support/http-servers';

describe('startGateway', () => {
    let backend: RunningServer;
    let gateway: RunningGateway | undefined;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        backend = await listen(createBackend('demo-backend'));
    });

    afterEach(async () => {
        await gateway?.close();
        gateway = undefined;
        await backend.close();
        vi.restoreAllMocks();
    });

    it('serves rate-limited traffic on an ephemeral port with the in-memory store', async () => {
        gateway = await startGateway(loadConfig({ PORT: '0', BACKEND_URL: backend.url, RATE_LIMITS: 'GET:1' }));
        const client = request(`http://127.0.0.1:${gateway.port}`);

        const users = await client.get('/users');
        const limited = await client.get('/users');
        const health = await client.get('/health');

        expect(gateway.port).toBeGreaterThan(0);
        expect(users.status).toBe(200);
        expect(users.body.server).toBe('demo-backend');
        expect(limited.status).toBe(429);
        expect(health.body.status).toBe('OK');
        expect(health.body.metrics).toEqual({ total_requests_processed: 2, total_requests_blocked: 1 });
        expect(console.warn).toHaveBeenCalledWith(
            'No REDIS_URL configured: using in-memory counting store (limits are per process)',
        );
    });

    it('stops accepting connections after close', async () => {
        const running = await startGateway(loadConfig({ PORT: '0', BACKEND_URL: backend.url }));

        await running.close();

        expect(running.server.listening).toBe(false);
    });

    it('rejects when the port is already taken', async () => {
        gateway = await startGateway(loadConfig({ PORT: '0', BACKEND_URL: backend.url }));

        await expect(
            startGateway(loadConfig({ PORT: String(gateway.port), BACKEND_URL: backend.url })),
        ).rejects.toThrow(/EADDRINUSE/);
    });
});
