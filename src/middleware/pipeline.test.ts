import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import { MiddlewarePipeline } from './pipeline';
import { GatewayContext, GatewayMiddleware, NextFunction } from './types';

class RecordingMiddleware implements GatewayMiddleware {
    constructor(public name: string, private order: string[]) {}

    async handle(_ctx: GatewayContext, next: NextFunction): Promise<void> {
        this.order.push(`${this.name}:before`);
        await next();
        this.order.push(`${this.name}:after`);
    }
}

class RespondingMiddleware implements GatewayMiddleware {
    name = 'respond';

    async handle(ctx: GatewayContext): Promise<void> {
        ctx.res.json({ client: ctx.clientKey, stage: ctx.stage });
    }
}

class FailingMiddleware implements GatewayMiddleware {
    name = 'failing';

    async handle(): Promise<void> {
        throw new Error('connection pool exhausted');
    }
}

function appFor(pipeline: MiddlewarePipeline) {
    const app = express();
    app.all('/{*path}', (req, res) => pipeline.execute(req, res));
    return app;
}

describe('MiddlewarePipeline', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('runs middleware in registration order, unwinding in reverse', async () => {
        const order: string[] = [];
        const pipeline = new MiddlewarePipeline()
            .use(new RecordingMiddleware('first', order))
            .use(new RecordingMiddleware('second', order))
            .use(new RespondingMiddleware());

        const res = await request(appFor(pipeline)).get('/anything');

        expect(res.status).toBe(200);
        expect(res.body.stage).toBe('received');
        expect(res.body.client).toMatch(/127\.0\.0\.1$/);
        expect(order).toEqual(['first:before', 'second:before', 'second:after', 'first:after']);
        expect(pipeline.getMiddlewareNames()).toEqual(['first', 'second', 'respond']);
    });

    it('answers a thrown error with a generic 500 and logs the cause', async () => {
        const pipeline = new MiddlewarePipeline().use(new FailingMiddleware());

        const res = await request(appFor(pipeline)).get('/users');

        expect(res.status).toBe(500);
        expect(res.body).toEqual({ detail: 'Internal Gateway error' });
        expect(console.error).toHaveBeenCalledWith(
            expect.stringMatching(/^\[pipeline\] failing failed for .+ GET \/users: connection pool exhausted$/),
        );
    });
});
