import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { readRequestBody, toProxyRequest } from './proxy';
import { PayloadTooLargeError } from '../errors';

function captureApp(limitBytes: number) {
    const app = express();
    app.all('/{*path}', async (req, res) => {
        try {
            const body = await readRequestBody(req, limitBytes);
            res.json(toProxyRequest(req, 'client-1', body));
        } catch (err) {
            if (!(err instanceof PayloadTooLargeError)) throw err;
            res.status(413).json({ limit: err.limitBytes });
        }
    });
    return app;
}

describe('toProxyRequest', () => {
    it('splits the raw path and query string and keeps the body bytes', async () => {
        const res = await request(captureApp(1024))
            .put('/orders/7/items?expand=product&sort=-price')
            .set('Content-Type', 'application/json')
            .send('{"quantity":2}');

        expect(res.body.method).toBe('PUT');
        expect(res.body.path).toBe('/orders/7/items');
        expect(res.body.query).toBe('expand=product&sort=-price');
        expect(res.body.clientIdentity).toBe('client-1');
        expect(res.body.protocol).toBe('http');
        expect(res.body.headers['content-type']).toBe('application/json');
        expect(Buffer.from(res.body.body.data).toString()).toBe('{"quantity":2}');
    });

    it('leaves percent-encoding in the path untouched', async () => {
        const res = await request(captureApp(1024)).get('/files/a%20b.txt');

        expect(res.body.path).toBe('/files/a%20b.txt');
        expect(res.body.query).toBe('');
    });
});

describe('readRequestBody', () => {
    it('returns an empty buffer when there is no body', async () => {
        const res = await request(captureApp(1024)).get('/users');

        expect(res.body.body).toEqual({ type: 'Buffer', data: [] });
    });

    it('accepts a body of exactly the limit', async () => {
        const res = await request(captureApp(5)).post('/users').set('Content-Type', 'text/plain').send('12345');

        expect(res.status).toBe(200);
    });

    it('rejects a body one byte over the limit', async () => {
        const res = await request(captureApp(5)).post('/users').set('Content-Type', 'text/plain').send('123456');

        expect(res.status).toBe(413);
        expect(res.body).toEqual({ limit: 5 });
    });
});
