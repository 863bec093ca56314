import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createBackend } from './backends';

describe('demo backend', () => {
    const app = createBackend('backend-a');

    it('reports its health', async () => {
        const res = await request(app).get('/health');

        expect(res.status).toBe(200);
        expect(res.body.status).toBe('ok');
        expect(res.body.server).toBe('backend-a');
    });

    it('lists users', async () => {
        const res = await request(app).get('/users');

        expect(res.body.data).toEqual([
            { id: 1, name: 'Alice' },
            { id: 2, name: 'Bob' },
            { id: 3, name: 'Charlie' },
        ]);
    });

    it('echoes the request back', async () => {
        const res = await request(app)
            .delete('/echo/orders/9?force=true')
            .set('X-Test', 'abc')
            .set('Content-Type', 'text/plain')
            .send('because');

        expect(res.body).toMatchObject({
            server: 'backend-a',
            method: 'DELETE',
            path: '/echo/orders/9',
            query: { force: 'true' },
            body: 'because',
        });
        expect(res.body.headers['x-test']).toBe('abc');
    });

    it('answers unknown routes with 404', async () => {
        const res = await request(app).post('/nowhere');

        expect(res.status).toBe(404);
        expect(res.body).toEqual({ server: 'backend-a', detail: 'No route for POST /nowhere' });
    });
});
