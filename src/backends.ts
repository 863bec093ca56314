import express, { Express } from 'express';

// =================================================================
// DEMO BACKEND: a simple service the gateway proxies to
// =================================================================
//
// Identifies itself in every response so you can see the request
// went through the gateway. /echo/* reflects the request back,
// which makes header and body forwarding easy to check by hand:
//
//   curl -X POST localhost:4000/echo/test -H 'X-Test: 1' -d '{"a":1}'
// =================================================================

const USERS = [
    { id: 1, name: 'Alice' },
    { id: 2, name: 'Bob' },
    { id: 3, name: 'Charlie' },
];

const PRODUCTS = [
    { id: 1, name: 'Keyboard', price: 49 },
    { id: 2, name: 'Monitor', price: 199 },
];

const ORDERS = [
    { id: 1, userId: 1, productId: 2, quantity: 1 },
];

export function createBackend(name: string): Express {
    const app = express();
    app.disable('x-powered-by');

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', server: name, uptime: process.uptime() });
    });

    app.get('/users', (_req, res) => {
        res.json({ server: name, data: USERS });
    });

    app.get('/products', (_req, res) => {
        res.json({ server: name, data: PRODUCTS });
    });

    app.get('/orders', (_req, res) => {
        res.json({ server: name, data: ORDERS });
    });

    app.all('/echo{/*path}', express.text({ type: () => true }), (req, res) => {
        res.json({
            server: name,
            method: req.method,
            path: req.path,
            query: req.query,
            headers: req.headers,
            body: typeof req.body === 'string' ? req.body : '',
        });
    });

    app.all('/{*path}', (req, res) => {
        res.status(404).json({ server: name, detail: `No route for ${req.method} ${req.path}` });
    });

    return app;
}
