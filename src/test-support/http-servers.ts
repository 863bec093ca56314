import http from 'http';

// In-process HTTP servers on ephemeral ports, for tests only.

export interface RunningServer {
    url: string;
    port: number;
    close(): Promise<void>;
}

export async function listen(handler: http.RequestListener): Promise<RunningServer> {
    const server = http.createServer(handler);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));

    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('server is not listening on a TCP port');
    }

    return {
        url: `http://127.0.0.1:${address.port}`,
        port: address.port,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.closeAllConnections();
                server.close(err => (err ? reject(err) : resolve()));
            }),
    };
}

/** A URL nothing is listening on */
export async function unusedUrl(): Promise<string> {
    const server = await listen((_req, res) => res.end());
    await server.close();
    return server.url;
}

export function readBody(req: http.IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        req.on('data', (chunk: Buffer) => chunks.push(chunk));
        req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
        req.on('error', reject);
    });
}
