import { Request, Response } from 'express';
import { GatewayMiddleware, GatewayContext, NextFunction } from './types';
import { AdmissionController } from '../admission/admission-controller';
import { Forwarder, FORWARD_ERROR_RESPONSES, ProxyRequestContext, ProxyResponse } from '../forwarder/types';
import { PayloadTooLargeError } from '../errors';

// =================================================================
// PROXY MIDDLEWARE (final step in the pipeline)
// =================================================================
// Reads the whole inbound body, waits for an admission slot, and
// forwards the request to the backend while holding that slot.
// The slot is released however the call ends.
//
// The body is read from the raw stream: bytes and Content-Encoding
// reach the backend exactly as the client sent them.
// =================================================================

export class ProxyMiddleware implements GatewayMiddleware {
    name = 'proxy';

    constructor(
        private admission: AdmissionController,
        private forwarder: Forwarder,
        private bodyLimitBytes: number,
    ) {}

    async handle(ctx: GatewayContext, _next: NextFunction): Promise<void> {
        const { req, res } = ctx;

        let body: Buffer;
        try {
            body = await readRequestBody(req, this.bodyLimitBytes);
        } catch (err) {
            if (!(err instanceof PayloadTooLargeError)) throw err;
            ctx.stage = 'failed';
            ctx.failure = err.message;
            res.status(413).json({ detail: 'Request body too large' });
            return;
        }

        const request = toProxyRequest(req, ctx.clientKey, body);

        const result = await this.admission.withSlot(() => {
            ctx.stage = 'admitted';
            return this.forwarder.forward(request);
        });

        if (!result.ok) {
            const { status, detail } = FORWARD_ERROR_RESPONSES[result.error.kind];
            ctx.stage = 'failed';
            ctx.failure = `${result.error.kind}: ${result.error.cause}`;
            console.error(
                `[proxy] ${result.error.kind} for ${ctx.clientKey} ${req.method} ${req.originalUrl}: ${result.error.cause}`,
            );
            if (!res.headersSent) {
                res.status(status).json({ detail });
            }
            return;
        }

        ctx.stage = 'forwarded';
        writeProxyResponse(res, result.response);
    }
}

/**
 * Buffer the request body. Past `limitBytes` the rest of the stream is
 * drained and discarded so a 413 can still be written on the same socket.
 */
export function readRequestBody(req: Request, limitBytes: number): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
        const declared = Number(req.headers['content-length']);
        const chunks: Buffer[] = [];
        let size = 0;
        let tooLarge = Number.isFinite(declared) && declared > limitBytes;

        if (tooLarge) {
            reject(new PayloadTooLargeError(limitBytes));
        }

        req.on('data', (chunk: Buffer) => {
            if (tooLarge) return;
            size += chunk.length;
            if (size > limitBytes) {
                tooLarge = true;
                chunks.length = 0;
                reject(new PayloadTooLargeError(limitBytes));
                return;
            }
            chunks.push(chunk);
        });
        req.on('end', () => {
            if (!tooLarge) resolve(Buffer.concat(chunks));
        });
        req.on('error', reject);
    });
}

export function toProxyRequest(req: Request, clientIdentity: string, body: Buffer): ProxyRequestContext {
    const url = req.originalUrl;
    const queryStart = url.indexOf('?');

    return {
        method: req.method,
        path: queryStart === -1 ? url : url.slice(0, queryStart),
        query: queryStart === -1 ? '' : url.slice(queryStart + 1),
        headers: req.headers,
        body,
        clientIdentity,
        protocol: req.protocol,
    };
}

function writeProxyResponse(res: Response, response: ProxyResponse): void {
    res.status(response.status);
    for (const [name, value] of Object.entries(response.headers)) {
        res.setHeader(name, value);
    }
    res.setHeader('Content-Type', response.contentType);
    res.end(response.body);
}
