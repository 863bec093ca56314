import http, { IncomingHttpHeaders, OutgoingHttpHeaders } from 'http';
import https from 'https';
import {
    BackendHealth,
    DEFAULT_CONTENT_TYPE,
    ForwardError,
    Forwarder,
    ForwardResult,
    ProxyRequestContext,
} from './types';
import { buildForwardHeaders, buildResponseHeaders } from './headers';
import { errorMessage } from '../errors';

// =================================================================
// FORWARDER
// =================================================================
//
// Relays one request to the single configured backend and reads the
// whole response back:
//
//   client ──► gateway ──► backend
//              POST /users?page=2
//              X-Forwarded-For: <client ip>
//              X-Forwarded-Proto: http
//
// One attempt per request, no retries. A deadline covers the whole
// exchange, from connect to the last body byte.
//
// Failures are returned, not thrown:
//   connection refused / reset / DNS  → backend-unavailable (503)
//   deadline passed                   → backend-timeout     (504)
//   anything else                     → internal            (500)
// =================================================================

export interface ForwarderOptions {
    /** Backend base URL; its path (if any) prefixes every forwarded path */
    baseUrl: string;
    /** Deadline for one forwarded call */
    timeoutMs: number;
}

interface OutboundRequest {
    method: string;
    path: string;
    headers: OutgoingHttpHeaders;
    body: Buffer;
}

type ExchangeResult =
    | { ok: true; status: number; headers: IncomingHttpHeaders; body: Buffer }
    | { ok: false; error: ForwardError };

// Error codes that mean the backend could not be reached or dropped us
const TRANSPORT_ERROR_CODES: ReadonlySet<string> = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ECONNABORTED',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EHOSTUNREACH',
    'EHOSTDOWN',
    'ENETUNREACH',
    'ENETDOWN',
    'EPIPE',
    'ETIMEDOUT',
    'ERR_SOCKET_CLOSED',
]);

export class BackendForwarder implements Forwarder {
    private readonly target: URL;
    private readonly basePath: string;
    private readonly secure: boolean;
    // Shared keep-alive pool for every call to the backend
    private readonly agent: http.Agent;

    constructor(private options: ForwarderOptions) {
        this.target = new URL(options.baseUrl);
        this.secure = this.target.protocol === 'https:';
        this.basePath = this.target.pathname.replace(/\/+$/, '');
        this.agent = this.secure
            ? new https.Agent({ keepAlive: true })
            : new http.Agent({ keepAlive: true });
    }

    async forward(ctx: ProxyRequestContext): Promise<ForwardResult> {
        const result = await this.exchange(
            {
                method: ctx.method,
                path: this.targetPath(ctx.path, ctx.query),
                headers: buildForwardHeaders(ctx),
                body: ctx.body,
            },
            this.options.timeoutMs,
        );

        if (!result.ok) return result;

        const headers = buildResponseHeaders(result.headers);
        const contentType = headers['content-type'];

        return {
            ok: true,
            response: {
                status: result.status,
                headers,
                body: result.body,
                contentType: typeof contentType === 'string' ? contentType : DEFAULT_CONTENT_TYPE,
            },
        };
    }

    /**
     * GET <base>/health over the same pool, bounded by `timeoutMs`.
     * Any 2xx counts as healthy.
     */
    async checkHealth(timeoutMs: number): Promise<BackendHealth> {
        const result = await this.exchange(
            {
                method: 'GET',
                path: this.targetPath('/health', ''),
                headers: { accept: 'application/json' },
                body: Buffer.alloc(0),
            },
            timeoutMs,
        );

        if (!result.ok) {
            return { healthy: false, detail: `${result.error.kind}: ${result.error.cause}` };
        }

        const healthy = result.status >= 200 && result.status < 300;
        return { healthy, detail: `HTTP ${result.status}` };
    }

    /** Drop pooled connections on shutdown */
    close(): void {
        this.agent.destroy();
    }

    private targetPath(path: string, query: string): string {
        return `${this.basePath}${path}${query ? `?${query}` : ''}`;
    }

    private exchange(request: OutboundRequest, timeoutMs: number): Promise<ExchangeResult> {
        return new Promise<ExchangeResult>((resolve) => {
            let settled = false;
            let timedOut = false;
            let timer: NodeJS.Timeout | undefined;

            const finish = (result: ExchangeResult): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                resolve(result);
            };

            const timeoutError = (): ExchangeResult => ({
                ok: false,
                error: { kind: 'backend-timeout', cause: `no complete response within ${timeoutMs}ms` },
            });

            const fail = (err: unknown): void => {
                finish(timedOut ? timeoutError() : { ok: false, error: classifyError(err) });
            };

            const options: http.RequestOptions = {
                protocol: this.target.protocol,
                hostname: this.target.hostname,
                port: this.target.port || undefined,
                path: request.path,
                method: request.method,
                headers: request.headers,
                agent: this.agent,
            };

            const onResponse = (backendRes: http.IncomingMessage): void => {
                const chunks: Buffer[] = [];

                backendRes.on('data', (chunk: Buffer) => chunks.push(chunk));
                backendRes.on('end', () => {
                    finish({
                        ok: true,
                        status: backendRes.statusCode ?? 502,
                        headers: backendRes.headers,
                        body: Buffer.concat(chunks),
                    });
                });
                backendRes.on('error', fail);
                backendRes.on('close', () => {
                    if (backendRes.complete) return;
                    finish(timedOut ? timeoutError() : {
                        ok: false,
                        error: { kind: 'backend-unavailable', cause: 'connection closed before the response completed' },
                    });
                });
            };

            let backendReq: http.ClientRequest;
            try {
                backendReq = this.secure
                    ? https.request(options, onResponse)
                    : http.request(options, onResponse);
            } catch (err) {
                // Invalid method or header value: rejected before anything is sent
                finish({ ok: false, error: { kind: 'internal', cause: errorMessage(err) } });
                return;
            }

            timer = setTimeout(() => {
                timedOut = true;
                backendReq.destroy(new Error(`backend did not respond within ${timeoutMs}ms`));
            }, timeoutMs);

            backendReq.on('error', fail);

            if (request.body.length > 0) {
                backendReq.end(request.body);
            } else {
                backendReq.end();
            }
        });
    }
}

/** Map a request error to a failure kind */
export function classifyError(err: unknown): ForwardError {
    const code = errorCode(err);
    const cause = code ? `${code}: ${errorMessage(err)}` : errorMessage(err);

    if (code !== undefined && TRANSPORT_ERROR_CODES.has(code)) {
        return { kind: 'backend-unavailable', cause };
    }
    return { kind: 'internal', cause };
}

function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}
