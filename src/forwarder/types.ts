import { IncomingHttpHeaders } from 'http';

// =================================================================
// FORWARDER TYPES
// =================================================================

/** One inbound request, as the forwarder sees it */
export interface ProxyRequestContext {
    method: string;
    /** Path exactly as received, without the query string */
    path: string;
    /** Raw query string without the leading "?", empty when absent */
    query: string;
    /** Mutable copy of the inbound headers */
    headers: IncomingHttpHeaders;
    body: Buffer;
    clientIdentity: string;
    /** Inbound scheme, "http" or "https" */
    protocol: string;
}

export interface ProxyResponse {
    status: number;
    headers: Record<string, string | string[]>;
    body: Buffer;
    contentType: string;
}

export type ForwardErrorKind = 'backend-unavailable' | 'backend-timeout' | 'internal';

export interface ForwardError {
    kind: ForwardErrorKind;
    /** Internal description, for logs only */
    cause: string;
}

export type ForwardResult =
    | { ok: true; response: ProxyResponse }
    | { ok: false; error: ForwardError };

export interface BackendHealth {
    healthy: boolean;
    detail: string;
}

/** Status and client-facing detail for each failure kind */
export const FORWARD_ERROR_RESPONSES: Record<ForwardErrorKind, { status: number; detail: string }> = {
    'backend-unavailable': { status: 503, detail: 'Backend service unavailable' },
    'backend-timeout': { status: 504, detail: 'Gateway timeout' },
    'internal': { status: 500, detail: 'Internal Gateway error' },
};

export const DEFAULT_CONTENT_TYPE = 'application/json';

export interface Forwarder {
    forward(ctx: ProxyRequestContext): Promise<ForwardResult>;
}
