import { IncomingHttpHeaders, OutgoingHttpHeaders } from 'http';
import { ProxyRequestContext } from './types';

// =================================================================
// HEADER HYGIENE
// =================================================================
// Hop-by-hop headers describe one connection, not the message, so
// they never cross the gateway in either direction, and neither do
// the extra names a Connection header lists. The inbound Host
// names the gateway itself; Node fills in the backend's own Host.
// =================================================================

export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
    'connection',
    'keep-alive',
    'proxy-connection',
    'proxy-authenticate',
    'proxy-authorization',
    'te',
    'trailer',
    'transfer-encoding',
    'upgrade',
]);

/** Headers for the outbound backend request */
export function buildForwardHeaders(ctx: ProxyRequestContext): OutgoingHttpHeaders {
    const headers: OutgoingHttpHeaders = {};
    const listed = connectionTokens(ctx.headers.connection);

    for (const [name, value] of Object.entries(ctx.headers)) {
        if (value === undefined) continue;

        const lower = name.toLowerCase();
        if (lower === 'host' || lower === 'content-length' || isHopByHop(lower, listed)) continue;

        headers[lower] = value;
    }

    headers['x-forwarded-for'] = ctx.clientIdentity;
    headers['x-forwarded-proto'] = ctx.protocol;

    if (ctx.body.length > 0 || ctx.headers['content-length'] !== undefined) {
        headers['content-length'] = String(ctx.body.length);
    }

    return headers;
}

/** Backend response headers, minus hop-by-hop ones */
export function buildResponseHeaders(incoming: IncomingHttpHeaders): Record<string, string | string[]> {
    const headers: Record<string, string | string[]> = {};
    const listed = connectionTokens(incoming.connection);

    for (const [name, value] of Object.entries(incoming)) {
        if (value === undefined || isHopByHop(name, listed)) continue;
        headers[name] = value;
    }

    return headers;
}

/** Header names a Connection header marks as hop-by-hop, lower-cased */
export function connectionTokens(connection: string | undefined): Set<string> {
    const tokens = new Set<string>();
    if (!connection) return tokens;

    for (const token of connection.split(',')) {
        const name = token.trim().toLowerCase();
        if (name) tokens.add(name);
    }
    return tokens;
}

function isHopByHop(name: string, listed: ReadonlySet<string>): boolean {
    return HOP_BY_HOP_HEADERS.has(name) || listed.has(name);
}
