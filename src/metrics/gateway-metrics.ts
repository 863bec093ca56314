// =================================================================
// GATEWAY METRICS
// =================================================================
// Process-wide counters, read by /health. Never reset.
//
// Node runs request handlers on one thread, so a plain ++ is atomic
// with respect to every other request.
// =================================================================

export interface MetricsSnapshot {
    total_requests_processed: number;
    total_requests_blocked: number;
}

export class GatewayMetrics {
    private processed = 0;
    private blocked = 0;

    /** A request reached the rate limiter */
    recordProcessed(): void {
        this.processed++;
    }

    /** The rate limiter rejected a request */
    recordBlocked(): void {
        this.blocked++;
    }

    snapshot(): MetricsSnapshot {
        return {
            total_requests_processed: this.processed,
            total_requests_blocked: this.blocked,
        };
    }
}
