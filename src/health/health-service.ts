import { CountingStore } from '../counting-store';
import { GatewayMetrics, MetricsSnapshot } from '../metrics/gateway-metrics';
import { AdmissionController, AdmissionStats } from '../admission/admission-controller';
import { BackendHealth } from '../forwarder/types';
import { withTimeout } from '../utils/with-timeout';
import { errorMessage } from '../errors';

// =================================================================
// HEALTH SERVICE
// =================================================================
// Probes the counting store and the backend at the same time, each
// with a bounded wait, and folds the two into one status:
//
//   store  backend   status
//   ok     ok        OK
//   ok     down      DEGRADED
//   down   ok        DEGRADED
//   down   down      UNHEALTHY
// =================================================================

export type OverallStatus = 'OK' | 'DEGRADED' | 'UNHEALTHY';
export type DependencyStatus = 'Connected' | 'Disconnected';

export interface HealthReport {
    status: OverallStatus;
    store_status: DependencyStatus;
    backend_status: DependencyStatus;
    metrics: MetricsSnapshot;
    concurrency: AdmissionStats;
}

export interface BackendProbe {
    checkHealth(timeoutMs: number): Promise<BackendHealth>;
}

export class HealthService {
    constructor(
        private store: CountingStore,
        private backend: BackendProbe,
        private metrics: GatewayMetrics,
        private admission: AdmissionController,
        private timeoutMs: number,
    ) {}

    async check(): Promise<HealthReport> {
        const [storeUp, backendUp] = await Promise.all([this.probeStore(), this.probeBackend()]);

        return {
            status: overallStatus(storeUp, backendUp),
            store_status: storeUp ? 'Connected' : 'Disconnected',
            backend_status: backendUp ? 'Connected' : 'Disconnected',
            metrics: this.metrics.snapshot(),
            concurrency: this.admission.stats(),
        };
    }

    private async probeStore(): Promise<boolean> {
        try {
            await withTimeout(this.store.ping(), this.timeoutMs, `store ping exceeded ${this.timeoutMs}ms`);
            return true;
        } catch (err) {
            console.error(`[health] ${this.store.name} store check failed: ${errorMessage(err)}`);
            return false;
        }
    }

    private async probeBackend(): Promise<boolean> {
        const health = await this.backend.checkHealth(this.timeoutMs);
        if (!health.healthy) {
            console.error(`[health] backend check failed: ${health.detail}`);
        }
        return health.healthy;
    }
}

export function overallStatus(storeUp: boolean, backendUp: boolean): OverallStatus {
    if (storeUp && backendUp) return 'OK';
    if (storeUp || backendUp) return 'DEGRADED';
    return 'UNHEALTHY';
}
