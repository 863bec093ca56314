import pLimit from 'p-limit';

// =================================================================
// ADMISSION CONTROLLER
// =================================================================
//
// One process-wide concurrency limit around backend calls,
// independent of the per-client rate limits.
//
//   capacity: 3
//   in flight: [■][■][■]    waiting: ○ ○ ○ ○
//                 │
//          one call finishes → first waiter takes its slot
//
// Waiters queue in arrival order with no bound: the forwarder's own
// deadline is what stops a slow backend from holding slots forever.
// =================================================================

export interface AdmissionStats {
    capacity: number;
    in_flight: number;
    waiting: number;
}

type Limit = ReturnType<typeof pLimit>;

export class AdmissionController {
    private readonly limit: Limit;

    constructor(public readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
        }
        this.limit = pLimit(capacity);
    }

    /**
     * Run `fn` while holding a slot. The slot is released once `fn`
     * settles, whether it resolves or rejects.
     */
    withSlot<T>(fn: () => Promise<T>): Promise<T> {
        return this.limit(fn);
    }

    get inFlight(): number {
        return this.limit.activeCount;
    }

    get waiting(): number {
        return this.limit.pendingCount;
    }

    stats(): AdmissionStats {
        return {
            capacity: this.capacity,
            in_flight: this.limit.activeCount,
            waiting: this.limit.pendingCount,
        };
    }
}
