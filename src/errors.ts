// =================================================================
// GATEWAY ERRORS
// =================================================================
// Expected outcomes (rate exceeded, backend down, backend slow) are
// returned as result objects. These classes cover the failures that
// do propagate as exceptions.
// =================================================================

/** The counting store could not be reached or did not answer. */
export class StoreUnavailableError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StoreUnavailableError';
    }
}

/** An environment variable holds a value the gateway cannot use. */
export class ConfigError extends Error {
    constructor(public readonly variable: string, message: string) {
        super(`${variable}: ${message}`);
        this.name = 'ConfigError';
    }
}

export class TimeoutError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TimeoutError';
    }
}

/** The inbound body is larger than the configured limit. */
export class PayloadTooLargeError extends Error {
    constructor(public readonly limitBytes: number) {
        super(`Request body exceeds ${limitBytes} bytes`);
        this.name = 'PayloadTooLargeError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
