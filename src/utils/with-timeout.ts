import { TimeoutError } from '../errors';

/**
 * Race a promise against a timer. The timer is always cleared, so a
 * settled promise never keeps the process alive.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(message)), ms);
    });

    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
