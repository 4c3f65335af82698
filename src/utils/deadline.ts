import { DeadlineExceededError } from './errors';

/**
 * Settle with `promise`, or reject with DeadlineExceededError after `timeoutMs`.
 * The underlying work is not cancelled.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new DeadlineExceededError(timeoutMs)), timeoutMs);
    });
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
