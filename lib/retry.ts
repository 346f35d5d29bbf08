import { firstValueFrom, timer } from 'rxjs';

export type RetryOptions = {
    retries: number,            // retries after the first attempt
    initialDelayMs: number,
    maxDelayMs: number,
    factor?: number,
    isRetryable?: (error: unknown) => boolean,
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void,
};

export class RetryExhaustedError extends Error {
    public readonly retryable = false;

    constructor(public readonly attempts: number, public readonly cause: unknown) {
        super(`Gave up after ${attempts} attempts: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'RetryExhaustedError';
    }
}

export function getBackoffDelay(retry: number, { initialDelayMs, maxDelayMs, factor = 2 }: RetryOptions): number {
    return Math.min(maxDelayMs, initialDelayMs * Math.pow(factor, retry));
}

export function sleep(ms: number): Promise<0> {
    return firstValueFrom(timer(ms));
}

/**
 * Runs `action` until it resolves, retrying retryable failures with exponential backoff.
 * A budget of `retries` allows `retries + 1` attempts in total.
 */
export async function retryWithBackoff<T>(action: () => T | Promise<T>, options: RetryOptions): Promise<T> {
    const isRetryable = options.isRetryable ?? (() => true);
    let attempt = 0;

    while (true) {
        attempt++;
        try {
            return await action();
        } catch (error) {
            if (!isRetryable(error)) {
                throw error;
            }

            if (attempt > options.retries) {
                throw new RetryExhaustedError(attempt, error);
            }

            const delay = getBackoffDelay(attempt - 1, options);
            options.onRetry?.(error, attempt, delay);
            await sleep(delay);
        }
    }
}
