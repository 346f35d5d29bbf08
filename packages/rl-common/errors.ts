import { RetryExhaustedError } from '../../lib/retry.ts';

export { RetryExhaustedError };

export abstract class CoordinationError extends Error {
    public abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class TransientChannelError extends CoordinationError {
    public readonly retryable = true;
}

export class OverflowError extends CoordinationError {
    public readonly retryable = true;

    constructor(public readonly capacity: number) {
        super(`Experience buffer is full (${capacity} pending episodes)`);
    }
}

// A worker waits for the trainer to publish the first policy.
export class NotReadyError extends CoordinationError {
    public readonly retryable = true;

    constructor() {
        super('No policy version has been published yet');
    }
}

export class SimulatorTimeoutError extends CoordinationError {
    public readonly retryable = false;

    constructor(public readonly timeoutMs: number, call: string = 'Simulator') {
        super(`${call} did not answer within ${timeoutMs} ms`);
    }
}

export class WorkerUnreachableError extends CoordinationError {
    public readonly retryable = false;

    constructor(public readonly workerId: string, cause: unknown) {
        super(`Worker ${workerId} exhausted its retry budget: ${describeError(cause)}`, { cause });
    }
}

export class TrainerUnreachableError extends CoordinationError {
    public readonly retryable = false;

    constructor(cause: unknown) {
        super(`Trainer exhausted its retry budget: ${describeError(cause)}`, { cause });
    }
}

export class ConfigInvalidError extends CoordinationError {
    public readonly retryable = false;

    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    }
}

export class PolicyConflictError extends CoordinationError {
    public readonly retryable = false;

    constructor(public readonly version: number) {
        super(`Policy version ${version} was already published with different weights`);
    }
}

export class UnsealedEpisodeError extends CoordinationError {
    public readonly retryable = false;

    constructor(episodeId: string) {
        super(`Episode ${episodeId} is not sealed and cannot be published`);
    }
}

export function isRetryable(error: unknown): boolean {
    return error instanceof CoordinationError && error.retryable;
}

export function describeError(error: unknown): string {
    if (error instanceof RetryExhaustedError) {
        return describeError(error.cause);
    }

    return error instanceof Error ? error.message : String(error);
}
