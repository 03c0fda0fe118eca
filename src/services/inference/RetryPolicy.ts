import { InferenceFault } from './InferenceFault';
import { InferenceFailure } from './types';

export interface RetrySettings {
    maxRetries: number;
    baseDelayMs: number;
    backoffFactor: number;
    maxDelayMs: number;
}

export type RetryState =
    | { phase: 'attempting'; attempt: number }
    | { phase: 'retrying'; attempt: number; delayMs: number; fault: InferenceFault }
    | { phase: 'succeeded'; attempt: number; text: string }
    | { phase: 'failed'; attempt: number; failure: InferenceFailure };

type Attempting = Extract<RetryState, { phase: 'attempting' }>;
type Retrying = Extract<RetryState, { phase: 'retrying' }>;

/**
 * Transition table for one generation call:
 * attempting(n) -> succeeded | failed | retrying(n) -> attempting(n + 1).
 * Only transient faults are retried, and never past the deadline.
 */
export class RetryPolicy {
    constructor(private readonly settings: RetrySettings) {}

    start(): RetryState {
        return { phase: 'attempting', attempt: 1 };
    }

    /** Backoff before the given retry, counted from one. */
    delayFor(retry: number): number {
        const { baseDelayMs, backoffFactor, maxDelayMs } = this.settings;
        return Math.min(maxDelayMs, baseDelayMs * Math.pow(backoffFactor, retry - 1));
    }

    succeed(state: Attempting, text: string): RetryState {
        return { phase: 'succeeded', attempt: state.attempt, text };
    }

    fail(state: Attempting, fault: InferenceFault, remainingMs: number): RetryState {
        const { attempt } = state;
        if (!fault.transient) {
            return { phase: 'failed', attempt, failure: terminalFailure(fault) };
        }

        if (attempt > this.settings.maxRetries) {
            return { phase: 'failed', attempt, failure: exhaustedFailure(fault, attempt) };
        }

        const delayMs = this.delayFor(attempt);
        if (delayMs >= remainingMs) {
            return {
                phase: 'failed',
                attempt,
                failure: {
                    kind: 'timeout',
                    message: `Request deadline reached after ${attempt} attempt(s): ${fault.message}`,
                },
            };
        }

        return { phase: 'retrying', attempt, delayMs, fault };
    }

    resume(state: Retrying): RetryState {
        return { phase: 'attempting', attempt: state.attempt + 1 };
    }
}

function terminalFailure(fault: InferenceFault): InferenceFailure {
    switch (fault.kind) {
        case 'http':
            return { kind: 'backend-error', status: fault.status ?? 502, message: fault.message };
        case 'invalid-response':
        case 'unexpected':
            return { kind: 'backend-error', status: fault.status ?? 502, message: fault.message };
        case 'aborted':
            return { kind: 'cancelled', message: fault.message };
        default:
            return { kind: 'timeout', message: fault.message };
    }
}

function exhaustedFailure(fault: InferenceFault, attempts: number): InferenceFailure {
    if (fault.kind === 'timeout') {
        return {
            kind: 'timeout',
            message: `Inference server did not answer in time after ${attempts} attempt(s)`,
        };
    }
    return {
        kind: 'backend-unavailable',
        message: `Inference server unreachable after ${attempts} attempt(s): ${fault.message}`,
        attempts,
    };
}
