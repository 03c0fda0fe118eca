import { setTimeout as sleep } from 'node:timers/promises';
import { Inject, Service } from 'typedi';
import { AppConfig, AppConfigToken } from '../../config';
import { GenerationRequest } from '../../types/chat';
import { Clock, ClockToken } from '../../utils/clock';
import { createLogger } from '../../utils/logger';
import { asInferenceFault, InferenceFault } from './InferenceFault';
import { RetryPolicy, RetryState } from './RetryPolicy';
import { GenerateOptions, GenerationResult, InferenceBackend, InferenceBackendToken } from './types';

const logger = createLogger('INFERENCE_CLIENT');

@Service()
export class InferenceClient {
    private readonly policy: RetryPolicy;

    constructor(
        @Inject(AppConfigToken) private readonly config: AppConfig,
        @Inject(InferenceBackendToken) private readonly backend: InferenceBackend,
        @Inject(ClockToken) private readonly clock: Clock,
    ) {
        this.policy = new RetryPolicy({
            maxRetries: config.inference.maxRetries,
            baseDelayMs: config.inference.retryDelayMs,
            backoffFactor: config.inference.retryBackoff,
            maxDelayMs: config.inference.retryMaxDelayMs,
        });
    }

    /**
     * Runs the request through the retry state machine. Never throws: every
     * outcome, including caller cancellation, comes back as a result.
     */
    async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<GenerationResult> {
        const deadlineAt = options.deadlineAt ?? this.now() + this.config.inference.requestDeadlineMs;
        let state: RetryState = this.policy.start();

        for (;;) {
            switch (state.phase) {
                case 'attempting': {
                    const attempting = state;
                    const remainingMs = deadlineAt - this.now();
                    if (remainingMs <= 0) {
                        const fault = new InferenceFault('deadline', 'Request deadline exceeded before the inference server answered');
                        state = this.policy.fail(attempting, fault, 0);
                        break;
                    }

                    const attemptTimeoutMs = Math.min(this.config.inference.timeoutMs, remainingMs);
                    try {
                        const text = await this.withTimeout(
                            (signal) => this.backend.complete(request, signal),
                            attemptTimeoutMs,
                            options.signal,
                        );
                        state = this.policy.succeed(attempting, text);
                    } catch (error) {
                        state = this.policy.fail(attempting, asInferenceFault(error), deadlineAt - this.now());
                    }
                    break;
                }
                case 'retrying': {
                    logger.warn(`Inference attempt ${state.attempt} failed, retrying in ${state.delayMs} ms`, {
                        kind: state.fault.kind,
                        reason: state.fault.message,
                    });
                    try {
                        await sleep(state.delayMs, undefined, { signal: options.signal });
                    } catch (error) {
                        if (!options.signal?.aborted) {
                            throw error;
                        }
                        return { ok: false, failure: { kind: 'cancelled', message: 'Request was cancelled while waiting to retry' } };
                    }
                    state = this.policy.resume(state);
                    break;
                }
                case 'succeeded':
                    if (state.attempt > 1) {
                        logger.info(`Inference succeeded on attempt ${state.attempt}`);
                    }
                    return { ok: true, text: state.text, attempts: state.attempt };
                case 'failed':
                    logger.error('Inference failed', undefined, { attempts: state.attempt, ...state.failure });
                    return { ok: false, failure: state.failure };
            }
        }
    }

    /** Reports whether the model server answers within the timeout. */
    async probe(timeoutMs: number = this.config.inference.probeTimeoutMs): Promise<boolean> {
        try {
            await this.withTimeout((signal) => this.backend.ping(signal), timeoutMs);
            return true;
        } catch (error) {
            logger.warn('Inference server probe failed', { reason: asInferenceFault(error).message });
            return false;
        }
    }

    /**
     * Runs one backend call under a hard timeout. The call's own signal is
     * aborted on timeout or when the caller's signal fires, and the returned
     * promise settles at that moment even if the backend ignores the signal.
     */
    private async withTimeout<T>(
        call: (signal: AbortSignal) => Promise<T>,
        timeoutMs: number,
        callerSignal?: AbortSignal,
    ): Promise<T> {
        const controller = new AbortController();
        const timer = setTimeout(() => {
            controller.abort(new InferenceFault('timeout', `Inference server did not answer within ${timeoutMs} ms`));
        }, timeoutMs);
        const onCallerAbort = () => {
            controller.abort(new InferenceFault('aborted', 'Request was cancelled by the caller'));
        };

        if (callerSignal?.aborted) {
            onCallerAbort();
        } else {
            callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
        }

        try {
            return await settleOnAbort(call(controller.signal), controller.signal);
        } catch (error) {
            const reason: unknown = controller.signal.reason;
            if (controller.signal.aborted && reason instanceof InferenceFault) {
                throw reason;
            }
            throw error;
        } finally {
            clearTimeout(timer);
            callerSignal?.removeEventListener('abort', onCallerAbort);
        }
    }

    private now(): number {
        return this.clock().getTime();
    }
}

function settleOnAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
        // Keep a late rejection from the abandoned call from going unhandled.
        promise.catch(() => undefined);
        return Promise.reject(signal.reason);
    }
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
    });
}
