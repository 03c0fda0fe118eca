import { Token } from 'typedi';
import { GenerationRequest } from '../../types/chat';

export type InferenceFailure =
    | { kind: 'backend-unavailable'; message: string; attempts: number }
    | { kind: 'backend-error'; status: number; message: string }
    | { kind: 'timeout'; message: string }
    | { kind: 'cancelled'; message: string };

export type GenerationResult =
    | { ok: true; text: string; attempts: number }
    | { ok: false; failure: InferenceFailure };

export interface GenerateOptions {
    signal?: AbortSignal;
    /** Epoch milliseconds after which no further attempt starts. */
    deadlineAt?: number;
}

/**
 * One round trip to the model server. Implementations make exactly one
 * network call per invocation, honour the signal, and throw an
 * InferenceFault when the call does not produce completion text.
 */
export interface InferenceBackend {
    complete(request: GenerationRequest, signal: AbortSignal): Promise<string>;
    ping(signal: AbortSignal): Promise<void>;
}

export const InferenceBackendToken = new Token<InferenceBackend>('inference-backend');
