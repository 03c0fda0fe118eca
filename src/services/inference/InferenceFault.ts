export type FaultKind =
    /** Transport could not reach the server or the connection dropped. */
    | 'connection'
    /** A single attempt ran past its per-call timeout. */
    | 'timeout'
    /** The overall request deadline has passed. */
    | 'deadline'
    /** The caller went away. */
    | 'aborted'
    /** The server answered with a non-2xx status. */
    | 'http'
    /** The server answered 2xx but without usable completion text. */
    | 'invalid-response'
    /** Something was thrown that no backend classified. */
    | 'unexpected';

export class InferenceFault extends Error {
    constructor(
        readonly kind: FaultKind,
        message: string,
        readonly status?: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'InferenceFault';
    }

    get transient(): boolean {
        return this.kind === 'connection' || this.kind === 'timeout';
    }
}

/** Wraps anything a backend threw that is not already a classified fault. */
export function asInferenceFault(error: unknown): InferenceFault {
    if (error instanceof InferenceFault) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new InferenceFault('unexpected', message, undefined, { cause: error });
}
