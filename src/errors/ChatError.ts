import { HttpError } from 'routing-controllers';

export type ChatErrorCode =
    | 'validation_error'
    | 'context_overflow'
    | 'backend_unavailable'
    | 'backend_error'
    | 'timeout'
    | 'cancelled';

/**
 * Base for every failure a chat request can end in. Each subclass carries the
 * HTTP status the error handler renders and a stable machine-readable code.
 */
export abstract class ChatError extends HttpError {
    abstract readonly code: ChatErrorCode;

    sessionId?: string;

    protected constructor(httpCode: number, message: string) {
        super(httpCode, message);
        Object.setPrototypeOf(this, new.target.prototype);
        this.name = new.target.name;
    }

    withSession(sessionId: string): this {
        this.sessionId = sessionId;
        return this;
    }
}

export class ValidationError extends ChatError {
    readonly code = 'validation_error';

    constructor(message: string) {
        super(400, message);
    }
}

export class ContextOverflowError extends ChatError {
    readonly code = 'context_overflow';

    constructor(
        readonly requiredTokens: number,
        readonly availableTokens: number,
    ) {
        super(
            413,
            `Message is too long: it needs about ${requiredTokens} tokens but only ${availableTokens} fit in the context window`,
        );
    }
}

export class BackendUnavailableError extends ChatError {
    readonly code = 'backend_unavailable';

    constructor(
        message: string,
        readonly attempts: number,
    ) {
        super(503, message);
    }
}

export class BackendError extends ChatError {
    readonly code = 'backend_error';

    constructor(
        readonly backendStatus: number,
        message: string,
    ) {
        super(502, message);
    }
}

export class TimeoutError extends ChatError {
    readonly code = 'timeout';

    constructor(message: string) {
        super(504, message);
    }
}

export class CancelledError extends ChatError {
    readonly code = 'cancelled';

    constructor(message: string) {
        super(499, message);
    }
}
