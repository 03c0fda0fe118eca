import { NextFunction, Request, Response } from 'express';
import { ValidationError as ConstraintViolation } from 'class-validator';
import { ExpressErrorMiddlewareInterface, HttpError, Middleware } from 'routing-controllers';
import { Service } from 'typedi';
import { ChatError } from '../errors/ChatError';
import { createLogger } from '../utils/logger';

const logger = createLogger('ERROR_HANDLER');

export interface ErrorBody {
    error: string;
    code: string;
    session_id?: string;
    details?: string[];
}

@Service()
@Middleware({ type: 'after' })
export class ErrorHandler implements ExpressErrorMiddlewareInterface {
    error(error: unknown, request: Request, response: Response, next: NextFunction): void {
        if (response.headersSent) {
            next(error);
            return;
        }

        const { status, body } = renderError(error);
        if (status >= 500 && !(error instanceof ChatError)) {
            logger.error(`Unhandled error on ${request.method} ${request.path}`, error);
        }
        response.status(status).json(body);
    }
}

export function renderError(error: unknown): { status: number; body: ErrorBody } {
    if (error instanceof ChatError) {
        const body: ErrorBody = { error: error.message, code: error.code };
        if (error.sessionId) {
            body.session_id = error.sessionId;
        }
        return { status: error.httpCode, body };
    }

    if (error instanceof HttpError) {
        const violations = constraintMessages(error);
        if (violations.length > 0) {
            return {
                status: 400,
                body: { error: 'Invalid request body', code: 'validation_error', details: violations },
            };
        }
        return {
            status: error.httpCode,
            body: { error: error.message, code: error.httpCode === 404 ? 'not_found' : 'http_error' },
        };
    }

    return { status: 500, body: { error: 'Internal server error', code: 'internal_error' } };
}

function constraintMessages(error: HttpError): string[] {
    if (!('errors' in error) || !Array.isArray(error.errors)) {
        return [];
    }
    return error.errors
        .filter((entry): entry is ConstraintViolation => entry instanceof ConstraintViolation)
        .flatMap((entry) => Object.values(entry.constraints ?? {}));
}
