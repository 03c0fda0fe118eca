import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

let currentLevel: string = process.env.LOG_LEVEL?.trim() || 'info';
const instances = new Set<winston.Logger>();

/** Applies a level to every logger created so far and to those created later. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
    for (const instance of instances) {
        instance.level = level;
    }
}

export class Logger {
    private readonly winston: winston.Logger;

    constructor(context: string) {
        this.winston = winston.createLogger({
            level: currentLevel,
            silent: process.env.NODE_ENV === 'test',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json(),
            ),
            defaultMeta: { context },
            transports: [
                new winston.transports.Console({
                    format: winston.format.combine(
                        winston.format.colorize({ all: true }),
                        winston.format.timestamp(),
                        winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
                            const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
                            return `${timestamp} [${level}] [${context}] ${message}${extra}`;
                        }),
                    ),
                }),
            ],
        });
        instances.add(this.winston);
    }

    debug(message: string, meta?: Record<string, unknown>): void {
        this.winston.debug(message, meta);
    }

    info(message: string, meta?: Record<string, unknown>): void {
        this.winston.info(message, meta);
    }

    warn(message: string, meta?: Record<string, unknown>): void {
        this.winston.warn(message, meta);
    }

    error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
        if (error instanceof Error) {
            this.winston.error(message, { ...meta, error: error.message, stack: error.stack });
            return;
        }
        this.winston.error(message, error === undefined ? meta : { ...meta, error });
    }
}

export function createLogger(context: string): Logger {
    return new Logger(context);
}
