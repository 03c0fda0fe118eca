import { Token } from 'typedi';
import { z } from 'zod';
import { createLogger, LogLevel } from './utils/logger';
import { renderSystemPrompt } from './utils/systemPrompt';
import { estimateTokens } from './utils/tokens';

const logger = createLogger('CONFIG');

const DEFAULT_SYSTEM_PROMPT =
    'You are a helpful AI assistant. When responding to the user, please be thorough and detailed in your explanations. ' +
    'Aim to use close to the maximum token length of {{max_tokens}} tokens when appropriate for the question.';

// Space left for conversation messages once both reserves are taken out.
const MIN_MESSAGE_SPACE = 100;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const trimmedString = (fallback: string) =>
    z
        .string()
        .trim()
        .optional()
        .transform((value) => (value ? value : fallback));

const envSchema = z
    .object({
        HOST: trimmedString('127.0.0.1'),
        PORT: z.coerce.number().int().min(1).max(65535).default(8080),
        LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

        INFERENCE_SERVER_URL: trimmedString('http://localhost:8081').pipe(z.string().url()),
        INFERENCE_MODEL: trimmedString('local-model'),
        INFERENCE_API_KEY: trimmedString('not-needed'),
        INFERENCE_TIMEOUT_MS: positiveInt(60_000),
        INFERENCE_MAX_RETRIES: nonNegativeInt(2),
        INFERENCE_RETRY_DELAY_MS: nonNegativeInt(500),
        INFERENCE_RETRY_BACKOFF: z.coerce.number().min(1).default(2),
        INFERENCE_RETRY_MAX_DELAY_MS: nonNegativeInt(4_000),
        CHAT_REQUEST_DEADLINE_MS: positiveInt(150_000),
        HEALTH_PROBE_TIMEOUT_MS: positiveInt(2_000),

        MAX_CONTEXT_WINDOW: positiveInt(4096),
        SYSTEM_MESSAGE_RESERVE: nonNegativeInt(200),
        RESPONSE_RESERVE: nonNegativeInt(500),
        MIN_TOKENS: positiveInt(100),
        MAX_TOKENS: positiveInt(4096),
        DEFAULT_MAX_TOKENS: positiveInt(512),
        TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
        TOP_P: z.coerce.number().gt(0).max(1).default(0.95),
        SYSTEM_PROMPT: trimmedString(DEFAULT_SYSTEM_PROMPT),

        SESSION_IDLE_TIMEOUT_MS: positiveInt(30 * 60_000),
        SESSION_SWEEP_INTERVAL_MS: positiveInt(60_000),
    })
    .superRefine((env, ctx) => {
        if (env.MIN_TOKENS > env.MAX_TOKENS) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['MIN_TOKENS'],
                message: `MIN_TOKENS (${env.MIN_TOKENS}) must not exceed MAX_TOKENS (${env.MAX_TOKENS})`,
            });
        }
        if (env.MAX_TOKENS > env.MAX_CONTEXT_WINDOW) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['MAX_TOKENS'],
                message: `MAX_TOKENS (${env.MAX_TOKENS}) must not exceed MAX_CONTEXT_WINDOW (${env.MAX_CONTEXT_WINDOW})`,
            });
        }
        if (env.DEFAULT_MAX_TOKENS < env.MIN_TOKENS || env.DEFAULT_MAX_TOKENS > env.MAX_TOKENS) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['DEFAULT_MAX_TOKENS'],
                message: `DEFAULT_MAX_TOKENS (${env.DEFAULT_MAX_TOKENS}) must lie between MIN_TOKENS and MAX_TOKENS`,
            });
        }
        const messageSpace = env.MAX_CONTEXT_WINDOW - env.SYSTEM_MESSAGE_RESERVE - env.RESPONSE_RESERVE;
        if (messageSpace < MIN_MESSAGE_SPACE) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['MAX_CONTEXT_WINDOW'],
                message: `Only ${messageSpace} tokens remain for messages after SYSTEM_MESSAGE_RESERVE and RESPONSE_RESERVE; at least ${MIN_MESSAGE_SPACE} are required`,
            });
        }
        // Rendered with the largest max_tokens a request can ask for.
        const systemTokens = estimateTokens(renderSystemPrompt(env.SYSTEM_PROMPT, env.MAX_TOKENS));
        if (systemTokens > env.SYSTEM_MESSAGE_RESERVE) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SYSTEM_PROMPT'],
                message: `SYSTEM_PROMPT needs about ${systemTokens} tokens but SYSTEM_MESSAGE_RESERVE is ${env.SYSTEM_MESSAGE_RESERVE}`,
            });
        }
    });

export interface ContextLimits {
    maxContextTokens: number;
    systemReserve: number;
    responseReserve: number;
}

export interface AppConfig {
    server: {
        host: string;
        port: number;
    };
    logLevel: LogLevel;
    inference: {
        baseUrl: string;
        model: string;
        apiKey: string;
        timeoutMs: number;
        maxRetries: number;
        retryDelayMs: number;
        retryBackoff: number;
        retryMaxDelayMs: number;
        requestDeadlineMs: number;
        probeTimeoutMs: number;
    };
    prompt: {
        limits: ContextLimits;
        minTokens: number;
        maxTokens: number;
        defaultMaxTokens: number;
        temperature: number;
        topP: number;
        systemPrompt: string;
    };
    sessions: {
        idleTimeoutMs: number;
        sweepIntervalMs: number;
    };
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
        this.name = 'ConfigError';
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        const error = new ConfigError(issues);
        logger.error(error.message);
        throw error;
    }

    const values = parsed.data;
    return Object.freeze({
        server: {
            host: values.HOST,
            port: values.PORT,
        },
        logLevel: values.LOG_LEVEL,
        inference: {
            baseUrl: values.INFERENCE_SERVER_URL.replace(/\/+$/, ''),
            model: values.INFERENCE_MODEL,
            apiKey: values.INFERENCE_API_KEY,
            timeoutMs: values.INFERENCE_TIMEOUT_MS,
            maxRetries: values.INFERENCE_MAX_RETRIES,
            retryDelayMs: values.INFERENCE_RETRY_DELAY_MS,
            retryBackoff: values.INFERENCE_RETRY_BACKOFF,
            retryMaxDelayMs: values.INFERENCE_RETRY_MAX_DELAY_MS,
            requestDeadlineMs: values.CHAT_REQUEST_DEADLINE_MS,
            probeTimeoutMs: values.HEALTH_PROBE_TIMEOUT_MS,
        },
        prompt: {
            limits: {
                maxContextTokens: values.MAX_CONTEXT_WINDOW,
                systemReserve: values.SYSTEM_MESSAGE_RESERVE,
                responseReserve: values.RESPONSE_RESERVE,
            },
            minTokens: values.MIN_TOKENS,
            maxTokens: values.MAX_TOKENS,
            defaultMaxTokens: values.DEFAULT_MAX_TOKENS,
            temperature: values.TEMPERATURE,
            topP: values.TOP_P,
            systemPrompt: values.SYSTEM_PROMPT,
        },
        sessions: {
            idleTimeoutMs: values.SESSION_IDLE_TIMEOUT_MS,
            sweepIntervalMs: values.SESSION_SWEEP_INTERVAL_MS,
        },
    });
}

export const AppConfigToken = new Token<AppConfig>('app-config');
