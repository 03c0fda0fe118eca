import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError, ClientOptions } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { Inject, Service } from 'typedi';
import { AppConfig, AppConfigToken } from '../../config';
import { GenerationRequest, PromptMessage } from '../../types/chat';
import { createLogger } from '../../utils/logger';
import { asInferenceFault, InferenceFault } from './InferenceFault';
import { InferenceBackend } from './types';

const logger = createLogger('INFERENCE_BACKEND');

/** Overrides for the HTTP layer underneath the SDK client. */
export type BackendTransport = Pick<ClientOptions, 'fetch'>;

/**
 * Talks to a local OpenAI-compatible server (`{base}/v1/chat/completions`).
 * SDK-level retries are off: the InferenceClient owns retry and timeout policy.
 */
@Service()
export class OpenAiCompatibleBackend implements InferenceBackend {
    private readonly client: OpenAI;
    private readonly model: string;

    constructor(@Inject(AppConfigToken) config: AppConfig, transport: BackendTransport = {}) {
        this.model = config.inference.model;
        this.client = new OpenAI({
            ...transport,
            apiKey: config.inference.apiKey,
            baseURL: `${config.inference.baseUrl}/v1`,
            maxRetries: 0,
            timeout: config.inference.timeoutMs,
        });
        logger.info(`Using inference server at ${config.inference.baseUrl}`, { model: this.model });
    }

    async complete(request: GenerationRequest, signal: AbortSignal): Promise<string> {
        try {
            const completion = await this.client.chat.completions.create(
                {
                    model: this.model,
                    messages: request.messages.map(toCompletionMessage),
                    max_tokens: request.maxTokens,
                    temperature: request.temperature,
                    top_p: request.topP,
                },
                { signal },
            );

            const content = completion.choices[0]?.message?.content;
            if (!content) {
                throw new InferenceFault('invalid-response', 'Inference server returned no completion text', 502);
            }
            logger.debug('Completion received', {
                characters: content.length,
                usage: completion.usage ?? null,
            });
            return content;
        } catch (error) {
            throw toInferenceFault(error);
        }
    }

    async ping(signal: AbortSignal): Promise<void> {
        try {
            await this.client.models.list({ signal });
        } catch (error) {
            throw toInferenceFault(error);
        }
    }
}

function toCompletionMessage(message: PromptMessage): ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
        default:
            return { role: 'user', content: message.content };
    }
}

/** Sorts whatever the SDK threw into the fault kinds the retry policy understands. */
export function toInferenceFault(error: unknown): InferenceFault {
    if (error instanceof APIUserAbortError) {
        return new InferenceFault('aborted', 'Request to the inference server was aborted', undefined, { cause: error });
    }
    if (error instanceof APIConnectionTimeoutError) {
        return new InferenceFault('timeout', 'Inference server request timed out', undefined, { cause: error });
    }
    if (error instanceof APIConnectionError) {
        return new InferenceFault('connection', describeCause(error), undefined, { cause: error });
    }
    if (error instanceof APIError) {
        return new InferenceFault('http', error.message, error.status ?? 502, { cause: error });
    }
    return asInferenceFault(error);
}

function describeCause(error: Error): string {
    return error.cause instanceof Error ? `${error.message} (${error.cause.message})` : error.message;
}
