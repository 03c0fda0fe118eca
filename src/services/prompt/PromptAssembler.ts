import { Inject, Service } from 'typedi';
import { AppConfig, AppConfigToken, ContextLimits } from '../../config';
import { ContextOverflowError } from '../../errors/ChatError';
import { GenerationRequest, PromptMessage, Turn } from '../../types/chat';
import { renderSystemPrompt } from '../../utils/systemPrompt';
import { estimateTokens } from '../../utils/tokens';

export interface PromptOptions {
    limits: ContextLimits;
    systemPrompt: string;
    maxTokens: number;
    temperature: number;
    topP: number;
}

export function messageBudget(limits: ContextLimits): number {
    return limits.maxContextTokens - limits.systemReserve - limits.responseReserve;
}

/**
 * Builds the chat-completion payload for one exchange.
 *
 * History is kept from the newest turn backwards while it fits the message
 * budget; the first turn that does not fit ends the walk, so the kept history
 * is always a contiguous tail. The new user message is always last.
 */
export function buildGenerationRequest(
    transcript: readonly Turn[],
    newUserText: string,
    options: PromptOptions,
): GenerationRequest {
    const budget = messageBudget(options.limits);
    const userTokens = estimateTokens(newUserText);
    if (userTokens > budget) {
        throw new ContextOverflowError(userTokens, budget);
    }

    let used = userTokens;
    let firstKept = transcript.length;
    while (firstKept > 0) {
        const tokens = estimateTokens(transcript[firstKept - 1].text);
        if (used + tokens > budget) {
            break;
        }
        used += tokens;
        firstKept--;
    }

    const history: PromptMessage[] = transcript
        .slice(firstKept)
        .map((turn) => ({ role: turn.role, content: turn.text }));

    return {
        messages: [
            { role: 'system', content: renderSystemPrompt(options.systemPrompt, options.maxTokens) },
            ...history,
            { role: 'user', content: newUserText },
        ],
        maxTokens: options.maxTokens,
        temperature: options.temperature,
        topP: options.topP,
        estimatedTokens: used,
        droppedTurns: firstKept,
    };
}

@Service()
export class PromptAssembler {
    constructor(@Inject(AppConfigToken) private readonly config: AppConfig) {}

    /** Clamps a per-request override into the configured range. */
    resolveMaxTokens(requested?: number): number {
        const { minTokens, maxTokens, defaultMaxTokens } = this.config.prompt;
        if (requested === undefined) {
            return defaultMaxTokens;
        }
        return Math.min(maxTokens, Math.max(minTokens, Math.floor(requested)));
    }

    build(transcript: readonly Turn[], newUserText: string, requestedMaxTokens?: number): GenerationRequest {
        const { limits, systemPrompt, temperature, topP } = this.config.prompt;
        return buildGenerationRequest(transcript, newUserText, {
            limits,
            systemPrompt,
            maxTokens: this.resolveMaxTokens(requestedMaxTokens),
            temperature,
            topP,
        });
    }
}
