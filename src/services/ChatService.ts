import { Inject, Service } from 'typedi';
import { AppConfig, AppConfigToken } from '../config';
import {
    BackendError,
    BackendUnavailableError,
    CancelledError,
    ChatError,
    ContextOverflowError,
    TimeoutError,
    ValidationError,
} from '../errors/ChatError';
import { ChatInput, ChatReply, GenerationRequest, SessionView } from '../types/chat';
import { Clock, ClockToken } from '../utils/clock';
import { createLogger } from '../utils/logger';
import { InferenceClient } from './inference/InferenceClient';
import { InferenceFailure } from './inference/types';
import { PromptAssembler } from './prompt/PromptAssembler';
import { SessionRegistry } from './session/SessionRegistry';
import { TranscriptStore } from './session/TranscriptStore';

const logger = createLogger('CHAT_SERVICE');

export type ChatPhase =
    | 'received'
    | 'session-resolved'
    | 'context-built'
    | 'backend-called'
    | 'completed'
    | 'failed';

export type ChatOutcome = { ok: true; reply: ChatReply } | { ok: false; error: ChatError };

export interface ChatOptions {
    signal?: AbortSignal;
}

@Service()
export class ChatService {
    constructor(
        private readonly registry: SessionRegistry,
        private readonly transcripts: TranscriptStore,
        private readonly assembler: PromptAssembler,
        private readonly inference: InferenceClient,
        @Inject(AppConfigToken) private readonly config: AppConfig,
        @Inject(ClockToken) private readonly clock: Clock,
    ) {}

    async handleChat(input: ChatInput, options: ChatOptions = {}): Promise<ChatOutcome> {
        const deadlineAt = this.clock().getTime() + this.config.inference.requestDeadlineMs;
        this.trace('received', { requestedSessionId: input.sessionId ?? null });

        const { session, isNew } = this.registry.resolve(input.sessionId);
        this.trace('session-resolved', { sessionId: session.id, isNew });

        if (input.message.trim().length === 0) {
            return this.failed(new ValidationError('Message must not be empty').withSession(session.id));
        }

        // Snapshot, build and append run without yielding to the event loop, so a
        // concurrent request on this session sees either none or all of them.
        let request: GenerationRequest;
        try {
            request = this.assembler.build(this.transcripts.snapshot(session), input.message, input.maxTokens);
        } catch (error) {
            if (error instanceof ContextOverflowError) {
                return this.failed(error.withSession(session.id));
            }
            throw error;
        }
        this.transcripts.append(session, 'user', input.message);
        this.trace('context-built', {
            sessionId: session.id,
            messages: request.messages.length,
            estimatedTokens: request.estimatedTokens,
            droppedTurns: request.droppedTurns,
            maxTokens: request.maxTokens,
        });
        if (request.droppedTurns > 0) {
            logger.warn('Conversation history truncated to fit the context window', {
                sessionId: session.id,
                droppedTurns: request.droppedTurns,
            });
        }

        const result = await this.inference.generate(request, { signal: options.signal, deadlineAt });
        this.trace('backend-called', { sessionId: session.id, ok: result.ok });

        if (!result.ok) {
            return this.failed(toChatError(result.failure).withSession(session.id));
        }

        this.transcripts.append(session, 'assistant', result.text);
        this.trace('completed', { sessionId: session.id, attempts: result.attempts });
        return { ok: true, reply: { response: result.text, sessionId: session.id } };
    }

    getSession(sessionId: string): SessionView | undefined {
        const session = this.registry.get(sessionId);
        if (!session) {
            return undefined;
        }
        return {
            session_id: session.id,
            created_at: session.createdAt.toISOString(),
            last_active_at: session.lastActiveAt.toISOString(),
            history: this.transcripts.snapshot(session).map((turn) => ({
                role: turn.role,
                text: turn.text,
                timestamp: turn.timestamp.toISOString(),
            })),
        };
    }

    deleteSession(sessionId: string): boolean {
        return this.registry.delete(sessionId);
    }

    private failed(error: ChatError): ChatOutcome {
        this.trace('failed', { sessionId: error.sessionId, code: error.code });
        return { ok: false, error };
    }

    private trace(phase: ChatPhase, meta: Record<string, unknown>): void {
        logger.debug(`chat ${phase}`, meta);
    }
}

export function toChatError(failure: InferenceFailure): ChatError {
    switch (failure.kind) {
        case 'backend-unavailable':
            return new BackendUnavailableError(failure.message, failure.attempts);
        case 'backend-error':
            return new BackendError(failure.status, failure.message);
        case 'timeout':
            return new TimeoutError(failure.message);
        case 'cancelled':
            return new CancelledError(failure.message);
    }
}
