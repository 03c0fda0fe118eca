export type TurnRole = 'user' | 'assistant';

export type PromptRole = 'system' | TurnRole;

export interface Turn {
    readonly role: TurnRole;
    readonly text: string;
    readonly timestamp: Date;
}

export interface Session {
    readonly id: string;
    readonly createdAt: Date;
    lastActiveAt: Date;
}

export interface PromptMessage {
    role: PromptRole;
    content: string;
}

export interface GenerationRequest {
    messages: PromptMessage[];
    maxTokens: number;
    temperature: number;
    topP: number;
    /** Estimated tokens of the conversation messages, system prompt excluded. */
    estimatedTokens: number;
    droppedTurns: number;
}

export interface ChatInput {
    message: string;
    sessionId?: string | null;
    maxTokens?: number;
}

export interface ChatReply {
    response: string;
    sessionId: string;
}

export interface SessionView {
    session_id: string;
    created_at: string;
    last_active_at: string;
    history: {
        role: TurnRole;
        text: string;
        timestamp: string;
    }[];
}
