import { ServerResponse } from 'node:http';
import { IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { Body, Delete, Get, JsonController, NotFoundError, Param, Post, Res } from 'routing-controllers';
import { Service } from 'typedi';
import { ChatService } from '../services/ChatService';
import { SessionView } from '../types/chat';
import { createLogger } from '../utils/logger';

const logger = createLogger('CHAT_CONTROLLER');

export class ChatRequest {
    @IsString()
    message!: string;

    @IsOptional()
    @IsString()
    @MaxLength(128)
    session_id?: string | null;

    @IsOptional()
    @IsInt()
    @Min(1)
    max_tokens?: number;
}

export interface ChatResponse {
    response: string;
    session_id: string;
}

@Service()
@JsonController('/api')
export class ChatController {
    constructor(private readonly chatService: ChatService) {}

    @Post('/chat')
    async chat(@Body() body: ChatRequest, @Res() response: ServerResponse): Promise<ChatResponse> {
        // A client that hangs up stops the backend call; its user turn is already recorded.
        const controller = new AbortController();
        const onClose = () => {
            if (!response.writableEnded) {
                logger.info('Client disconnected before the reply was ready');
                controller.abort();
            }
        };
        response.once('close', onClose);

        try {
            const outcome = await this.chatService.handleChat(
                {
                    message: body.message,
                    sessionId: body.session_id,
                    maxTokens: body.max_tokens,
                },
                { signal: controller.signal },
            );
            if (!outcome.ok) {
                throw outcome.error;
            }
            logger.info('Chat reply sent', {
                sessionId: outcome.reply.sessionId,
                characters: outcome.reply.response.length,
            });
            return { response: outcome.reply.response, session_id: outcome.reply.sessionId };
        } finally {
            response.removeListener('close', onClose);
        }
    }

    @Get('/sessions/:sessionId')
    getSession(@Param('sessionId') sessionId: string): SessionView {
        const view = this.chatService.getSession(sessionId);
        if (!view) {
            throw new NotFoundError(`Session ${sessionId} not found`);
        }
        return view;
    }

    @Delete('/sessions/:sessionId')
    deleteSession(@Param('sessionId') sessionId: string): { status: 'deleted' } {
        if (!this.chatService.deleteSession(sessionId)) {
            throw new NotFoundError(`Session ${sessionId} not found`);
        }
        return { status: 'deleted' };
    }
}
