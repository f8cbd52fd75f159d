import { Controller, Post, Body, Get, Delete, Param, HttpCode, HttpStatus } from '@nestjs/common';
import { ChatService } from './chat.service';
import { AskQuestionDto } from './dto/ask-question.dto';
import { toHttpException } from '../../utils/errors';

@Controller('chat')
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    /** Same pipeline as the socket, answered in one response once the query finishes. */
    @Post()
    @HttpCode(HttpStatus.OK)
    async chat(@Body() body: AskQuestionDto) {
        const outcome = await this.chatService.ask(body, () => undefined);
        if (outcome.status === 'failed') throw toHttpException(outcome.error);
        if (outcome.status === 'cancelled') throw toHttpException(new Error('query was cancelled'));
        return {
            queryId: outcome.queryId,
            sessionId: body.sessionId,
            answer: outcome.answer,
            fallback: outcome.fallback,
            grounded: outcome.grounded,
            sources: outcome.sources,
        };
    }

    @Get(':sessionId/history')
    async getHistory(@Param('sessionId') sessionId: string) {
        return { sessionId, history: await this.chatService.getHistory(sessionId) };
    }

    @Delete(':sessionId/history')
    async clearHistory(@Param('sessionId') sessionId: string) {
        return { sessionId, cleared: await this.chatService.clearHistory(sessionId) };
    }

    @Get(':sessionId/suggestions')
    async getSuggestions(@Param('sessionId') sessionId: string) {
        return { sessionId, suggestions: await this.chatService.getSuggestions(sessionId) };
    }
}
