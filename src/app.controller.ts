import { Controller, Get, Inject } from '@nestjs/common';
import { ChatMemoryService } from './logic/chat-memory/chat-memory.service';
import { DocumentsService } from './logic/documents/documents.service';
import { GENERATION_PROVIDER, GenerationProvider } from './logic/gemini/types';
import { SocketGateway } from './logic/socket-gateway/socket.gateway';

@Controller()
export class AppController {
  constructor(
    private readonly documentsService: DocumentsService,
    private readonly chatMemoryService: ChatMemoryService,
    private readonly socketGateway: SocketGateway,
    @Inject(GENERATION_PROVIDER) private readonly generator: GenerationProvider,
  ) {}

  @Get()
  getHello(): string {
    return 'Course tutor API is running';
  }

  @Get('health')
  getHealth() {
    return {
      status: 'ok',
      index: this.documentsService.indexStats(),
      generation: this.generator.isAvailable ? 'model' : 'fallback',
      activeSessions: this.chatMemoryService.sessionCount,
      activeQueries: this.socketGateway.activeQueries,
    };
  }
}
