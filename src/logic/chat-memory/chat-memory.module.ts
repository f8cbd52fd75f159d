import { Module } from '@nestjs/common';
import { ChatMemoryService } from './chat-memory.service';
import { CONVERSATION_STORE } from './types';

@Module({
  providers: [ChatMemoryService, { provide: CONVERSATION_STORE, useExisting: ChatMemoryService }],
  exports: [ChatMemoryService, CONVERSATION_STORE],
})
export class ChatMemoryModule {}
