import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { EMBEDDING_PROVIDER, GENERATION_PROVIDER } from './types';

@Module({
    exports: [GeminiService, EMBEDDING_PROVIDER, GENERATION_PROVIDER],
    providers: [
        GeminiService,
        { provide: EMBEDDING_PROVIDER, useExisting: GeminiService },
        { provide: GENERATION_PROVIDER, useExisting: GeminiService },
    ],
})
export class GeminiModule {}
