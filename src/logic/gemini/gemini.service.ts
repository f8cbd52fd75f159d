import { Inject, Injectable, Logger } from '@nestjs/common';
import { Content, GoogleGenAI } from '@google/genai';
import { TUTOR_CONFIG, TutorConfig } from '../../utils/config';
import { EmbeddingUnavailableError, GenerationUnavailableError, TutorError, describeError } from '../../utils/errors';
import { TutorPrompt } from '../../utils/types';
import { EmbeddingProvider, GenerationProvider } from './types';

@Injectable()
export class GeminiService implements EmbeddingProvider, GenerationProvider {
    private readonly logger = new Logger(GeminiService.name);
    private readonly genAI?: GoogleGenAI;

    constructor(@Inject(TUTOR_CONFIG) private readonly config: TutorConfig) {
        const { apiKey } = config.gemini;
        if (apiKey) {
            this.genAI = new GoogleGenAI({ apiKey });
        } else {
            this.logger.warn('GEMINI_API_KEY is not set; embeddings are unavailable and answers use the fallback template');
        }
    }

    get isAvailable(): boolean {
        return this.genAI !== undefined;
    }

    async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        if (texts.length === 0) return [];
        const genAI = this.genAI;
        if (!genAI) throw new EmbeddingUnavailableError('no API key configured');

        const { embedModel } = this.config.gemini;
        const batchSize = this.config.embeddingBatchSize;
        const vectors: number[][] = [];

        for (let i = 0; i < texts.length; i += batchSize) {
            const batch = texts.slice(i, i + batchSize);
            try {
                const result = await genAI.models.embedContent({
                    model: embedModel,
                    contents: batch,
                    config: {
                        abortSignal: signal,
                        outputDimensionality: this.config.embeddingDimension,
                    },
                });
                const embeddings = (result.embeddings ?? [])
                    .map(item => item?.values)
                    .filter((values): values is number[] => Array.isArray(values) && values.length > 0);
                if (embeddings.length !== batch.length) {
                    throw new EmbeddingUnavailableError(`expected ${batch.length} vectors, got ${embeddings.length}`);
                }
                vectors.push(...embeddings);
            } catch (error) {
                if (error instanceof TutorError) throw error;
                this.logger.error(`Error generating embeddings: ${describeError(error)}`);
                throw new EmbeddingUnavailableError(describeError(error), error);
            }
        }
        return vectors;
    }

    async *streamAnswer(prompt: TutorPrompt, signal: AbortSignal): AsyncIterable<string> {
        const genAI = this.genAI;
        if (!genAI) throw new GenerationUnavailableError('no API key configured');

        const { chatModel, temperature, maxOutputTokens } = this.config.gemini;
        try {
            const stream = await genAI.models.generateContentStream({
                model: chatModel,
                contents: toContents(prompt),
                config: { temperature, maxOutputTokens, abortSignal: signal },
            });
            for await (const chunk of stream) {
                const text = chunk.text;
                if (text) yield text;
            }
        } catch (error) {
            if (signal.aborted) throw error;
            this.logger.error(`Error streaming answer: ${describeError(error)}`);
            throw new GenerationUnavailableError(describeError(error), error);
        }
    }
}

/**
 * Gemini has no system role: the system prompt goes in a preamble (first user
 * turn) and assistant turns map to 'model'.
 */
export function toContents(prompt: TutorPrompt): Content[] {
    const preamble = prompt.system.trim();
    const history: Content[] = prompt.history.map(turn => ({
        role: turn.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: turn.content }],
    }));
    return [
        ...(preamble ? [{ role: 'user', parts: [{ text: preamble }] }] : []),
        ...history,
        { role: 'user', parts: [{ text: prompt.user }] },
    ];
}
