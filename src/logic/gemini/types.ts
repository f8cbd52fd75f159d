import { TutorPrompt } from '../../utils/types';

export const EMBEDDING_PROVIDER = Symbol('EMBEDDING_PROVIDER');
export const GENERATION_PROVIDER = Symbol('GENERATION_PROVIDER');

export interface EmbeddingProvider {
    /** One vector per input text, in input order. */
    embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface GenerationProvider {
    /** False when no credentials are configured; callers go straight to the fallback answer. */
    readonly isAvailable: boolean;
    streamAnswer(prompt: TutorPrompt, signal: AbortSignal): AsyncIterable<string>;
}
