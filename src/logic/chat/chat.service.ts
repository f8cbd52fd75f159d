import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { TUTOR_CONFIG, TutorConfig } from '../../utils/config';
import { KeyedSerialQueue, withTimeout } from '../../utils/async';
import {
    EmbeddingUnavailableError,
    InvalidQueryError,
    TutorError,
    UpstreamTimeoutError,
    describeError,
    toTutorError,
} from '../../utils/errors';
import { ChatRequest, ConversationTurn, ScoredChunk, SourceReference, TutorEventSink, TutorPrompt } from '../../utils/types';
import { CONVERSATION_STORE, ConversationStore } from '../chat-memory/types';
import { EMBEDDING_PROVIDER, EmbeddingProvider, GENERATION_PROVIDER, GenerationProvider } from '../gemini/types';
import { VECTOR_INDEX, VectorIndex } from '../vector-index/vector-index';
import { buildTutorPrompt, fallbackAnswer, learningSuggestions, splitIntoFragments } from './prompt';
import { QueryRun } from './query-state';
import { QueryOutcome } from './types';

class QueryCancelled extends Error {
    constructor() {
        super('query cancelled by caller');
        this.name = 'QueryCancelled';
    }
}

const toSourceReference = ({ chunk, score }: ScoredChunk): SourceReference => ({
    chunkId: chunk.id,
    documentId: chunk.documentId,
    filename: chunk.metadata.documentFilename,
    score,
});

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);
    private readonly sessions = new KeyedSerialQueue();

    constructor(
        @Inject(TUTOR_CONFIG) private readonly config: TutorConfig,
        @Inject(EMBEDDING_PROVIDER) private readonly embedder: EmbeddingProvider,
        @Inject(GENERATION_PROVIDER) private readonly generator: GenerationProvider,
        @Inject(VECTOR_INDEX) private readonly index: VectorIndex,
        @Inject(CONVERSATION_STORE) private readonly memory: ConversationStore,
    ) {}

    /**
     * Answers one question, reporting progress through `emit`. Questions of the
     * same session run one after another; the returned promise settles with the
     * outcome and never rejects for query-level failures.
     */
    ask(request: ChatRequest, emit: TutorEventSink, signal?: AbortSignal): Promise<QueryOutcome> {
        const run = new QueryRun(uuidv4(), emit);
        return this.sessions.run(request.sessionId, () => this.answer(run, request, signal));
    }

    async getHistory(sessionId: string): Promise<ConversationTurn[]> {
        return this.memory.getRecentHistoryAsc(sessionId, this.config.maxHistoryTurns);
    }

    async clearHistory(sessionId: string): Promise<boolean> {
        return this.memory.clear(sessionId);
    }

    async getSuggestions(sessionId: string): Promise<string[]> {
        return learningSuggestions(await this.getHistory(sessionId));
    }

    private async answer(run: QueryRun, request: ChatRequest, signal?: AbortSignal): Promise<QueryOutcome> {
        if (signal?.aborted) return this.cancelled(run, request.sessionId, request.question);

        const question = request.question.trim();
        if (!question) return this.failed(run, new InvalidQueryError());

        const controller = new AbortController();
        const onAbort = () => {
            run.silence();
            controller.abort();
        };
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            run.accept();
            const history = await this.memory.getRecentHistoryAsc(request.sessionId, this.config.maxHistoryTurns);

            run.beginEmbedding();
            const embedding = await this.embedQuestion(question, controller);
            this.throwIfCancelled(signal);

            run.beginRetrieval();
            const results = await this.index.query(embedding, this.config.maxContextChunks, this.config.similarityThreshold);
            this.throwIfCancelled(signal);
            this.logger.log(`Query ${run.queryId}: ${results.length} context chunk(s) above ${this.config.similarityThreshold}`);
            run.contextResolved(results.length);

            const prompt = buildTutorPrompt(question, results, history);
            run.beginGeneration();
            const fallback = await this.generate(run, prompt, controller, signal);
            if (fallback) this.streamFallback(run, question, results.length);

            const now = Date.now();
            await this.memory.append(request.sessionId, [
                { role: 'user', content: question, timestamp: now },
                { role: 'assistant', content: run.answer, timestamp: now },
            ]);

            const sources = results.map(toSourceReference);
            const grounded = prompt.grounded;
            run.complete({ fallback, grounded, sources });
            return { status: 'completed', queryId: run.queryId, answer: run.answer, fallback, grounded, sources };
        } catch (err) {
            if (signal?.aborted) return this.cancelled(run, request.sessionId, question);
            return this.failed(run, err);
        } finally {
            signal?.removeEventListener('abort', onAbort);
            controller.abort();
        }
    }

    private async embedQuestion(question: string, controller: AbortController): Promise<number[]> {
        try {
            const [embedding] = await withTimeout(
                this.embedder.embedTexts([question], controller.signal),
                this.config.embeddingTimeoutMs,
                'embedding',
                () => controller.abort(),
            );
            if (!embedding || embedding.length === 0) throw new EmbeddingUnavailableError('no vector returned for the question');
            return embedding;
        } catch (err) {
            if (err instanceof TutorError) throw err;
            throw new EmbeddingUnavailableError(describeError(err), err);
        }
    }

    /**
     * Streams model output into `run`. Resolves true when the answer has to be
     * replaced by the fallback template; rethrows timeouts and cancellation.
     */
    private async generate(
        run: QueryRun,
        prompt: TutorPrompt,
        controller: AbortController,
        signal?: AbortSignal,
    ): Promise<boolean> {
        if (!this.generator.isAvailable) {
            this.logger.warn(`Query ${run.queryId}: generation model not configured, using fallback answer`);
            return true;
        }
        try {
            const iterator = this.generator.streamAnswer(prompt, controller.signal)[Symbol.asyncIterator]();
            for (;;) {
                const next = await withTimeout(
                    iterator.next(),
                    this.config.generationTimeoutMs,
                    'generation',
                    () => controller.abort(),
                );
                if (next.done) break;
                this.throwIfCancelled(signal);
                run.stream(next.value);
            }
            this.throwIfCancelled(signal);
        } catch (err) {
            if (err instanceof UpstreamTimeoutError || err instanceof QueryCancelled || signal?.aborted) throw err;
            this.logger.warn(`Query ${run.queryId}: generation failed (${describeError(err)}), using fallback answer`);
            return true;
        }
        if (!run.answer.trim()) {
            this.logger.warn(`Query ${run.queryId}: generation returned an empty answer, using fallback answer`);
            return true;
        }
        return false;
    }

    private streamFallback(run: QueryRun, question: string, contextCount: number): void {
        run.restartStream();
        for (const fragment of splitIntoFragments(fallbackAnswer(question, contextCount))) {
            run.stream(fragment);
        }
    }

    private throwIfCancelled(signal?: AbortSignal): void {
        if (signal?.aborted) throw new QueryCancelled();
    }

    private async cancelled(run: QueryRun, sessionId: string, question: string): Promise<QueryOutcome> {
        const partial = run.answer;
        run.cancel();
        this.logger.log(`Query ${run.queryId} cancelled`);
        if (this.config.persistPartialAnswers && question.trim() && partial.trim()) {
            const now = Date.now();
            await this.memory.append(sessionId, [
                { role: 'user', content: question.trim(), timestamp: now },
                { role: 'assistant', content: partial, timestamp: now },
            ]);
        }
        return { status: 'cancelled', queryId: run.queryId };
    }

    private failed(run: QueryRun, err: unknown): QueryOutcome {
        const error = toTutorError(err);
        if (error.code === 'Internal') {
            this.logger.error(`Query ${run.queryId} failed: ${error.message}`, err instanceof Error ? err.stack : undefined);
        } else {
            this.logger.warn(`Query ${run.queryId} failed with ${error.code}: ${error.message}`);
        }
        if (!run.isTerminal) run.fail(error);
        return { status: 'failed', queryId: run.queryId, error };
    }
}
