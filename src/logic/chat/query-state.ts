import { TutorError } from '../../utils/errors';
import { SourceReference, TutorEvent, TutorEventSink } from '../../utils/types';

export enum QueryState {
    Received = 'received',
    EmbeddingQuery = 'embedding_query',
    Retrieving = 'retrieving',
    ContextFound = 'context_found',
    ContextEmpty = 'context_empty',
    Generating = 'generating',
    Streaming = 'streaming',
    Completed = 'completed',
    Failed = 'failed',
}

const TRANSITIONS: Record<QueryState, readonly QueryState[]> = {
    [QueryState.Received]: [QueryState.EmbeddingQuery, QueryState.Failed],
    [QueryState.EmbeddingQuery]: [QueryState.Retrieving, QueryState.Failed],
    [QueryState.Retrieving]: [QueryState.ContextFound, QueryState.ContextEmpty, QueryState.Failed],
    [QueryState.ContextFound]: [QueryState.Generating, QueryState.Failed],
    [QueryState.ContextEmpty]: [QueryState.Generating, QueryState.Failed],
    [QueryState.Generating]: [QueryState.Streaming, QueryState.Failed],
    // back to Generating when a replacement answer restarts the stream
    [QueryState.Streaming]: [QueryState.Generating, QueryState.Completed, QueryState.Failed],
    [QueryState.Completed]: [],
    [QueryState.Failed]: [],
};

export class IllegalTransitionError extends Error {
    constructor(readonly from: QueryState, readonly to: QueryState) {
        super(`Illegal query state transition ${from} -> ${to}`);
        this.name = 'IllegalTransitionError';
    }
}

export function canTransition(from: QueryState, to: QueryState): boolean {
    return TRANSITIONS[from].includes(to);
}

export function transition(from: QueryState, to: QueryState): QueryState {
    if (!canTransition(from, to)) throw new IllegalTransitionError(from, to);
    return to;
}

export function isTerminal(state: QueryState): boolean {
    return TRANSITIONS[state].length === 0;
}

export type CompletionDetails = {
    fallback: boolean;
    grounded: boolean;
    sources: SourceReference[];
};

/**
 * Drives one query through the state machine and turns state entries into
 * protocol events. Once cancelled or silenced, nothing more reaches the sink.
 */
export class QueryRun {
    private current = QueryState.Received;
    private text = '';
    private silenced = false;

    constructor(
        readonly queryId: string,
        private readonly sink: TutorEventSink,
        private readonly clock: () => Date = () => new Date(),
    ) {}

    get state(): QueryState {
        return this.current;
    }

    /** Verbatim concatenation of every streamed fragment. */
    get answer(): string {
        return this.text;
    }

    get isTerminal(): boolean {
        return isTerminal(this.current);
    }

    accept(): void {
        this.emit({ type: 'processing', ...this.stamp() });
    }

    beginEmbedding(): void {
        this.moveTo(QueryState.EmbeddingQuery);
        this.emit({ type: 'context', ...this.stamp() });
    }

    beginRetrieval(): void {
        this.moveTo(QueryState.Retrieving);
    }

    contextResolved(count: number): void {
        this.moveTo(count > 0 ? QueryState.ContextFound : QueryState.ContextEmpty);
        this.emit({ type: 'context_found', count, ...this.stamp() });
    }

    beginGeneration(): void {
        this.moveTo(QueryState.Generating);
        this.emit({ type: 'generating', ...this.stamp() });
    }

    stream(fragment: string): void {
        if (!fragment) return;
        if (this.current === QueryState.Generating) this.moveTo(QueryState.Streaming);
        else if (this.current !== QueryState.Streaming) throw new IllegalTransitionError(this.current, QueryState.Streaming);
        this.text += fragment;
        this.emit({ type: 'chunk', content: fragment, ...this.stamp() });
    }

    /**
     * Drops accumulated text so a replacement answer can be streamed. When
     * fragments already went out, a fresh `generating` event tells the client
     * to discard them.
     */
    restartStream(): void {
        this.text = '';
        if (this.current === QueryState.Streaming) this.beginGeneration();
    }

    complete(details: CompletionDetails): void {
        this.moveTo(QueryState.Completed);
        this.emit({ type: 'complete', content: this.text, ...details, ...this.stamp() });
    }

    fail(error: TutorError): void {
        this.moveTo(QueryState.Failed);
        this.emit({ type: 'error', code: error.code, message: error.publicMessage, ...this.stamp() });
    }

    /** Stops all further output; later state changes still happen but are not reported. */
    silence(): void {
        this.silenced = true;
    }

    cancel(): void {
        this.silenced = true;
        if (!this.isTerminal) this.moveTo(QueryState.Failed);
    }

    private moveTo(next: QueryState): void {
        this.current = transition(this.current, next);
    }

    private stamp() {
        return { queryId: this.queryId, timestamp: this.clock().toISOString() };
    }

    private emit(event: TutorEvent): void {
        if (!this.silenced) this.sink(event);
    }
}
