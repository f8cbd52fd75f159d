export enum SourceFormat {
    TEXT = 'text',
    MARKDOWN = 'markdown',
    PDF = 'pdf',
    DOCX = 'docx',
}

const SOURCE_FORMATS: readonly string[] = Object.values(SourceFormat);

export function isSourceFormat(value: unknown): value is SourceFormat {
    return typeof value === 'string' && SOURCE_FORMATS.includes(value);
}

export interface ChunkMetadata {
    charStart: number;
    charEnd: number;
    documentFilename: string;
    sourceFormat: SourceFormat;
}

export interface Chunk {
    id: string;
    documentId: string;
    ordinal: number;
    text: string;
    embedding: number[];
    metadata: ChunkMetadata;
}

export interface ScoredChunk {
    chunk: Chunk;
    score: number;
}

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
    role: TurnRole;
    content: string;
    timestamp: number;
}

export interface ChatRequest {
    question: string;
    sessionId: string;
}

export interface SourceReference {
    chunkId: string;
    documentId: string;
    filename: string;
    score: number;
}

/** Prompt pieces handed to the generation model; assembled by `buildTutorPrompt`. */
export interface TutorPrompt {
    system: string;
    user: string;
    history: ConversationTurn[];
    grounded: boolean;
}

interface EventBase {
    queryId: string;
    timestamp: string;
}

export type TutorEvent =
    | (EventBase & { type: 'processing' })
    | (EventBase & { type: 'context' })
    | (EventBase & { type: 'context_found'; count: number })
    | (EventBase & { type: 'generating' })
    | (EventBase & { type: 'chunk'; content: string })
    | (EventBase & { type: 'complete'; content: string; fallback: boolean; grounded: boolean; sources: SourceReference[] })
    | (EventBase & { type: 'error'; code: string; message: string });

export type TutorEventSink = (event: TutorEvent) => void;
