import { Chunk, ScoredChunk } from '../../utils/types';

export const VECTOR_INDEX = Symbol('VECTOR_INDEX');

export interface VectorIndexStats {
    chunkCount: number;
    documentCount: number;
    dimension?: number;
}

/**
 * Chunk store searched by embedding similarity. Implementations must make
 * each `insert` batch visible atomically: a concurrent `query` sees either
 * none or all of it.
 */
export interface VectorIndex {
    insert(chunks: Chunk[]): Promise<void>;
    query(embedding: number[], k: number, minScore: number): Promise<ScoredChunk[]>;
    /** Returns the number of chunks removed. */
    deleteByDocument(documentId: string): Promise<number>;
    stats(): VectorIndexStats;
}

function dot(a: number[], b: number[]): number {
    let s = 0;
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) s += a[i] * b[i];
    return s;
}

/** Cosine similarity in [-1, 1]; 0 when either vector has zero norm. */
function cosineSimilarity(a: number[], b: number[]): number {
    const na = Math.sqrt(dot(a, a));
    const nb = Math.sqrt(dot(b, b));
    if (na === 0 || nb === 0) return 0;
    return dot(a, b) / (na * nb);
}

/** Cosine rescaled to [0, 1]; zero-norm vectors score 0 rather than 0.5. */
export function similarityScore(a: number[], b: number[]): number {
    if (dot(a, a) === 0 || dot(b, b) === 0) return 0;
    return Math.min(1, Math.max(0, (1 + cosineSimilarity(a, b)) / 2));
}

export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
    if (b.score !== a.score) return b.score - a.score;
    if (a.chunk.documentId !== b.chunk.documentId) return a.chunk.documentId < b.chunk.documentId ? -1 : 1;
    return a.chunk.ordinal - b.chunk.ordinal;
}
