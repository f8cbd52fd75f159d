import { Chunk, ScoredChunk } from '../../utils/types';
import { DimensionMismatchError } from '../../utils/errors';
import { VectorIndex, VectorIndexStats, compareScored, similarityScore } from './vector-index';

/**
 * Brute-force cosine index held in process memory. Writers build a new map
 * and swap it in, so readers always scan a complete snapshot.
 */
export class InMemoryVectorIndex implements VectorIndex {
    private snapshot: ReadonlyMap<string, Chunk> = new Map();

    constructor(private dimension?: number) {}

    async insert(chunks: Chunk[]): Promise<void> {
        if (chunks.length === 0) return;

        const dimension = this.dimension ?? chunks[0].embedding.length;
        if (dimension === 0) throw new RangeError('embedding vectors must not be empty');
        for (const chunk of chunks) {
            if (chunk.embedding.length !== dimension) {
                throw new DimensionMismatchError(dimension, chunk.embedding.length);
            }
        }

        const next = new Map(this.snapshot);
        for (const chunk of chunks) next.set(chunk.id, chunk);
        this.snapshot = next;
        this.dimension = dimension;
    }

    async query(embedding: number[], k: number, minScore: number): Promise<ScoredChunk[]> {
        const snapshot = this.snapshot;
        if (k <= 0 || snapshot.size === 0) return [];
        if (this.dimension !== undefined && embedding.length !== this.dimension) {
            throw new DimensionMismatchError(this.dimension, embedding.length);
        }

        const scored: ScoredChunk[] = [];
        for (const chunk of snapshot.values()) {
            const score = similarityScore(embedding, chunk.embedding);
            if (score >= minScore) scored.push({ chunk, score });
        }
        return scored.sort(compareScored).slice(0, k);
    }

    async deleteByDocument(documentId: string): Promise<number> {
        const next = new Map<string, Chunk>();
        for (const [id, chunk] of this.snapshot) {
            if (chunk.documentId !== documentId) next.set(id, chunk);
        }
        const removed = this.snapshot.size - next.size;
        if (removed > 0) this.snapshot = next;
        return removed;
    }

    stats(): VectorIndexStats {
        const documents = new Set<string>();
        for (const chunk of this.snapshot.values()) documents.add(chunk.documentId);
        return { chunkCount: this.snapshot.size, documentCount: documents.size, dimension: this.dimension };
    }
}
