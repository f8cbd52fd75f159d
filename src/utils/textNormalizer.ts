export type ChunkCandidate = {
    ordinal: number;
    text: string;
    charStart: number;
    charEnd: number;
};

export type ChunkOptions = {
    chunkSize: number;
    chunkOverlap: number;
};

export type ChunkStatistics = {
    totalChunks: number;
    totalCharacters: number;
    averageChunkSize: number;
    minChunkSize: number;
    maxChunkSize: number;
};

type Span = { start: number; end: number };

// terminal punctuation followed by whitespace or end of text; the whitespace stays with the sentence
const SENTENCE_END = /[.!?]+(?:\s+|$)/g;

export function normalizeText(s: string): string {
    return s
      .replace(/\r\n/g, "\n")
      .replace(/\t/g, "  ")
      .replace(/[ \u00A0]+/g, " ")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }

/**
 * Splits text into sentence spans that tile it exactly: every character
 * belongs to one span and spans are in document order.
 */
export function splitIntoSentences(text: string): Span[] {
    const spans: Span[] = [];
    let start = 0;
    for (const match of text.matchAll(SENTENCE_END)) {
        const end = (match.index ?? 0) + match[0].length;
        if (end > start) {
            spans.push({ start, end });
            start = end;
        }
    }
    if (start < text.length) spans.push({ start, end: text.length });
    return spans;
}

/**
 * Greedy sentence-respecting chunker.
 *
 * Sentences are accumulated while the chunk stays within `chunkSize`. Each new
 * chunk re-opens with the trailing whole sentences of the previous one whose
 * combined length fits in `chunkOverlap`. A sentence longer than `chunkSize`
 * becomes a chunk of its own; nothing is ever truncated.
 *
 * Chunk text is always the verbatim slice `text.slice(charStart, charEnd)`.
 */
export function chunkText(text: string, opts: ChunkOptions): ChunkCandidate[] {
    const { chunkSize, chunkOverlap } = opts;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
        throw new RangeError(`chunkOverlap must be in [0, ${chunkSize}), got ${chunkOverlap}`);
    }
    if (!text.trim()) return [];

    const sentences = splitIntoSentences(text);
    const groups: Span[][] = [];
    let current: Span[] = [];

    for (const sentence of sentences) {
        if (current.length === 0 || sentence.end - current[0].start <= chunkSize) {
            current.push(sentence);
            continue;
        }
        groups.push(current);
        current = [...overlapTail(current, chunkOverlap), sentence];
        while (current.length > 1 && sentence.end - current[0].start > chunkSize) {
            current.shift();
        }
    }
    if (current.length > 0) groups.push(current);

    return groups.map((group, ordinal) => {
        const charStart = group[0].start;
        const charEnd = group[group.length - 1].end;
        return { ordinal, text: text.slice(charStart, charEnd), charStart, charEnd };
    });
}

function overlapTail(group: Span[], budget: number): Span[] {
    const tail: Span[] = [];
    let used = 0;
    for (let i = group.length - 1; i >= 0; i--) {
        const length = group[i].end - group[i].start;
        if (used + length > budget) break;
        used += length;
        tail.unshift(group[i]);
    }
    return tail;
}

export function chunkStatistics(chunks: ReadonlyArray<Pick<ChunkCandidate, 'text'>>): ChunkStatistics {
    if (chunks.length === 0) {
        return { totalChunks: 0, totalCharacters: 0, averageChunkSize: 0, minChunkSize: 0, maxChunkSize: 0 };
    }
    const sizes = chunks.map(c => c.text.length);
    const totalCharacters = sizes.reduce((sum, size) => sum + size, 0);
    return {
        totalChunks: chunks.length,
        totalCharacters,
        averageChunkSize: totalCharacters / chunks.length,
        minChunkSize: Math.min(...sizes),
        maxChunkSize: Math.max(...sizes),
    };
}
