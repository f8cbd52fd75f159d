import { ConflictException, Inject, Injectable, Logger, NotFoundException, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CourseDocument, DocumentChunk } from '../../entities';
import { TUTOR_CONFIG, TutorConfig } from '../../utils/config';
import { KeyedSerialQueue, withTimeout } from '../../utils/async';
import {
  EmbeddingUnavailableError,
  EmptyDocumentError,
  TutorError,
  UnsupportedFormatError,
  describeError,
} from '../../utils/errors';
import { chunkText, normalizeText } from '../../utils/textNormalizer';
import { Chunk, isSourceFormat } from '../../utils/types';
import { EMBEDDING_PROVIDER, EmbeddingProvider } from '../gemini/types';
import { SocketGateway } from '../socket-gateway/socket.gateway';
import { VECTOR_INDEX, VectorIndex, VectorIndexStats } from '../vector-index/vector-index';
import { ChunkView, DocumentDetail, DocumentSummary, SearchHit } from './types';

@Injectable()
export class DocumentsService implements OnModuleInit {
  private readonly logger = new Logger(DocumentsService.name);
  // ingestion and deletion of one document id never overlap
  private readonly documentLocks = new KeyedSerialQueue();

  constructor(
    @Inject(TUTOR_CONFIG) private readonly config: TutorConfig,
    @Inject(EMBEDDING_PROVIDER) private readonly embedder: EmbeddingProvider,
    @Inject(VECTOR_INDEX) private readonly index: VectorIndex,
    @InjectRepository(CourseDocument)
    private readonly documentRepository: Repository<CourseDocument>,
    @InjectRepository(DocumentChunk)
    private readonly chunkRepository: Repository<DocumentChunk>,
    private readonly socketGateway: SocketGateway,
  ) {}

  async onModuleInit() {
    await this.hydrateIndex();
  }

  /** Rebuilds the in-memory index from the catalog, one document per batch. */
  async hydrateIndex(): Promise<number> {
    const documents = await this.documentRepository.find();
    const rows = await this.chunkRepository.find({ order: { documentId: 'ASC', ordinal: 'ASC' } });

    const byDocument = new Map<string, DocumentChunk[]>();
    for (const row of rows) {
      const list = byDocument.get(row.documentId) ?? [];
      list.push(row);
      byDocument.set(row.documentId, list);
    }

    let loaded = 0;
    for (const document of documents) {
      const chunks = (byDocument.get(document.id) ?? []).map(row => toChunk(row, document));
      if (chunks.length === 0) continue;
      try {
        await this.index.insert(chunks);
        loaded += chunks.length;
      } catch (err) {
        this.logger.error(`Could not index stored document ${document.id}: ${describeError(err)}`);
      }
    }
    this.logger.log(`Hydrated vector index with ${loaded} chunk(s) from ${documents.length} document(s)`);
    return loaded;
  }

  /**
   * Normalizes, chunks, embeds and indexes one document. All-or-nothing: a
   * failure leaves neither index entries nor catalog rows behind.
   */
  ingest(documentId: string, filename: string, extractedText: string, sourceFormat: string): Promise<Chunk[]> {
    return this.documentLocks.run(documentId, () => this.ingestDocument(documentId, filename, extractedText, sourceFormat));
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    const documents = await this.documentRepository.find({ order: { uploadedAt: 'DESC' } });
    return documents.map(toSummary);
  }

  async getDocument(documentId: string): Promise<DocumentDetail> {
    const document = await this.requireDocument(documentId);
    const rows = await this.chunkRepository.find({
      where: { documentId },
      order: { ordinal: 'ASC' },
    });
    return { ...toSummary(document), chunkIds: rows.map(row => row.id) };
  }

  async getChunks(documentId: string): Promise<ChunkView[]> {
    await this.requireDocument(documentId);
    const rows = await this.chunkRepository.find({
      where: { documentId },
      order: { ordinal: 'ASC' },
    });
    return rows.map(row => ({
      id: row.id,
      ordinal: row.ordinal,
      text: row.text,
      charStart: row.charStart,
      charEnd: row.charEnd,
    }));
  }

  deleteDocument(documentId: string): Promise<{ documentId: string; removedChunks: number }> {
    return this.documentLocks.run(documentId, async () => {
      const document = await this.requireDocument(documentId);
      // catalog first: a failed delete leaves the document listed and still retrievable
      // chunk rows go with the document (ON DELETE CASCADE)
      await this.documentRepository.delete(documentId);
      const removedChunks = await this.index.deleteByDocument(documentId);

      this.logger.log(`Deleted ${document.filename} (${documentId}), ${removedChunks} chunk(s) unindexed`);
      this.socketGateway.broadcast('documents.updated', { action: 'deleted', documentId });
      return { documentId, removedChunks };
    });
  }

  async search(query: string, limit?: number, minScore?: number): Promise<SearchHit[]> {
    const [embedding] = await this.embedChunks([query]);
    const results = await this.index.query(
      embedding,
      limit ?? this.config.maxContextChunks,
      minScore ?? this.config.similarityThreshold,
    );
    return results.map(({ chunk, score }) => ({
      chunkId: chunk.id,
      documentId: chunk.documentId,
      filename: chunk.metadata.documentFilename,
      ordinal: chunk.ordinal,
      text: chunk.text,
      score,
    }));
  }

  async knownFilenames(): Promise<string[]> {
    const documents = await this.documentRepository.find({ select: { filename: true } });
    return documents.map(document => document.filename);
  }

  indexStats(): VectorIndexStats {
    return this.index.stats();
  }

  private async ingestDocument(
    documentId: string,
    filename: string,
    extractedText: string,
    sourceFormat: string,
  ): Promise<Chunk[]> {
    if (!isSourceFormat(sourceFormat)) throw new UnsupportedFormatError(sourceFormat);
    if (await this.documentRepository.findOne({ where: { id: documentId } })) {
      throw new ConflictException(`Document ${documentId} already exists`);
    }

    const text = normalizeText(extractedText);
    if (!text) throw new EmptyDocumentError(filename);

    const candidates = chunkText(text, { chunkSize: this.config.chunkSize, chunkOverlap: this.config.chunkOverlap });
    const vectors = await this.embedChunks(candidates.map(c => c.text));

    const chunks: Chunk[] = candidates.map((candidate, i) => ({
      id: `${documentId}__${candidate.ordinal}`,
      documentId,
      ordinal: candidate.ordinal,
      text: candidate.text,
      embedding: vectors[i],
      metadata: {
        charStart: candidate.charStart,
        charEnd: candidate.charEnd,
        documentFilename: filename,
        sourceFormat,
      },
    }));

    await this.index.insert(chunks);
    try {
      await this.documentRepository.save(
        this.documentRepository.create({
          id: documentId,
          filename,
          sourceFormat,
          characterCount: text.length,
          chunkCount: chunks.length,
          chunks: chunks.map(chunk =>
            this.chunkRepository.create({
              id: chunk.id,
              documentId,
              ordinal: chunk.ordinal,
              text: chunk.text,
              embedding: chunk.embedding,
              charStart: chunk.metadata.charStart,
              charEnd: chunk.metadata.charEnd,
            }),
          ),
        }),
      );
    } catch (err) {
      await this.index.deleteByDocument(documentId);
      throw err;
    }

    this.logger.log(`Ingested ${filename} as ${documentId}: ${chunks.length} chunk(s), ${text.length} characters`);
    this.socketGateway.broadcast('documents.updated', { action: 'ingested', documentId, filename, chunkCount: chunks.length });
    return chunks;
  }

  private async requireDocument(documentId: string): Promise<CourseDocument> {
    const document = await this.documentRepository.findOne({ where: { id: documentId } });
    if (!document) throw new NotFoundException(`Document ${documentId} not found`);
    return document;
  }

  private async embedChunks(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    const batchSize = this.config.embeddingBatchSize;
    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);
      const controller = new AbortController();
      try {
        const embedded = await withTimeout(
          this.embedder.embedTexts(batch, controller.signal),
          this.config.embeddingTimeoutMs,
          'embedding',
          () => controller.abort(),
        );
        if (embedded.length !== batch.length) {
          throw new EmbeddingUnavailableError(`expected ${batch.length} vectors, got ${embedded.length}`);
        }
        vectors.push(...embedded);
      } catch (err) {
        if (err instanceof TutorError) throw err;
        throw new EmbeddingUnavailableError(describeError(err), err);
      }
    }
    return vectors;
  }
}

function toChunk(row: DocumentChunk, document: CourseDocument): Chunk {
  return {
    id: row.id,
    documentId: row.documentId,
    ordinal: row.ordinal,
    text: row.text,
    embedding: row.embedding,
    metadata: {
      charStart: row.charStart,
      charEnd: row.charEnd,
      documentFilename: document.filename,
      sourceFormat: document.sourceFormat,
    },
  };
}

function toSummary(document: CourseDocument): DocumentSummary {
  return {
    id: document.id,
    filename: document.filename,
    sourceFormat: document.sourceFormat,
    uploadedAt: document.uploadedAt,
    chunkCount: document.chunkCount,
    characterCount: document.characterCount,
  };
}
