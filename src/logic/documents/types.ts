import { SourceFormat } from '../../utils/types';
import { ChunkStatistics } from '../../utils/textNormalizer';

export interface DocumentSummary {
  id: string;
  filename: string;
  sourceFormat: SourceFormat;
  uploadedAt: Date;
  chunkCount: number;
  characterCount: number;
}

export interface DocumentDetail extends DocumentSummary {
  chunkIds: string[];
}

export interface IngestSummary {
  documentId: string;
  filename: string;
  sourceFormat: SourceFormat;
  statistics: ChunkStatistics;
}

export interface ChunkView {
  id: string;
  ordinal: number;
  text: string;
  charStart: number;
  charEnd: number;
}

export interface SearchHit {
  chunkId: string;
  documentId: string;
  filename: string;
  ordinal: number;
  text: string;
  score: number;
}
