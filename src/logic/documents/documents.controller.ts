import {
  Controller,
  Post,
  Get,
  Delete,
  Body,
  Param,
  Inject,
  Logger,
  UseInterceptors,
  UploadedFile,
  HttpException,
  HttpStatus,
  HttpCode,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { v4 as uuidv4 } from 'uuid';
import { DocumentsService } from './documents.service';
import { IngestDocumentDto } from './dto/ingest-document.dto';
import { SearchDocumentsDto } from './dto/search-documents.dto';
import { IngestSummary } from './types';
import { TUTOR_CONFIG, TutorConfig } from '../../utils/config';
import { describeError, toHttpException } from '../../utils/errors';
import { chunkStatistics } from '../../utils/textNormalizer';
import { detectSourceFormat, extractText } from '../../utils/textExtractor';
import { Chunk, SourceFormat } from '../../utils/types';

@Controller('documents')
export class DocumentsController {
  private readonly logger = new Logger(DocumentsController.name);

  constructor(
    private readonly documentsService: DocumentsService,
    @Inject(TUTOR_CONFIG) private readonly config: TutorConfig,
  ) {}

  @Post()
  async ingestDocument(@Body() body: IngestDocumentDto): Promise<IngestSummary> {
    const documentId = body.documentId ?? uuidv4();
    try {
      const chunks = await this.documentsService.ingest(documentId, body.filename, body.text, body.sourceFormat);
      return summarize(documentId, body.filename, body.sourceFormat, chunks);
    } catch (error) {
      this.logger.warn(`Ingestion of ${body.filename} failed: ${describeError(error)}`);
      throw toHttpException(error);
    }
  }

  @Post('upload')
  @UseInterceptors(FileInterceptor('file'))
  async uploadDocument(@UploadedFile() file?: Express.Multer.File): Promise<IngestSummary> {
    if (!file) {
      throw new HttpException('No file uploaded', HttpStatus.BAD_REQUEST);
    }
    if (file.size > this.config.maxUploadBytes) {
      throw new HttpException(`File exceeds ${this.config.maxUploadBytes} bytes`, HttpStatus.PAYLOAD_TOO_LARGE);
    }

    const documentId = uuidv4();
    try {
      const sourceFormat = detectSourceFormat(file.originalname);
      const text = await extractText(file.buffer, sourceFormat);
      const chunks = await this.documentsService.ingest(documentId, file.originalname, text, sourceFormat);
      return summarize(documentId, file.originalname, sourceFormat, chunks);
    } catch (error) {
      this.logger.warn(`Upload of ${file.originalname} failed: ${describeError(error)}`);
      throw toHttpException(error);
    }
  }

  @Get()
  async listDocuments() {
    return this.documentsService.listDocuments();
  }

  @Post('search')
  @HttpCode(HttpStatus.OK)
  async search(@Body() body: SearchDocumentsDto) {
    try {
      return await this.documentsService.search(body.query, body.limit, body.minScore);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get(':id')
  async getDocument(@Param('id') id: string) {
    return this.documentsService.getDocument(id);
  }

  @Get(':id/chunks')
  async getChunks(@Param('id') id: string) {
    return this.documentsService.getChunks(id);
  }

  @Delete(':id')
  async deleteDocument(@Param('id') id: string) {
    return this.documentsService.deleteDocument(id);
  }
}

function summarize(documentId: string, filename: string, sourceFormat: SourceFormat, chunks: Chunk[]): IngestSummary {
  return { documentId, filename, sourceFormat, statistics: chunkStatistics(chunks) };
}
