import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import fg from 'fast-glob';
import fs from 'node:fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { TUTOR_CONFIG, TutorConfig } from '../../utils/config';
import { describeError } from '../../utils/errors';
import { detectSourceFormat, extractText } from '../../utils/textExtractor';
import { DocumentsService } from './documents.service';

const SEED_PATTERN = '**/*.{pdf,docx,txt,md,markdown}';

/** Ingests course materials found under SEED_DIRECTORY that are not catalogued yet. */
@Injectable()
export class DocumentSeederService implements OnApplicationBootstrap {
  private readonly logger = new Logger(DocumentSeederService.name);

  constructor(
    private readonly documentsService: DocumentsService,
    @Inject(TUTOR_CONFIG) private readonly config: TutorConfig,
  ) {}

  async onApplicationBootstrap() {
    if (this.config.seedDirectory) {
      await this.seed(this.config.seedDirectory);
    }
  }

  async seed(directory: string): Promise<number> {
    const files = await fg(SEED_PATTERN, { cwd: directory, absolute: true, caseSensitiveMatch: false });
    const known = new Set(await this.documentsService.knownFilenames());

    let ingested = 0;
    for (const file of files.sort()) {
      const filename = path.basename(file);
      if (known.has(filename)) continue;
      try {
        const sourceFormat = detectSourceFormat(filename);
        const text = await extractText(await fs.readFile(file), sourceFormat);
        await this.documentsService.ingest(uuidv4(), filename, text, sourceFormat);
        known.add(filename);
        ingested++;
      } catch (error) {
        this.logger.warn(`Skipping ${filename}: ${describeError(error)}`);
      }
    }
    this.logger.log(`Seeded ${ingested} of ${files.length} file(s) from ${directory}`);
    return ingested;
  }
}
