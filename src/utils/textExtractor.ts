import path from "path";
import { PDFParse } from 'pdf-parse';
import mammoth from "mammoth";
import { SourceFormat } from './types';
import { UnsupportedFormatError } from './errors';

const EXTENSION_FORMATS: Record<string, SourceFormat> = {
    ".txt": SourceFormat.TEXT,
    ".md": SourceFormat.MARKDOWN,
    ".markdown": SourceFormat.MARKDOWN,
    ".pdf": SourceFormat.PDF,
    ".docx": SourceFormat.DOCX,
};

export function detectSourceFormat(filename: string): SourceFormat {
    const ext = path.extname(filename).toLowerCase();
    const format = EXTENSION_FORMATS[ext];
    if (!format) throw new UnsupportedFormatError(ext || filename);
    return format;
}

/** Raw text of an uploaded file. Normalization happens at ingest. */
export async function extractText(buffer: Buffer, format: SourceFormat): Promise<string> {
    switch (format) {
        case SourceFormat.TEXT:
        case SourceFormat.MARKDOWN:
            return buffer.toString("utf8");
        case SourceFormat.PDF: {
            const parser = new PDFParse({ data: new Uint8Array(buffer) });
            try {
                const result = await parser.getText();
                return result.text || "";
            } finally {
                await parser.destroy();
            }
        }
        case SourceFormat.DOCX: {
            const res = await mammoth.extractRawText({ buffer });
            return res.value || "";
        }
    }
}
