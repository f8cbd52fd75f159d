import { UnsupportedFormatError } from './errors';
import { detectSourceFormat, extractText } from './textExtractor';
import { SourceFormat } from './types';

jest.mock('pdf-parse', () => ({
    PDFParse: jest.fn().mockImplementation(() => ({
        getText: jest.fn().mockResolvedValue({ text: 'Page one text' }),
        destroy: jest.fn().mockResolvedValue(undefined),
    })),
}));

jest.mock('mammoth', () => ({
    __esModule: true,
    default: { extractRawText: jest.fn().mockResolvedValue({ value: 'Word text' }) },
}));

describe('textExtractor', () => {
    it('maps file extensions to source formats', () => {
        expect(detectSourceFormat('week1/Intro.MD')).toBe(SourceFormat.MARKDOWN);
        expect(detectSourceFormat('notes.markdown')).toBe(SourceFormat.MARKDOWN);
        expect(detectSourceFormat('syllabus.pdf')).toBe(SourceFormat.PDF);
        expect(detectSourceFormat('essay.docx')).toBe(SourceFormat.DOCX);
        expect(detectSourceFormat('readme.txt')).toBe(SourceFormat.TEXT);
    });

    it('rejects unknown extensions', () => {
        expect(() => detectSourceFormat('slides.pptx')).toThrow(UnsupportedFormatError);
        expect(() => detectSourceFormat('Makefile')).toThrow(UnsupportedFormatError);
    });

    it('extracts text from each format', async () => {
        await expect(extractText(Buffer.from('plain words'), SourceFormat.TEXT)).resolves.toBe('plain words');
        await expect(extractText(Buffer.from('%PDF'), SourceFormat.PDF)).resolves.toBe('Page one text');
        await expect(extractText(Buffer.from('PK'), SourceFormat.DOCX)).resolves.toBe('Word text');
    });
});
