/**
 * Unit tests for text extraction
 *
 * pdf-parse is replaced by a mock: the tests check how its result is
 * handled, not PDF rendering itself.
 */

import {
    PdfParser,
    PlainTextParser,
    UnsupportedFormatError,
    detectDocumentKind,
    extractText,
    getParser,
    isDocumentKind,
} from '../documentParser';

const mockPdfParse = jest.fn();

jest.mock('pdf-parse', () => mockPdfParse);

beforeEach(() => {
    mockPdfParse.mockReset();
});

describe('PlainTextParser', () => {
    it('should decode a buffer as UTF-8', async () => {
        const result = await new PlainTextParser().parse(Buffer.from('Café notes', 'utf-8'));
        expect(result.content).toBe('Café notes');
    });

    it('should normalise line endings and trim', async () => {
        const result = await new PlainTextParser().parse('  line one\r\nline two\r\n');
        expect(result.content).toBe('line one\nline two');
    });

    it('should use the first non-blank line as the title', async () => {
        const result = await new PlainTextParser().parse('\n  Photosynthesis  \nLight reactions');
        expect(result.metadata.title).toBe('Photosynthesis');
    });

    it('should return an empty string for an empty file', async () => {
        const result = await new PlainTextParser().parse(Buffer.alloc(0));
        expect(result.content).toBe('');
        expect(result.metadata.title).toBeUndefined();
    });
});

describe('PdfParser', () => {
    it('should return the trimmed page text and metadata', async () => {
        mockPdfParse.mockResolvedValue({
            text: '\n\nPage one text\n\nPage two text\n',
            numpages: 2,
            info: { Title: 'Cell Biology' },
        });

        const result = await new PdfParser().parse(Buffer.from('%PDF-1.4'));

        expect(result).toEqual({
            content: 'Page one text\n\nPage two text',
            metadata: { pageCount: 2, title: 'Cell Biology' },
        });
        expect(mockPdfParse).toHaveBeenCalledWith(Buffer.from('%PDF-1.4'));
    });

    it('should decode a string input as base64', async () => {
        mockPdfParse.mockResolvedValue({ text: 'x', numpages: 1, info: {} });

        await new PdfParser().parse(Buffer.from('%PDF-1.4').toString('base64'));

        expect(mockPdfParse).toHaveBeenCalledWith(Buffer.from('%PDF-1.4'));
    });

    it('should return an empty string for a PDF without a text layer', async () => {
        mockPdfParse.mockResolvedValue({ text: '   \n', numpages: 3, info: {} });

        const result = await new PdfParser().parse(Buffer.from('%PDF-1.4'));

        expect(result.content).toBe('');
        expect(result.metadata.title).toBeUndefined();
    });

    it('should wrap parser failures', async () => {
        mockPdfParse.mockRejectedValue(new Error('Invalid PDF structure'));

        await expect(new PdfParser().parse(Buffer.from('not a pdf'))).rejects.toThrow(
            'Failed to parse PDF: Invalid PDF structure. The file may be corrupted or password-protected.'
        );
    });
});

describe('getParser', () => {
    it('should return a parser for each supported kind', () => {
        expect(getParser('text')).toBeInstanceOf(PlainTextParser);
        expect(getParser('pdf')).toBeInstanceOf(PdfParser);
    });

    it('should reject any other kind', () => {
        expect(() => getParser('docx')).toThrow(UnsupportedFormatError);
        expect(() => getParser('docx')).toThrow('Unsupported document type: docx');
    });

    it('should not treat inherited properties as kinds', () => {
        expect(isDocumentKind('toString')).toBe(false);
    });
});

describe('extractText', () => {
    it('should extract the text of a plain text document', async () => {
        await expect(extractText('The sky is blue.', 'text')).resolves.toBe('The sky is blue.');
    });

    it('should fail for an unsupported kind', async () => {
        await expect(extractText('data', 'image')).rejects.toThrow(UnsupportedFormatError);
    });
});

describe('detectDocumentKind', () => {
    it.each([
        ['notes.txt', 'text'],
        ['NOTES.TXT', 'text'],
        ['lecture.pdf', 'pdf'],
        ['archive.tar.pdf', 'pdf'],
    ])('should detect %s as %s', (filename, kind) => {
        expect(detectDocumentKind(filename)).toBe(kind);
    });

    it.each(['slides.pptx', 'README', 'image.png'])('should not detect a kind for %s', (filename) => {
        expect(detectDocumentKind(filename)).toBeUndefined();
    });
});
