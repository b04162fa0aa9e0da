/**
 * Document Parser Service
 *
 * Extracts plain text from uploaded documents before chunking.
 *
 * Each supported format has its own parser behind the same interface
 * (strategy pattern). A parser that succeeds but finds no text returns an
 * empty string rather than failing; the ingestion pipeline decides what an
 * empty document means.
 */

import { DocumentKind } from '../../shared/types';

/**
 * Result of parsing a document.
 */
export interface ParseResult {
  content: string;
  metadata: {
    title?: string;
    pageCount?: number;
  };
}

/**
 * Interface for document parsers.
 */
export interface DocumentParser {
  parse(input: string | Buffer): Promise<ParseResult>;
}

/**
 * Raised when a document's declared kind has no parser.
 */
export class UnsupportedFormatError extends Error {
  constructor(public readonly kind: string) {
    super(`Unsupported document type: ${kind}`);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * Parses plain text documents.
 */
export class PlainTextParser implements DocumentParser {
  async parse(input: string | Buffer): Promise<ParseResult> {
    const text = typeof input === 'string' ? input : input.toString('utf-8');

    const lines = text.split('\n').filter((line) => line.trim());
    const firstLine = lines[0];
    const title = firstLine ? firstLine.trim() : undefined;

    return {
      content: text.replace(/\r\n/g, '\n').trim(),
      metadata: {
        title,
      },
    };
  }
}

/**
 * Parses PDF documents using the pdf-parse library.
 *
 * pdf-parse renders each page in turn and joins the page texts with
 * newlines. Scanned PDFs without a text layer come back empty.
 */
export class PdfParser implements DocumentParser {
  async parse(input: string | Buffer): Promise<ParseResult> {
    // pdf-parse requires a Buffer
    const buffer = typeof input === 'string' ? Buffer.from(input, 'base64') : input;

    try {
      const pdfParse = await import('pdf-parse');
      const pdf = await pdfParse.default(buffer);
      const title: unknown = pdf.info?.Title;

      return {
        content: pdf.text.trim(),
        metadata: {
          pageCount: pdf.numpages,
          title: typeof title === 'string' && title ? title : undefined,
        },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to parse PDF: ${message}. The file may be corrupted or password-protected.`);
    }
  }
}

const parsers: Record<DocumentKind, DocumentParser> = {
  text: new PlainTextParser(),
  pdf: new PdfParser(),
};

export function isDocumentKind(kind: string): kind is DocumentKind {
  return Object.prototype.hasOwnProperty.call(parsers, kind);
}

/**
 * Returns the parser for a declared document kind.
 *
 * @throws UnsupportedFormatError for any kind other than text or pdf
 */
export function getParser(kind: string): DocumentParser {
  if (!isDocumentKind(kind)) {
    throw new UnsupportedFormatError(kind);
  }
  return parsers[kind];
}

/**
 * Parses a document given its declared kind.
 */
export async function parseDocument(kind: string, content: string | Buffer): Promise<ParseResult> {
  return getParser(kind).parse(content);
}

/**
 * Extracts the plain text of a document. Returns '' when the document has
 * no text.
 */
export async function extractText(content: string | Buffer, kind: string): Promise<string> {
  const result = await parseDocument(kind, content);
  return result.content;
}

/**
 * Detects document kind from filename extension.
 * Returns undefined if the extension is not supported.
 */
export function detectDocumentKind(filename: string): DocumentKind | undefined {
  const dot = filename.lastIndexOf('.');
  if (dot === -1) {
    return undefined;
  }

  switch (filename.slice(dot + 1).toLowerCase()) {
    case 'txt':
      return 'text';
    case 'pdf':
      return 'pdf';
    default:
      return undefined;
  }
}
