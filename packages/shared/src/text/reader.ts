/**
 * Document Text Reader
 *
 * Turns an input document into plain text. PDF text is extracted at most once
 * per input, so the classifier and the PDF agent share one extraction.
 */

import { decodeText } from '../input';
import { logger } from '../logger';
import type { DocumentFormat, InputDocument } from '../types';
import { extractTextFromPdf, type PdfTextResult } from './pdf';

export interface DocumentText {
  text: string;
  /** Set for PDF inputs. */
  pageCount?: number;
  /** Why the text could not be read; text is empty when set. */
  error?: string;
}

export type PdfTextExtractor = (data: Uint8Array) => Promise<PdfTextResult>;

export class DocumentTextReader {
  private readonly cache = new WeakMap<InputDocument, Promise<DocumentText>>();

  constructor(private readonly extractPdf: PdfTextExtractor = extractTextFromPdf) {}

  /**
   * Never rejects: unreadable PDFs resolve with empty text and an error.
   */
  read(input: InputDocument, format: DocumentFormat): Promise<DocumentText> {
    const cached = this.cache.get(input);
    if (cached) return cached;

    const pending =
      format === 'PDF'
        ? this.readPdf(input)
        : Promise.resolve({ text: decodeText(input.content) });
    this.cache.set(input, pending);
    return pending;
  }

  private async readPdf(input: InputDocument): Promise<DocumentText> {
    try {
      const result = await this.extractPdf(new Uint8Array(input.content));
      return { text: result.text, pageCount: result.totalPages };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('PDF text extraction failed', {
        filename: input.filename,
        size_bytes: input.content.length,
        error: message,
      });
      return { text: '', pageCount: 0, error: message };
    }
  }
}
