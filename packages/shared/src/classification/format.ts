/**
 * Format Detection
 *
 * Structural checks only; no content is interpreted here.
 */

import path from 'path';
import { decodeText } from '../input';
import { parseJson } from '../json';
import type { DocumentFormat, InputDocument } from '../types';

const PDF_MAGIC = '%PDF-';
const PDF_MAGIC_WINDOW_BYTES = 1024;
const EMAIL_HEADER_LINE = /^[ \t]*(from|subject):[ \t]*\S/im;

const EXTENSION_HINTS: Record<string, DocumentFormat> = {
  '.json': 'JSON',
  '.pdf': 'PDF',
  '.eml': 'Email',
};

export function hasPdfMagic(content: Buffer): boolean {
  return content.subarray(0, PDF_MAGIC_WINDOW_BYTES).toString('latin1').includes(PDF_MAGIC);
}

export function looksLikeEmail(text: string): boolean {
  return EMAIL_HEADER_LINE.test(text);
}

function formatFromFilename(filename: string | undefined): DocumentFormat | undefined {
  if (!filename) return undefined;
  return EXTENSION_HINTS[path.extname(filename).toLowerCase()];
}

/**
 * Decide the structural format of an input.
 *
 * Order: empty -> Unknown, PDF magic, parseable JSON object/array, From:/Subject:
 * header lines, filename extension, a leading brace or bracket, else Text.
 */
export function detectFormat(input: InputDocument): DocumentFormat {
  const text = decodeText(input.content);
  const trimmed = text.trim();

  if (trimmed.length === 0) return 'Unknown';
  if (hasPdfMagic(input.content)) return 'PDF';

  const parsed = parseJson(trimmed);
  if (parsed.ok && typeof parsed.value === 'object' && parsed.value !== null) return 'JSON';

  if (looksLikeEmail(text)) return 'Email';

  const hinted = formatFromFilename(input.filename);
  if (hinted) return hinted;

  if (trimmed.startsWith('{') || trimmed.startsWith('[')) return 'JSON';

  return 'Text';
}
