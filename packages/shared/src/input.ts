/**
 * Input Documents
 *
 * Inputs are frozen on creation; a processing record only keeps a digest of the bytes.
 */

import { createHash } from 'node:crypto';
import fs from 'fs';
import path from 'path';
import { PipelineError } from './errors';
import type { InputDocument, InputReference } from './types';

export const MAX_THREAD_ID_LENGTH = 128;

export interface InputDocumentOptions {
  filename?: string;
  threadId?: string;
}

function normalizeThreadId(threadId: string | undefined): string | undefined {
  if (threadId === undefined) return undefined;
  const trimmed = threadId.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_THREAD_ID_LENGTH) {
    throw new PipelineError(
      'invalid_input',
      `thread_id must be 1-${MAX_THREAD_ID_LENGTH} characters`
    );
  }
  return trimmed;
}

/**
 * Build an immutable input document from raw bytes or pasted text.
 */
export function createInputDocument(
  content: Buffer | string,
  options: InputDocumentOptions = {}
): InputDocument {
  const bytes = typeof content === 'string' ? Buffer.from(content, 'utf-8') : Buffer.from(content);
  return Object.freeze({
    content: bytes,
    filename: options.filename,
    threadId: normalizeThreadId(options.threadId),
  });
}

/**
 * Read a file from disk into an input document. The file's basename becomes the filename hint.
 */
export async function readInputFile(filePath: string, threadId?: string): Promise<InputDocument> {
  let content: Buffer;
  try {
    content = await fs.promises.readFile(filePath);
  } catch (error) {
    throw new PipelineError('input_not_found', `Cannot read input file: ${filePath}`, {
      cause: error,
    });
  }
  return createInputDocument(content, { filename: path.basename(filePath), threadId });
}

export function describeInput(input: InputDocument): InputReference {
  return {
    digest: createHash('sha256').update(input.content).digest('hex'),
    filename: input.filename ?? null,
    size_bytes: input.content.length,
  };
}

export function decodeText(content: Buffer): string {
  return content.toString('utf-8').replace(/^\uFEFF/, '');
}
