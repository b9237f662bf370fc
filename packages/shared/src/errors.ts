/**
 * Pipeline Errors
 *
 * Only failures the pipeline cannot absorb are thrown. Classification and
 * extraction problems end up in the record as confidence and anomalies instead.
 */

export type PipelineErrorCode = 'invalid_input' | 'input_not_found' | 'store_unavailable';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
