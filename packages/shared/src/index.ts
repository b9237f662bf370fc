/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config, type ClassifierStrategy } from './config';

// Types
export * from './types';

// Errors
export { PipelineError, isPipelineError, type PipelineErrorCode } from './errors';

// Metrics
export {
  register,
  documentsProcessedCounter,
  classificationsCounter,
  extractionDurationHistogram,
  anomaliesCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  getIntentSchema,
  validateIntentPayload,
  validateRecord,
  isLooseDate,
  isMoneyString,
  type IntentSchema,
  type FieldIssue,
  type ValidationResult,
} from './schemas';

// Inputs, ids and payload helpers
export {
  createInputDocument,
  readInputFile,
  describeInput,
  decodeText,
  MAX_THREAD_ID_LENGTH,
  type InputDocumentOptions,
} from './input';
export { newRecordId, newThreadId, monotonicTimestamp } from './ids';
export { parseJson, isJsonObject, type JsonParseResult } from './json';
export { mapPayloadFields, normalizeKey, type FieldMapping } from './fields';
export { roundConfidence } from './confidence';
export { withTimeout, TimeoutError } from './timeout';

// Text
export { DocumentTextReader, type DocumentText, type PdfTextExtractor } from './text/reader';
export { extractTextFromPdf, type PageText, type PdfTextResult } from './text/pdf';

// Classification
export * from './classification';

// Agents
export * from './agents';

// Store
export type { RecordStore } from './store/types';
export { summarizeThread } from './store/thread-context';

// Orchestrator
export {
  Orchestrator,
  createPipeline,
  type OrchestratorDeps,
  type PipelineOptions,
} from './orchestrator';
