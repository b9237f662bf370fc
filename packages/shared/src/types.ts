/**
 * Shared TypeScript Types
 *
 * Types for the document intake pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// JSON Values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// Input
// ============================================================================

export interface InputDocument {
  readonly content: Buffer;
  /** Declared filename; only its extension is used, as a format hint. */
  readonly filename?: string;
  readonly threadId?: string;
}

/** What a processing record keeps of its input. */
export interface InputReference {
  digest: string;
  filename: string | null;
  size_bytes: number;
}

// ============================================================================
// Classification
// ============================================================================

export const DOCUMENT_FORMATS = ['JSON', 'Email', 'PDF', 'Text', 'Unknown'] as const;
export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

export const INTENTS = ['Invoice', 'RFQ', 'Complaint', 'Regulation', 'General', 'Unknown'] as const;
export type Intent = (typeof INTENTS)[number];

export type ClassificationMethod = 'rules' | 'llm' | 'fallback';

export interface ClassificationResult {
  format: DocumentFormat;
  intent: Intent;
  /** Classifier confidence in the intent, 0-1. */
  confidence: number;
  method: ClassificationMethod;
  reasoning?: string;
  model?: string;
}

// ============================================================================
// Extraction
// ============================================================================

export type AgentName = 'json_agent' | 'email_agent' | 'pdf_agent';

export type AnomalyKind = 'missing' | 'malformed' | 'unreadable';

export interface Anomaly {
  field: string;
  kind: AnomalyKind;
  message: string;
}

export type UrgencyLevel = 'high' | 'medium' | 'low';
export type Sentiment = 'positive' | 'negative' | 'neutral';
export type TextSource = 'email' | 'text' | 'pdf';

export interface CrmRecord {
  contact_name: string;
  company: string;
  subject: string;
  priority: UrgencyLevel;
  category: Sentiment;
  summary: string;
  next_actions: string[];
  status: 'new';
}

interface ExtractionBase {
  fields: JsonObject;
  anomalies: Anomaly[];
  /** Agent confidence in the extracted fields, 0-1. Independent of classification confidence. */
  confidence: number;
}

export interface JsonExtractionResult extends ExtractionBase {
  agent: 'json_agent';
  target_schema: Intent;
  schema_compliant: boolean;
}

export interface TextExtractionResult extends ExtractionBase {
  agent: 'email_agent';
  source: TextSource;
  urgency: UrgencyLevel;
  crm: CrmRecord;
  page_count?: number;
}

export type ExtractionResult = JsonExtractionResult | TextExtractionResult;

// ============================================================================
// Records
// ============================================================================

export type RecordStatus = 'COMPLETE' | 'PARTIAL';

export interface ProcessingRecord {
  record_id: string;
  thread_id: string;
  status: RecordStatus;
  input: InputReference;
  classification: ClassificationResult;
  extraction: ExtractionResult;
  created_at: string;
}

/** Summary of a thread, derived from its records. */
export interface ThreadContext {
  thread_id: string;
  record_count: number;
  sender: string | null;
  topic: string | null;
  intents: Intent[];
  last_extracted_fields: JsonObject;
  first_seen_at: string;
  last_seen_at: string;
}

// ============================================================================
// API Contracts
// ============================================================================

export interface SubmitDocumentRequest {
  content: string;
  encoding?: 'utf-8' | 'base64';
  filename?: string;
  thread_id?: string;
}

export interface RecordListResponse {
  items: ProcessingRecord[];
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
