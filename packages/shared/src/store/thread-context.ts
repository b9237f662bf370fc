/**
 * Thread Context
 *
 * Threads have no stored state of their own; this summary is rebuilt from the
 * thread's records each time.
 */

import type { Intent, ProcessingRecord, ThreadContext } from '../types';

function latestString(records: ProcessingRecord[], field: string): string | null {
  for (let i = records.length - 1; i >= 0; i--) {
    const value = records[i].extraction.fields[field];
    if (typeof value === 'string' && value.trim()) return value;
  }
  return null;
}

/**
 * @param records a thread's records in append order
 * @returns null for a thread without records
 */
export function summarizeThread(records: ProcessingRecord[]): ThreadContext | null {
  if (records.length === 0) return null;

  const first = records[0];
  const last = records[records.length - 1];
  const intents: Intent[] = [];
  for (const record of records) {
    if (!intents.includes(record.classification.intent)) {
      intents.push(record.classification.intent);
    }
  }

  return {
    thread_id: first.thread_id,
    record_count: records.length,
    sender: latestString(records, 'sender'),
    topic: latestString(records, 'subject'),
    intents,
    last_extracted_fields: last.extraction.fields,
    first_seen_at: first.created_at,
    last_seen_at: last.created_at,
  };
}
