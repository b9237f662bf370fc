/**
 * Record Store
 *
 * Append-only storage of processing records. A record becomes visible to
 * readers only once append() has resolved; records are never updated or deleted.
 */

import type { ProcessingRecord } from '../types';

export interface RecordStore {
  /**
   * Persist a record atomically.
   * @returns the record_id
   * @throws if the record cannot be stored, including a duplicate record_id
   */
  append(record: ProcessingRecord): Promise<string>;

  get(recordId: string): Promise<ProcessingRecord | null>;

  /** Records of a thread in append order. */
  listByThread(threadId: string): Promise<ProcessingRecord[]>;

  /** Most recent records across all threads, newest first. */
  listRecent(limit: number): Promise<ProcessingRecord[]>;

  /** Resolves when the store is reachable. */
  ping(): Promise<void>;

  close(): Promise<void>;
}
