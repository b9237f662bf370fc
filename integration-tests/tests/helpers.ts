/**
 * Test Helpers
 *
 * In-process stand-ins for the database, the intent model and the PDF text
 * extractor, plus fixture loading.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { QueryResultRow } from 'pg';
import {
  validateRecord,
  type IntentModel,
  type IntentPrediction,
  type PdfTextResult,
  type ProcessingRecord,
  type RecordStore,
} from '@docintake/shared';
import {
  INSERT_RECORD_SQL,
  LOCK_THREAD_SQL,
  SELECT_RECENT_SQL,
  SELECT_RECORD_SQL,
  SELECT_THREAD_SQL,
  type SqlClient,
  type SqlPool,
} from '../../services/intake-api/src/lib/db';

export const FIXTURES_DIR = path.join(__dirname, '../../fixtures/inputs');

export function fixturePath(name: string): string {
  return path.join(FIXTURES_DIR, name);
}

export function loadFixture(name: string): Buffer {
  return fs.readFileSync(fixturePath(name));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Record store kept in memory, in append order.
 */
export class InMemoryRecordStore implements RecordStore {
  readonly records: ProcessingRecord[] = [];
  failAppends = false;
  failPing = false;

  async append(record: ProcessingRecord): Promise<string> {
    if (this.failAppends) {
      throw new Error('connection refused');
    }
    if (this.records.some((existing) => existing.record_id === record.record_id)) {
      throw new Error(`duplicate record_id: ${record.record_id}`);
    }
    this.records.push(record);
    return record.record_id;
  }

  async get(recordId: string): Promise<ProcessingRecord | null> {
    return this.records.find((record) => record.record_id === recordId) ?? null;
  }

  async listByThread(threadId: string): Promise<ProcessingRecord[]> {
    return this.records.filter((record) => record.thread_id === threadId);
  }

  async listRecent(limit: number): Promise<ProcessingRecord[]> {
    return [...this.records].reverse().slice(0, limit);
  }

  async ping(): Promise<void> {
    if (this.failPing) {
      throw new Error('connection refused');
    }
  }

  async close(): Promise<void> {}
}

interface StoredRow extends QueryResultRow {
  seq: number;
  record_id: string;
  thread_id: string;
  status: string;
  input_digest: string;
  input_filename: string | null;
  input_size_bytes: string;
  format: string;
  intent: string;
  agent: string;
  classification: unknown;
  extraction: unknown;
  created_at: Date;
}

type QueryResult = { rows: QueryResultRow[]; rowCount: number | null };

/**
 * A pg pool over an in-memory table. Inserts become visible on COMMIT,
 * ROLLBACK discards them, and advisory locks are held until the transaction ends.
 */
export class FakePgPool implements SqlPool {
  readonly rows: StoredRow[] = [];
  /** record_ids in commit order. */
  readonly commitLog: string[] = [];
  readonly statements: string[] = [];
  releasedClients = 0;
  /** Upper bound of a random delay before each statement. */
  jitterMs = 0;
  failInsertsWith: Error | null = null;

  private nextSeq = 0;
  private readonly locks = new Map<string, Promise<void>>();

  async connect(): Promise<SqlClient> {
    return new FakePgClient(this);
  }

  async query(text: string, values: unknown[] = []): Promise<QueryResult> {
    await this.delay();
    return this.select(text, values);
  }

  async end(): Promise<void> {}

  async delay(): Promise<void> {
    if (this.jitterMs > 0) {
      await sleep(Math.floor(Math.random() * this.jitterMs));
    }
  }

  allocateSeq(): number {
    this.nextSeq += 1;
    return this.nextSeq;
  }

  /**
   * Wait for the lock on key; resolves with its release function.
   */
  async acquireLock(key: string): Promise<() => void> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.locks.set(key, previous.then(() => current));
    await previous;
    return release;
  }

  select(text: string, values: unknown[]): QueryResult {
    this.statements.push(text);
    const ordered = [...this.rows].sort((a, b) => a.seq - b.seq);

    if (text === 'SELECT 1') {
      return { rows: [{ '?column?': 1 }], rowCount: 1 };
    }
    if (text === SELECT_RECORD_SQL) {
      const rows = ordered.filter((row) => row.record_id === values[0]);
      return { rows, rowCount: rows.length };
    }
    if (text === SELECT_THREAD_SQL) {
      const rows = ordered.filter((row) => row.thread_id === values[0]);
      return { rows, rowCount: rows.length };
    }
    if (text === SELECT_RECENT_SQL) {
      const rows = ordered.reverse().slice(0, Number(values[0]));
      return { rows, rowCount: rows.length };
    }
    throw new Error(`Unexpected statement: ${text}`);
  }
}

class FakePgClient implements SqlClient {
  private pending: StoredRow[] = [];
  private heldLocks: Array<() => void> = [];
  private inTransaction = false;

  constructor(private readonly pool: FakePgPool) {}

  async query(text: string, values: unknown[] = []): Promise<QueryResult> {
    await this.pool.delay();

    if (text === 'BEGIN') {
      this.pool.statements.push(text);
      this.inTransaction = true;
      return { rows: [], rowCount: null };
    }
    if (text === 'COMMIT') {
      this.pool.statements.push(text);
      for (const row of this.pending) {
        this.pool.rows.push(row);
        this.pool.commitLog.push(row.record_id);
      }
      this.endTransaction();
      return { rows: [], rowCount: null };
    }
    if (text === 'ROLLBACK') {
      this.pool.statements.push(text);
      this.endTransaction();
      return { rows: [], rowCount: null };
    }
    if (text === LOCK_THREAD_SQL) {
      this.pool.statements.push(text);
      if (!this.inTransaction) {
        throw new Error('advisory transaction lock outside a transaction');
      }
      this.heldLocks.push(await this.pool.acquireLock(String(values[0])));
      return { rows: [{ pg_advisory_xact_lock: '' }], rowCount: 1 };
    }
    if (text === INSERT_RECORD_SQL) {
      this.pool.statements.push(text);
      return this.insert(values);
    }
    return this.pool.select(text, values);
  }

  release(): void {
    this.pool.releasedClients += 1;
  }

  private insert(values: unknown[]): QueryResult {
    if (this.pool.failInsertsWith) {
      throw this.pool.failInsertsWith;
    }
    const recordId = String(values[0]);
    const taken = [...this.pool.rows, ...this.pending].some((row) => row.record_id === recordId);
    if (taken) {
      throw new Error('duplicate key value violates unique constraint "processing_records_pkey"');
    }

    this.pending.push({
      seq: this.pool.allocateSeq(),
      record_id: recordId,
      thread_id: String(values[1]),
      status: String(values[2]),
      input_digest: String(values[3]),
      input_filename: values[4] === null ? null : String(values[4]),
      // pg returns BIGINT columns as strings
      input_size_bytes: String(values[5]),
      format: String(values[6]),
      intent: String(values[7]),
      agent: String(values[8]),
      classification: JSON.parse(String(values[9])),
      extraction: JSON.parse(String(values[10])),
      created_at: new Date(String(values[11])),
    });
    return { rows: [], rowCount: 1 };
  }

  private endTransaction(): void {
    this.pending = [];
    this.inTransaction = false;
    for (const release of this.heldLocks) release();
    this.heldLocks = [];
  }
}

/**
 * Intent model that answers with a fixed prediction and records its inputs.
 */
export function fixedIntentModel(prediction: IntentPrediction): IntentModel & { previews: string[] } {
  const previews: string[] = [];
  return {
    name: 'test-model',
    previews,
    async predictIntent(preview: string) {
      previews.push(preview);
      return prediction;
    },
  };
}

/**
 * Intent model that never answers; the abort signal it was given is kept.
 */
export function hangingIntentModel(): IntentModel & { signals: AbortSignal[] } {
  const signals: AbortSignal[] = [];
  return {
    name: 'test-model',
    signals,
    predictIntent(_preview: string, options: { signal: AbortSignal }) {
      signals.push(options.signal);
      return new Promise<IntentPrediction>(() => {});
    },
  };
}

export function failingIntentModel(error: Error): IntentModel {
  return {
    name: 'test-model',
    async predictIntent() {
      throw error;
    },
  };
}

export function pdfText(text: string, totalPages = 1): PdfTextResult {
  return {
    pages: [{ pageNumber: 1, text }],
    totalPages,
    text,
  };
}

/** Bytes that pass the PDF magic check; the stub extractors never parse them. */
export const PDF_BYTES = Buffer.from('%PDF-1.7\n1 0 obj\n<< /Type /Catalog >>\nendobj\n%%EOF\n', 'latin1');

function isProcessingRecord(value: unknown): value is ProcessingRecord {
  return validateRecord(value).valid;
}

/**
 * Narrow a parsed response body to a processing record, or fail the test.
 */
export function expectRecord(value: unknown): ProcessingRecord {
  if (!isProcessingRecord(value)) {
    throw new Error(`Not a processing record: ${JSON.stringify(value)}`);
  }
  return value;
}

export function expectRecordList(value: unknown): ProcessingRecord[] {
  if (typeof value !== 'object' || value === null || !('items' in value) || !Array.isArray(value.items)) {
    throw new Error(`Not a record list: ${JSON.stringify(value)}`);
  }
  return value.items.map(expectRecord);
}
