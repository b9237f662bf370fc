/**
 * Database Operations
 *
 * PostgreSQL record store. Appends run in one transaction holding a per-thread
 * advisory lock, so records of a thread are committed, and numbered, one at a time.
 */

import { Pool, type QueryResultRow } from 'pg';
import {
  logger,
  config,
  dbQueryDurationHistogram,
  type ProcessingRecord,
  type RecordStore,
} from '@docintake/shared';

/** The parts of a pg client the store uses. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[]; rowCount: number | null }>;
  release(): void;
}

/** The parts of a pg pool the store uses. */
export interface SqlPool {
  connect(): Promise<SqlClient>;
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export function createPool(): Pool {
  return new Pool({
    connectionString: process.env.DATABASE_URL || config.databaseUrl,
    max: config.dbPoolMax,
    idleTimeoutMillis: 30000,
  });
}

const RECORD_COLUMNS = `record_id, thread_id, status, input_digest, input_filename, input_size_bytes,
  classification, extraction, created_at`;

export const INSERT_RECORD_SQL = `INSERT INTO processing_records (
  record_id, thread_id, status, input_digest, input_filename, input_size_bytes,
  format, intent, agent, classification, extraction, created_at
) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`;

export const LOCK_THREAD_SQL = 'SELECT pg_advisory_xact_lock(hashtext($1))';

export const SELECT_RECORD_SQL = `SELECT ${RECORD_COLUMNS} FROM processing_records WHERE record_id = $1`;

export const SELECT_THREAD_SQL = `SELECT ${RECORD_COLUMNS} FROM processing_records
  WHERE thread_id = $1 ORDER BY seq ASC`;

export const SELECT_RECENT_SQL = `SELECT ${RECORD_COLUMNS} FROM processing_records
  ORDER BY seq DESC LIMIT $1`;

function toRecord(row: QueryResultRow): ProcessingRecord {
  return {
    record_id: row.record_id,
    thread_id: row.thread_id,
    status: row.status,
    input: {
      digest: row.input_digest,
      filename: row.input_filename,
      size_bytes: Number(row.input_size_bytes),
    },
    classification: row.classification,
    extraction: row.extraction,
    created_at: row.created_at instanceof Date ? row.created_at.toISOString() : String(row.created_at),
  };
}

export class PostgresRecordStore implements RecordStore {
  constructor(private readonly pool: SqlPool) {}

  async append(record: ProcessingRecord): Promise<string> {
    const startTime = Date.now();
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      await client.query(LOCK_THREAD_SQL, [record.thread_id]);
      await client.query(INSERT_RECORD_SQL, [
        record.record_id,
        record.thread_id,
        record.status,
        record.input.digest,
        record.input.filename,
        record.input.size_bytes,
        record.classification.format,
        record.classification.intent,
        record.extraction.agent,
        JSON.stringify(record.classification),
        JSON.stringify(record.extraction),
        record.created_at,
      ]);
      await client.query('COMMIT');

      logger.debug('Record appended', {
        record_id: record.record_id,
        thread_id: record.thread_id,
      });

      return record.record_id;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.error('Rollback failed', rollbackError, { record_id: record.record_id });
      });
      throw error;
    } finally {
      client.release();
      dbQueryDurationHistogram.observe({ operation: 'append_record' }, (Date.now() - startTime) / 1000);
    }
  }

  async get(recordId: string): Promise<ProcessingRecord | null> {
    const startTime = Date.now();
    try {
      const result = await this.pool.query(SELECT_RECORD_SQL, [recordId]);
      return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
    } finally {
      dbQueryDurationHistogram.observe({ operation: 'get_record' }, (Date.now() - startTime) / 1000);
    }
  }

  async listByThread(threadId: string): Promise<ProcessingRecord[]> {
    const startTime = Date.now();
    try {
      const result = await this.pool.query(SELECT_THREAD_SQL, [threadId]);
      return result.rows.map(toRecord);
    } finally {
      dbQueryDurationHistogram.observe({ operation: 'list_thread' }, (Date.now() - startTime) / 1000);
    }
  }

  async listRecent(limit: number): Promise<ProcessingRecord[]> {
    const startTime = Date.now();
    try {
      const result = await this.pool.query(SELECT_RECENT_SQL, [limit]);
      return result.rows.map(toRecord);
    } finally {
      dbQueryDurationHistogram.observe({ operation: 'list_recent' }, (Date.now() - startTime) / 1000);
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
