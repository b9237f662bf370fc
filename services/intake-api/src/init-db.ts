/**
 * One-time database schema setup (run when starting from scratch).
 * Runs schema/init.sql to create tables, indexes and the append-only trigger.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '@docintake/shared';
import { createPool } from './lib/db';

const pool = createPool();

function findSchemaFile(): string {
  const possiblePaths = [
    // Next to the sources
    path.join(__dirname, 'schema', 'init.sql'),
    // From compiled output under dist/
    path.join(__dirname, '../../../../services/intake-api/src/schema/init.sql'),
  ];
  const found = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`Schema file not found, looked in: ${possiblePaths.join(', ')}`);
  }
  return found;
}

async function runInitSchema(): Promise<void> {
  const client = await pool.connect();

  try {
    logger.info('Running database schema (init.sql)');

    const sql = fs.readFileSync(findSchemaFile(), 'utf-8');
    await client.query(sql);

    logger.info('Database schema complete');
  } catch (error) {
    logger.error('Schema init failed', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

runInitSchema()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
