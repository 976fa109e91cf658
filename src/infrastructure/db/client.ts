import { neon } from '@neondatabase/serverless';
import { drizzle, type NeonHttpDatabase } from 'drizzle-orm/neon-http';
import { logger } from '../logger.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { ok, err, type Result } from '../../domain/result.js';
import * as schema from './schema.js';

export type Database = NeonHttpDatabase<typeof schema>;

const log = logger.child({ module: 'db' });

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function delayWithJitter(attempt: number): number {
  const base = BASE_DELAY_MS * Math.pow(2, attempt);
  return base + Math.random() * base * 0.5;
}

export function createDatabase(url: string): Database {
  return drizzle(neon(url), { schema });
}

/** Connects and probes with `SELECT 1`, backing off between attempts. */
export async function connectDatabase(url: string): Promise<Result<Database, AppError>> {
  let lastError = '';

  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    try {
      const db = createDatabase(url);
      await db.execute('SELECT 1');

      log.info({ attempt: attempt + 1 }, 'Database connection established');
      return ok(db);
    } catch (cause) {
      lastError = describeCause(cause);
      log.warn({ attempt: attempt + 1, maxRetries: MAX_RETRIES, details: lastError }, 'Database connection attempt failed');

      if (attempt < MAX_RETRIES - 1) {
        await sleep(delayWithJitter(attempt));
      }
    }
  }

  log.error({ maxRetries: MAX_RETRIES, details: lastError }, 'Database connection failed after all retries');
  return err(
    createAppError(ErrorCode.DB_CONNECTION_ERROR, `Failed to connect after ${MAX_RETRIES} attempts`, true, lastError),
  );
}
