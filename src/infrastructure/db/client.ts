import { neon } from '@neondatabase/serverless';
import { drizzle, type NeonHttpDatabase } from 'drizzle-orm/neon-http';
import { sql } from 'drizzle-orm';
import { logger } from '../logger.js';
import { createAppError, describeError, ErrorCode, type AppError } from '../../domain/errors.js';
import { ok, err, type Result } from '../../domain/result.js';
import { sleep } from '../timeout.js';
import * as schema from './schema.js';

const log = logger.child({ module: 'db' });

export type Database = NeonHttpDatabase<typeof schema>;

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;

function delayWithJitter(attempt: number): number {
  const base = BASE_DELAY_MS * Math.pow(2, attempt);
  const jitter = Math.random() * base * 0.5;
  return base + jitter;
}

export function createDatabase(connectionUrl: string): Database {
  return drizzle(neon(connectionUrl), { schema });
}

export async function createDatabaseWithRetry(
  connectionUrl: string,
): Promise<Result<Database, AppError>> {
  let lastError = '';

  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    try {
      const db = createDatabase(connectionUrl);
      await db.execute(sql`SELECT 1`);

      log.info({ attempt: attempt + 1 }, 'Database connection established');
      return ok(db);
    } catch (error) {
      lastError = describeError(error);
      log.warn(
        { attempt: attempt + 1, maxRetries: MAX_RETRIES, error: lastError },
        'Database connection attempt failed',
      );

      if (attempt < MAX_RETRIES - 1) {
        await sleep(delayWithJitter(attempt));
      }
    }
  }

  log.error({ maxRetries: MAX_RETRIES, lastError }, 'Database connection failed after all retries');
  return err(
    createAppError(
      ErrorCode.DB_CONNECTION_ERROR,
      `Failed to connect after ${MAX_RETRIES} attempts`,
      true,
      lastError,
    ),
  );
}
