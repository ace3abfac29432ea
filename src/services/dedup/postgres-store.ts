import type { Database } from '../../infrastructure/db/client.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { ProcessedEntry } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import {
  deleteProcessedDocumentsBefore,
  findProcessedDocument,
  insertProcessedDocument,
} from './repository.js';
import type { ProcessedSetStore } from './types.js';

const log = logger.child({ module: 'dedup-postgres-store' });

export class PostgresProcessedStore implements ProcessedSetStore {
  constructor(private readonly db: Database) {}

  async has(documentId: string): Promise<Result<boolean, AppError>> {
    try {
      return ok((await findProcessedDocument(this.db, documentId)) !== null);
    } catch (error) {
      return this.fail('Failed to look up processed document', error, { documentId });
    }
  }

  async add(entry: ProcessedEntry): Promise<Result<void, AppError>> {
    try {
      await insertProcessedDocument(this.db, entry);
      return ok(undefined);
    } catch (error) {
      return this.fail('Failed to record processed document', error, { documentId: entry.documentId });
    }
  }

  async prune(before: Date): Promise<Result<number, AppError>> {
    try {
      return ok(await deleteProcessedDocumentsBefore(this.db, before));
    } catch (error) {
      return this.fail('Failed to prune processed documents', error, { before: before.toISOString() });
    }
  }

  private fail(
    message: string,
    error: unknown,
    context: Record<string, string>,
  ): { ok: false; error: AppError } {
    const details = describeError(error);
    log.error({ ...context, errorCode: ErrorCode.DEDUP_STORE_ERROR, retryable: true, error: details }, message);
    return err(createAppError(ErrorCode.DEDUP_STORE_ERROR, message, true, details));
  }
}
