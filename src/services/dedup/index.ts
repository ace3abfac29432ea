import { ok, type Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { PipelineConfig } from '../../infrastructure/config.js';
import { createDatabaseWithRetry } from '../../infrastructure/db/client.js';
import { logger } from '../../infrastructure/logger.js';
import { withTimeout } from '../../infrastructure/timeout.js';
import { FileProcessedStore } from './file-store.js';
import { KeyedMutex } from './lock.js';
import { PostgresProcessedStore } from './postgres-store.js';
import type { ProcessedSetStore } from './types.js';

export type { ProcessedSetStore } from './types.js';
export { FileProcessedStore } from './file-store.js';
export { PostgresProcessedStore } from './postgres-store.js';
export { KeyedMutex } from './lock.js';

const log = logger.child({ module: 'dedup-ledger' });

const DEFAULT_STORE_TIMEOUT_MS = 10_000;

export interface DedupLedgerOptions {
  timeoutMs?: number;
}

/**
 * Tracks which documents have had every downstream effect applied. A
 * document is marked only after all of its writes succeed; anything less
 * leaves it eligible for a full retry on the next cycle.
 */
export class DedupLedger {
  private readonly mutex = new KeyedMutex();
  private readonly timeoutMs: number;

  constructor(
    private readonly store: ProcessedSetStore,
    options: DedupLedgerOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
  }

  hasProcessed(documentId: string): Promise<Result<boolean, AppError>> {
    return withTimeout(this.store.has(documentId), this.timeoutMs, 'Processed-document lookup');
  }

  async markProcessed(
    documentId: string,
    sourceRef: string,
    processedAt: Date = new Date(),
  ): Promise<Result<void, AppError>> {
    const result = await withTimeout(
      this.store.add({ documentId, sourceRef, processedAt }),
      this.timeoutMs,
      'Processed-document write',
    );
    if (result.ok) {
      log.debug({ documentId, sourceRef }, 'Document marked processed');
    }
    return result;
  }

  async prune(before: Date): Promise<Result<number, AppError>> {
    const result = await withTimeout(this.store.prune(before), this.timeoutMs, 'Processed-document prune');
    if (result.ok && result.value > 0) {
      log.info({ removed: result.value, before: before.toISOString() }, 'Pruned processed documents');
    }
    return result;
  }

  /** Runs check, effects and mark for one document without interleaving. */
  runExclusive<T>(documentId: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(documentId, fn);
  }
}

export async function createDedupLedger(
  config: PipelineConfig['dedup'],
): Promise<Result<DedupLedger, AppError>> {
  if (config.store === 'file') {
    log.info({ store: 'file', path: config.statePath }, 'Using file dedup store');
    return ok(new DedupLedger(new FileProcessedStore(config.statePath)));
  }

  const db = await createDatabaseWithRetry(config.databaseUrl);
  if (!db.ok) return db;
  log.info({ store: 'postgres' }, 'Using Postgres dedup store');
  return ok(new DedupLedger(new PostgresProcessedStore(db.value)));
}
