import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { nanoid } from 'nanoid';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { ProcessedEntry } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { KeyedMutex } from './lock.js';
import { parseProcessedState, serializeProcessedState } from './state.js';
import type { ProcessedSetStore } from './types.js';

const log = logger.child({ module: 'dedup-file-store' });

const STATE_KEY = 'state';

function isNotFound(cause: unknown): boolean {
  return cause instanceof Error && 'code' in cause && cause.code === 'ENOENT';
}

function storeError(message: string, cause: unknown): AppError {
  return createAppError(ErrorCode.DEDUP_STORE_ERROR, message, true, describeError(cause));
}

/**
 * Processed set kept in a versioned JSON file. The file is loaded once and
 * rewritten whole on every change through a temp file and rename, so a crash
 * mid-write leaves the previous state intact. Writes for every document
 * share one lock, so each commit starts from the last committed set.
 */
export class FileProcessedStore implements ProcessedSetStore {
  private entries: Map<string, ProcessedEntry> | null = null;
  private readonly writes = new KeyedMutex();

  constructor(private readonly path: string) {}

  async has(documentId: string): Promise<Result<boolean, AppError>> {
    const loaded = await this.load();
    if (!loaded.ok) return loaded;
    return ok(loaded.value.has(documentId));
  }

  add(entry: ProcessedEntry): Promise<Result<void, AppError>> {
    return this.writes.runExclusive(STATE_KEY, () => this.addUnlocked(entry));
  }

  prune(before: Date): Promise<Result<number, AppError>> {
    return this.writes.runExclusive(STATE_KEY, () => this.pruneUnlocked(before));
  }

  private async addUnlocked(entry: ProcessedEntry): Promise<Result<void, AppError>> {
    const loaded = await this.load();
    if (!loaded.ok) return loaded;
    if (loaded.value.has(entry.documentId)) return ok(undefined);

    const next = new Map(loaded.value);
    next.set(entry.documentId, entry);
    return this.commit(next);
  }

  private async pruneUnlocked(before: Date): Promise<Result<number, AppError>> {
    const loaded = await this.load();
    if (!loaded.ok) return loaded;

    const next = new Map(
      [...loaded.value].filter(([, entry]) => entry.processedAt.getTime() >= before.getTime()),
    );
    const removed = loaded.value.size - next.size;
    if (removed === 0) return ok(0);

    const committed = await this.commit(next);
    if (!committed.ok) return committed;
    return ok(removed);
  }

  private async load(): Promise<Result<Map<string, ProcessedEntry>, AppError>> {
    if (this.entries) return ok(this.entries);

    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (cause) {
      if (isNotFound(cause)) {
        log.info({ path: this.path }, 'No processed-document state yet, starting empty');
        this.entries = new Map();
        return ok(this.entries);
      }
      log.error({ path: this.path, errorCode: ErrorCode.DEDUP_STORE_ERROR, error: describeError(cause) }, 'Failed to read processed-document state');
      return err(storeError('Failed to read processed-document state', cause));
    }

    const parsed = parseProcessedState(text);
    if (!parsed.ok) {
      log.error(
        { path: this.path, errorCode: parsed.error.code, retryable: false, details: parsed.error.details },
        parsed.error.message,
      );
      return parsed;
    }

    this.entries = new Map(parsed.value.map((entry) => [entry.documentId, entry]));
    log.info({ path: this.path, entryCount: this.entries.size }, 'Processed-document state loaded');
    return ok(this.entries);
  }

  private async commit(next: Map<string, ProcessedEntry>): Promise<Result<void, AppError>> {
    const tempPath = `${this.path}.${process.pid}.${nanoid(8)}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tempPath, serializeProcessedState(next.values()), 'utf-8');
      await rename(tempPath, this.path);
    } catch (cause) {
      log.error({ path: this.path, errorCode: ErrorCode.DEDUP_STORE_ERROR, error: describeError(cause) }, 'Failed to write processed-document state');
      return err(storeError('Failed to write processed-document state', cause));
    }

    this.entries = next;
    return ok(undefined);
  }
}
