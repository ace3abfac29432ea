import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { ProcessedEntry } from '../../domain/types.js';

/** Durable set of document ids whose effects were fully applied. */
export interface ProcessedSetStore {
  has(documentId: string): Promise<Result<boolean, AppError>>;
  /** Adding an id that is already present is a no-op. */
  add(entry: ProcessedEntry): Promise<Result<void, AppError>>;
  /** Removes entries processed before `before`; resolves to the number removed. */
  prune(before: Date): Promise<Result<number, AppError>>;
}
