import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { SourceMetadata } from '../../domain/types.js';

export interface SourceDocument {
  documentId: string;
  metadata: SourceMetadata;
  /** Reads and parses the document; only called for documents not yet processed. */
  readText(): Promise<Result<string, AppError>>;
  /** Marks the document as handled at the source (e.g. moves or flags it). */
  acknowledge?(): Promise<Result<void, AppError>>;
}

export type DocumentSource = AsyncIterable<SourceDocument> | Iterable<SourceDocument>;
