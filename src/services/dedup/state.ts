import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeError, ErrorCode, type AppError } from '../../domain/errors.js';
import { PROCESSED_STATE_VERSION, processedStateSchema, type ProcessedState } from '../../domain/schemas.js';
import type { ProcessedEntry } from '../../domain/types.js';

function corrupt(details: string): AppError {
  return createAppError(ErrorCode.DEDUP_STATE_CORRUPT, 'Processed-document state is unreadable', false, details);
}

export function serializeProcessedState(entries: Iterable<ProcessedEntry>): string {
  const state: ProcessedState = {
    version: PROCESSED_STATE_VERSION,
    entries: [...entries]
      .sort((a, b) => (a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0))
      .map((entry) => ({
        documentId: entry.documentId,
        sourceRef: entry.sourceRef,
        processedAt: entry.processedAt.toISOString(),
      })),
  };
  return `${JSON.stringify(state, null, 2)}\n`;
}

export function parseProcessedState(text: string): Result<ProcessedEntry[], AppError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (cause) {
    return err(corrupt(describeError(cause)));
  }

  const parsed = processedStateSchema.safeParse(raw);
  if (!parsed.success) {
    return err(corrupt(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')));
  }

  return ok(
    parsed.data.entries.map((entry) => ({
      documentId: entry.documentId,
      sourceRef: entry.sourceRef,
      processedAt: new Date(entry.processedAt),
    })),
  );
}
