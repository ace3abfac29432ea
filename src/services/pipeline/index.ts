import { nanoid } from 'nanoid';
import { createDocumentLogger, logger } from '../../infrastructure/logger.js';
import type { DocumentSource, SourceDocument } from '../../infrastructure/document-source/types.js';
import { extractContractRecord } from '../extraction/index.js';
import { resolveRepresentative } from '../identity/index.js';
import { reconcileRecord } from '../reconciliation/index.js';
import type { CycleSummary, DocumentOutcome, DocumentStatus, PipelineDeps } from './types.js';

export type { CycleSummary, DocumentOutcome, DocumentStatus, PipelineDeps } from './types.js';

const log = logger.child({ module: 'pipeline' });

async function processUnderLock(
  doc: SourceDocument,
  deps: PipelineDeps,
  cycleId: string,
): Promise<DocumentOutcome> {
  const { documentId } = doc;
  let docLog = createDocumentLogger(documentId, cycleId);

  const seen = await deps.dedup.hasProcessed(documentId);
  if (!seen.ok) {
    docLog.error({ step: 'dedup_check', errorCode: seen.error.code, retryable: seen.error.retryable }, seen.error.message);
    return { documentId, status: 'dedup_unavailable', error: seen.error };
  }
  if (seen.value) {
    docLog.debug({ step: 'dedup_check' }, 'Already processed, skipping');
    return { documentId, status: 'skipped_duplicate' };
  }

  const text = await doc.readText();
  if (!text.ok) {
    docLog.warn({ step: 'reading', errorCode: text.error.code, retryable: text.error.retryable }, 'Document unreadable, not marking processed');
    return { documentId, status: 'extraction_failed', error: text.error };
  }

  const extracted = extractContractRecord(text.value, deps.rules, documentId, doc.metadata);
  if (!extracted.ok) {
    docLog.warn(
      { step: 'extracting', errorCode: extracted.error.code, missingFields: extracted.error.missingFields },
      extracted.error.message,
    );
    return { documentId, status: 'extraction_failed', error: extracted.error };
  }
  const record = extracted.value;

  const match = resolveRepresentative(record.fields.sales_rep?.value, deps.registry, deps.matchThreshold);
  if (match.status === 'matched') {
    docLog = createDocumentLogger(documentId, cycleId, match.identity.name);
    docLog.info({ step: 'matching', confidence: match.confidence, matchedName: match.matchedName }, 'Representative matched');
  } else {
    docLog.info(
      {
        step: 'matching',
        rawName: record.fields.sales_rep?.value ?? null,
        bestCandidate: match.bestCandidate?.name ?? null,
        confidence: match.confidence,
      },
      'Representative unmatched, routing to backup ledger',
    );
  }

  const report = await reconcileRecord(record, match, deps.ledgerClient, deps.ledgers, {
    writeTimeoutMs: deps.writeTimeoutMs,
    log: docLog,
  });
  if (!report.success) {
    docLog.warn({ step: 'writing_ledger', failedTargets: report.writes.filter((w) => !w.ok).map((w) => w.target) }, 'Not marking processed, will retry next cycle');
    return { documentId, status: 'write_failed', match, report };
  }

  const marked = await deps.dedup.markProcessed(documentId, doc.metadata.sourceRef);
  if (!marked.ok) {
    docLog.error({ step: 'marking', errorCode: marked.error.code, retryable: marked.error.retryable }, marked.error.message);
    return { documentId, status: 'mark_failed', match, report, error: marked.error };
  }

  if (deps.acknowledgeSource && doc.acknowledge) {
    const acknowledged = await doc.acknowledge();
    if (!acknowledged.ok) {
      docLog.warn({ step: 'acknowledging', errorCode: acknowledged.error.code }, 'Source acknowledgement failed; document stays deduplicated');
    }
  }

  docLog.info({ step: 'completed', route: report.route }, 'Document processed');
  return { documentId, status: 'completed', match, report };
}

/**
 * Runs one document through gate, read, extract, match, write and mark.
 * Concurrent calls for the same document id are serialized.
 */
export function processDocument(
  doc: SourceDocument,
  deps: PipelineDeps,
  cycleId: string = nanoid(),
): Promise<DocumentOutcome> {
  return deps.dedup.runExclusive(doc.documentId, () => processUnderLock(doc, deps, cycleId));
}

function emptyCounts(): Record<DocumentStatus, number> {
  return {
    skipped_duplicate: 0,
    dedup_unavailable: 0,
    extraction_failed: 0,
    write_failed: 0,
    mark_failed: 0,
    completed: 0,
  };
}

/** Processes every document from the source sequentially. */
export async function runCycle(source: DocumentSource, deps: PipelineDeps): Promise<CycleSummary> {
  const cycleId = nanoid();
  const outcomes: DocumentOutcome[] = [];
  const counts = emptyCounts();

  log.info({ cycleId }, 'Cycle started');

  for await (const doc of source) {
    const outcome = await processDocument(doc, deps, cycleId);
    outcomes.push(outcome);
    counts[outcome.status] += 1;
  }

  log.info({ cycleId, total: outcomes.length, ...counts }, 'Cycle finished');
  return { cycleId, total: outcomes.length, counts, outcomes };
}
