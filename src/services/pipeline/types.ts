import type { AppError } from '../../domain/errors.js';
import type { MatchResult, RepresentativeRegistry } from '../../domain/types.js';
import type { LedgerClient } from '../../infrastructure/sheets/types.js';
import type { DedupLedger } from '../dedup/index.js';
import type { CompiledRuleSet } from '../extraction/index.js';
import type { DestinationLedgers, ReconciliationReport } from '../reconciliation/index.js';

export interface PipelineDeps {
  dedup: DedupLedger;
  rules: CompiledRuleSet;
  registry: RepresentativeRegistry;
  ledgerClient: LedgerClient;
  ledgers: DestinationLedgers;
  matchThreshold: number;
  writeTimeoutMs: number;
  /** Acknowledge documents at the source once they are marked processed. */
  acknowledgeSource: boolean;
}

export type DocumentOutcome =
  | { documentId: string; status: 'skipped_duplicate' }
  | { documentId: string; status: 'dedup_unavailable'; error: AppError }
  | { documentId: string; status: 'extraction_failed'; error: AppError }
  | { documentId: string; status: 'write_failed'; match: MatchResult; report: ReconciliationReport }
  | { documentId: string; status: 'mark_failed'; match: MatchResult; report: ReconciliationReport; error: AppError }
  | { documentId: string; status: 'completed'; match: MatchResult; report: ReconciliationReport };

export type DocumentStatus = DocumentOutcome['status'];

export interface CycleSummary {
  cycleId: string;
  total: number;
  counts: Record<DocumentStatus, number>;
  outcomes: DocumentOutcome[];
}
