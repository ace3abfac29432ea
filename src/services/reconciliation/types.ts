import type { AppError } from '../../domain/errors.js';
import type { MatchResult } from '../../domain/types.js';
import type { AppendAck } from '../../infrastructure/sheets/types.js';

export type LedgerTarget = 'rep' | 'master' | 'backup';

export type TargetWriteOutcome =
  | { target: LedgerTarget; ledgerId: string; ok: true; ack: AppendAck }
  | { target: LedgerTarget; ledgerId: string; ok: false; error: AppError };

export interface ReconciliationReport {
  documentId: string;
  route: MatchResult['status'];
  writes: TargetWriteOutcome[];
  /** True only when every attempted write succeeded. */
  success: boolean;
}

export interface DestinationLedgers {
  masterLedgerId: string;
  backupLedgerId: string;
}
