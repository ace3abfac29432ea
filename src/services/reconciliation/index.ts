import type { Logger } from 'pino';
import type { ContractRecord, MatchResult } from '../../domain/types.js';
import type { LedgerClient, LedgerRow } from '../../infrastructure/sheets/types.js';
import { logger } from '../../infrastructure/logger.js';
import { withTimeout } from '../../infrastructure/timeout.js';
import { buildBackupRow, buildMasterRow, buildRepRow } from './rows.js';
import type { DestinationLedgers, LedgerTarget, ReconciliationReport, TargetWriteOutcome } from './types.js';

export type { DestinationLedgers, LedgerTarget, ReconciliationReport, TargetWriteOutcome } from './types.js';
export { buildBackupRow, buildMasterRow, buildRepRow } from './rows.js';

export interface ReconcileOptions {
  writeTimeoutMs: number;
  log?: Logger;
}

interface PlannedWrite {
  target: LedgerTarget;
  ledgerId: string;
  row: LedgerRow;
}

function planWrites(record: ContractRecord, match: MatchResult, ledgers: DestinationLedgers): PlannedWrite[] {
  if (match.status === 'matched') {
    return [
      { target: 'rep', ledgerId: match.identity.ledgerId, row: buildRepRow(record) },
      { target: 'master', ledgerId: ledgers.masterLedgerId, row: buildMasterRow(record, match.identity) },
    ];
  }
  return [{ target: 'backup', ledgerId: ledgers.backupLedgerId, row: buildBackupRow(record, match) }];
}

/**
 * Appends the record to every ledger its match result routes it to. Every
 * planned write is attempted even after an earlier one fails, so the report
 * lists each target's outcome.
 */
export async function reconcileRecord(
  record: ContractRecord,
  match: MatchResult,
  client: LedgerClient,
  ledgers: DestinationLedgers,
  options: ReconcileOptions,
): Promise<ReconciliationReport> {
  const log = options.log ?? logger.child({ module: 'reconciliation', documentId: record.documentId });
  const writes: TargetWriteOutcome[] = [];

  for (const planned of planWrites(record, match, ledgers)) {
    const result = await withTimeout(
      client.append(planned.ledgerId, planned.row, { timeoutMs: options.writeTimeoutMs }),
      options.writeTimeoutMs,
      `Append to ${planned.target} ledger`,
    );

    if (result.ok) {
      log.info({ step: 'writing_ledger', target: planned.target, ledgerId: planned.ledgerId }, 'Ledger row appended');
      writes.push({ target: planned.target, ledgerId: planned.ledgerId, ok: true, ack: result.value });
    } else {
      log.error(
        {
          step: 'writing_ledger',
          target: planned.target,
          ledgerId: planned.ledgerId,
          errorCode: result.error.code,
          retryable: result.error.retryable,
        },
        'Ledger write failed',
      );
      writes.push({ target: planned.target, ledgerId: planned.ledgerId, ok: false, error: result.error });
    }
  }

  return {
    documentId: record.documentId,
    route: match.status,
    writes,
    success: writes.every((write) => write.ok),
  };
}
