import type { ContractRecord, MatchResult, RepresentativeIdentity } from '../../domain/types.js';
import type { LedgerRow } from '../../infrastructure/sheets/types.js';
import { fieldValue } from '../extraction/index.js';

type UnmatchedResult = Extract<MatchResult, { status: 'unmatched' }>;

export const DEFAULT_FINANCING_STATUS = 'pending';

/**
 * date | customer | phone | address | equipment | price | installed |
 * financing by | financing status | comments | commission | commission date | link
 */
export function buildRepRow(record: ContractRecord): LedgerRow {
  return [
    fieldValue(record, 'contract_date'),
    fieldValue(record, 'customer_name'),
    fieldValue(record, 'phone'),
    fieldValue(record, 'address'),
    fieldValue(record, 'equipment'),
    fieldValue(record, 'sale_price'),
    '',
    fieldValue(record, 'financing_by'),
    DEFAULT_FINANCING_STATUS,
    '',
    '',
    '',
    record.sourceRef,
  ];
}

/** date | representative | customer | equipment | price | lead/PO | link */
export function buildMasterRow(record: ContractRecord, identity: RepresentativeIdentity): LedgerRow {
  return [
    fieldValue(record, 'contract_date'),
    identity.name,
    fieldValue(record, 'customer_name'),
    fieldValue(record, 'equipment'),
    fieldValue(record, 'sale_price'),
    fieldValue(record, 'lead_po'),
    record.sourceRef,
  ];
}

/** Rep row followed by the raw name, best candidate and its score for triage. */
export function buildBackupRow(record: ContractRecord, match: UnmatchedResult): LedgerRow {
  return [
    ...buildRepRow(record),
    fieldValue(record, 'sales_rep'),
    match.bestCandidate?.name ?? '',
    match.confidence.toFixed(2),
  ];
}
