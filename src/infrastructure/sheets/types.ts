import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export type LedgerRow = string[];

export interface AppendAck {
  ledgerId: string;
  /** A1 range the row landed in, when the destination reports it. */
  updatedRange: string | null;
}

export interface AppendOptions {
  timeoutMs: number;
}

/** Append-only destination ledger. */
export interface LedgerClient {
  append(ledgerId: string, row: LedgerRow, options: AppendOptions): Promise<Result<AppendAck, AppError>>;
}

export interface SheetsAppendRequest {
  spreadsheetId: string;
  range: string;
  valueInputOption: 'USER_ENTERED';
  insertDataOption: 'INSERT_ROWS';
  requestBody: { values: LedgerRow[] };
}

/** The slice of the Sheets values API the ledger client calls. */
export type SheetsAppendFn = (
  request: SheetsAppendRequest,
  options: { timeout: number },
) => Promise<{ updatedRange: string | null }>;
