import { google } from 'googleapis';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { AppendAck, AppendOptions, LedgerClient, LedgerRow, SheetsAppendFn } from './types.js';

export type { AppendAck, AppendOptions, LedgerClient, LedgerRow, SheetsAppendFn } from './types.js';

const log = logger.child({ module: 'sheets-ledger' });

const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

function httpStatusOf(cause: unknown): number | undefined {
  if (typeof cause !== 'object' || cause === null) return undefined;
  if ('status' in cause && typeof cause.status === 'number') return cause.status;
  if ('response' in cause && typeof cause.response === 'object' && cause.response !== null) {
    const response = cause.response;
    if ('status' in response && typeof response.status === 'number') return response.status;
  }
  return undefined;
}

export function mapLedgerError(cause: unknown, ledgerId: string): AppError {
  const status = httpStatusOf(cause);
  const details = describeError(cause);

  if (status === 401 || status === 403) {
    return createAppError(ErrorCode.LEDGER_AUTH_ERROR, `Not authorized to write ledger ${ledgerId}`, false, details);
  }
  if (status === 400 || status === 404) {
    return createAppError(
      ErrorCode.LEDGER_INVALID_DESTINATION,
      `Ledger ${ledgerId} does not exist or rejected the row`,
      false,
      details,
    );
  }
  return createAppError(ErrorCode.LEDGER_UNREACHABLE, `Ledger ${ledgerId} is unreachable`, true, details);
}

export class SheetsLedgerClient implements LedgerClient {
  constructor(private readonly appendValues: SheetsAppendFn) {}

  async append(
    ledgerId: string,
    row: LedgerRow,
    options: AppendOptions,
  ): Promise<Result<AppendAck, AppError>> {
    try {
      const response = await this.appendValues(
        {
          spreadsheetId: ledgerId,
          range: 'A:Z',
          valueInputOption: 'USER_ENTERED',
          insertDataOption: 'INSERT_ROWS',
          requestBody: { values: [row] },
        },
        { timeout: options.timeoutMs },
      );

      log.debug({ ledgerId, updatedRange: response.updatedRange }, 'Row appended');
      return ok({ ledgerId, updatedRange: response.updatedRange });
    } catch (cause) {
      const error = mapLedgerError(cause, ledgerId);
      log.error(
        { ledgerId, errorCode: error.code, retryable: error.retryable, details: error.details },
        error.message,
      );
      return err(error);
    }
  }
}

/**
 * Builds a client authenticated through Application Default Credentials
 * (GOOGLE_APPLICATION_CREDENTIALS pointing at a service-account key).
 */
export function createSheetsLedgerClient(): SheetsLedgerClient {
  const auth = new google.auth.GoogleAuth({ scopes: [SHEETS_SCOPE] });
  const sheets = google.sheets({ version: 'v4', auth });

  return new SheetsLedgerClient(async (request, options) => {
    const response = await sheets.spreadsheets.values.append(request, options);
    return { updatedRange: response.data.updates?.updatedRange ?? null };
  });
}
