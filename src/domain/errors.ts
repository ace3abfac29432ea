export const ErrorCode = {
  // Document source / PDF
  SOURCE_UNAVAILABLE: 'SOURCE_UNAVAILABLE',
  SOURCE_READ_FAILED: 'SOURCE_READ_FAILED',
  SOURCE_ACK_FAILED: 'SOURCE_ACK_FAILED',
  PDF_PARSE_FAILED: 'PDF_PARSE_FAILED',
  PDF_EMPTY: 'PDF_EMPTY',
  PDF_TOO_LARGE: 'PDF_TOO_LARGE',

  // Extraction
  EXTRACTION_MISSING_FIELDS: 'EXTRACTION_MISSING_FIELDS',

  // Ledger writes
  LEDGER_UNREACHABLE: 'LEDGER_UNREACHABLE',
  LEDGER_AUTH_ERROR: 'LEDGER_AUTH_ERROR',
  LEDGER_INVALID_DESTINATION: 'LEDGER_INVALID_DESTINATION',
  TIMEOUT: 'TIMEOUT',

  // Dedup ledger
  DEDUP_STORE_ERROR: 'DEDUP_STORE_ERROR',
  DEDUP_STATE_CORRUPT: 'DEDUP_STATE_CORRUPT',

  // Lead service
  LEAD_CREATION_FAILED: 'LEAD_CREATION_FAILED',
  LEAD_ID_ACQUISITION_EXHAUSTED: 'LEAD_ID_ACQUISITION_EXHAUSTED',
  LEAD_API_ERROR: 'LEAD_API_ERROR',
  LEAD_API_AUTH_ERROR: 'LEAD_API_AUTH_ERROR',

  // Configuration / infrastructure
  CONFIG_INVALID: 'CONFIG_INVALID',
  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

export function describeError(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
