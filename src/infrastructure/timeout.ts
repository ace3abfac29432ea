import { err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Races `operation` against a timer. A timeout resolves to a retryable
 * TIMEOUT error; the underlying operation is not cancelled, so callers that
 * can abort (fetch, gaxios) should also pass the deadline down.
 */
export async function withTimeout<T>(
  operation: Promise<Result<T, AppError>>,
  timeoutMs: number,
  label: string,
): Promise<Result<T, AppError>> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<Result<T, AppError>>((resolve) => {
    timer = setTimeout(() => {
      resolve(
        err(createAppError(ErrorCode.TIMEOUT, `${label} timed out after ${timeoutMs}ms`, true)),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
