import type { Logger } from 'pino';
import type { AppError } from '../../domain/errors.js';
import type { Result } from '../../domain/result.js';
import type { PollingConfig } from '../../infrastructure/config.js';

export type AcquisitionOutcome =
  | { status: 'resolved'; id: string; attempts: number }
  | { status: 'exhausted'; attempts: number; lastError: AppError | null };

/** Delay before each attempt: min(initial × factor^(n-1), max). */
export function backoffDelays(config: Omit<PollingConfig, 'idPattern'>): number[] {
  return Array.from({ length: config.maxAttempts }, (_, index) =>
    Math.min(Math.round(config.initialDelayMs * Math.pow(config.backoffFactor, index)), config.maxDelayMs),
  );
}

/**
 * Polls `lookup` until it yields an id matching the configured pattern or
 * the attempt budget runs out. Lookup errors use up an attempt.
 */
export async function pollForId(
  lookup: () => Promise<Result<string | null, AppError>>,
  config: PollingConfig,
  sleep: (ms: number) => Promise<void>,
  log: Logger,
): Promise<AcquisitionOutcome> {
  const delays = backoffDelays(config);
  log.info(
    { maxAttempts: config.maxAttempts, budgetMs: delays.reduce((sum, d) => sum + d, 0) },
    'Polling for generated id',
  );

  let lastError: AppError | null = null;

  for (const [index, delay] of delays.entries()) {
    const attempt = index + 1;
    await sleep(delay);

    const result = await lookup();
    if (!result.ok) {
      lastError = result.error;
      log.warn({ attempt, errorCode: result.error.code, retryable: result.error.retryable }, 'Id lookup failed');
      continue;
    }

    const id = result.value;
    if (id !== null && config.idPattern.test(id)) {
      log.info({ attempt, id }, 'Generated id resolved');
      return { status: 'resolved', id, attempts: attempt };
    }

    log.debug({ attempt, id }, 'Generated id not available yet');
  }

  return { status: 'exhausted', attempts: config.maxAttempts, lastError };
}
