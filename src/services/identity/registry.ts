import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeError, ErrorCode, type AppError } from '../../domain/errors.js';
import { representativeRegistrySchema } from '../../domain/schemas.js';
import type { RepresentativeRegistry } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'rep-registry' });

export function parseRegistry(raw: unknown): Result<RepresentativeRegistry, AppError> {
  const parsed = representativeRegistrySchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(createAppError(ErrorCode.CONFIG_INVALID, 'Invalid representative registry', false, details));
  }
  return ok({ representatives: Object.freeze(parsed.data.representatives) });
}

export async function loadRepresentativeRegistry(
  path: string,
): Promise<Result<RepresentativeRegistry, AppError>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (cause) {
    const details = describeError(cause);
    log.error({ path, errorCode: ErrorCode.CONFIG_INVALID, details }, 'Failed to read representative registry');
    return err(
      createAppError(ErrorCode.CONFIG_INVALID, 'Failed to read representative registry', false, details),
    );
  }

  const result = parseRegistry(raw);
  if (!result.ok) {
    log.error({ path, errorCode: result.error.code, details: result.error.details }, result.error.message);
    return result;
  }

  log.info({ path, representativeCount: result.value.representatives.length }, 'Representative registry loaded');
  return result;
}
