import { customAlphabet } from 'nanoid';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { LeadRequest, LeadResult } from '../../domain/types.js';
import type { PollingConfig } from '../../infrastructure/config.js';
import type { LeadApi } from '../../infrastructure/lead-api/types.js';
import { logger } from '../../infrastructure/logger.js';
import { sleep as defaultSleep } from '../../infrastructure/timeout.js';
import { buildAppointment, formatTimestamp } from './appointment.js';
import { pollForId } from './polling.js';

export { buildAppointment, formatDate, formatTimestamp } from './appointment.js';
export { backoffDelays, pollForId, type AcquisitionOutcome } from './polling.js';

const orderDigits = customAlphabet('0123456789', 10);

export const DEFAULT_REUSE_WINDOW_DAYS = 14;
const DAY_MS = 24 * 60 * 60 * 1000;

export function generateOrderNumber(): string {
  return `ORD${orderDigits()}`;
}

export interface LeadServiceDeps {
  api: LeadApi;
  polling: PollingConfig;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  generateOrderNumber?: () => string;
  /** Days a lead for the same phone is reused instead of creating another; 0 always creates. */
  reuseWindowDays?: number;
}

/**
 * Creates the lead exactly once, then polls for the generated service
 * center id. Creation is never retried; a caller that sees an exhausted
 * acquisition can look the order number up later instead of resubmitting.
 * A lead created for the same phone within the reuse window is returned
 * instead of creating a duplicate.
 */
export async function createLeadAndAcquireId(
  request: LeadRequest,
  deps: LeadServiceDeps,
): Promise<Result<LeadResult, AppError>> {
  const now = (deps.now ?? (() => new Date()))();
  const orderNumber = (deps.generateOrderNumber ?? generateOrderNumber)();
  const appointment = buildAppointment(now, request.appointmentDate, request.appointmentTime);
  const customerName = `${request.firstName} ${request.lastName}`;
  const log = logger.child({ module: 'lead-service', orderNumber });

  const reuseWindowDays = deps.reuseWindowDays ?? DEFAULT_REUSE_WINDOW_DAYS;
  if (reuseWindowDays > 0) {
    const since = new Date(now.getTime() - reuseWindowDays * DAY_MS);
    const recent = await deps.api.findRecentLeadByPhone(request.phone, since);

    if (!recent.ok) {
      // the search only guards against duplicates; creation still goes ahead
      log.warn({ errorCode: recent.error.code, retryable: recent.error.retryable }, 'Recent lead search failed');
    } else if (recent.value && deps.polling.idPattern.test(recent.value.serviceCenterId)) {
      const { serviceCenterId } = recent.value;
      log.info({ serviceCenterId, reuseWindowDays }, 'Reusing recent lead for phone');
      return ok({
        orderNumber: recent.value.orderNumber ?? serviceCenterId,
        serviceCenterId,
        customerName,
        appointment,
        attempts: 0,
        reused: true,
      });
    }
  }

  const created = await deps.api.createLead({
    orderNumber,
    firstName: request.firstName,
    lastName: request.lastName,
    phone: request.phone,
    address: request.address,
    city: request.city,
    state: request.state,
    zipCode: request.zipCode,
    storeId: request.storeId,
    email: request.email,
    appointment,
    submittedAt: formatTimestamp(now),
  });

  if (!created.ok) {
    // a rejected token means nothing reached the lead system
    if (created.error.code === ErrorCode.LEAD_API_AUTH_ERROR) return created;

    log.error({ errorCode: ErrorCode.LEAD_CREATION_FAILED, retryable: false, cause: created.error.code }, 'Lead creation failed');
    return err(
      createAppError(
        ErrorCode.LEAD_CREATION_FAILED,
        'Lead creation failed',
        false,
        created.error.details ?? created.error.message,
      ),
    );
  }

  const outcome = await pollForId(
    () => deps.api.lookupServiceCenterId(orderNumber),
    deps.polling,
    deps.sleep ?? defaultSleep,
    log,
  );

  if (outcome.status === 'exhausted') {
    log.error(
      {
        errorCode: ErrorCode.LEAD_ID_ACQUISITION_EXHAUSTED,
        retryable: true,
        attempts: outcome.attempts,
        lastErrorCode: outcome.lastError?.code ?? null,
      },
      'Service center id not available within the attempt budget',
    );
    return err(
      createAppError(
        ErrorCode.LEAD_ID_ACQUISITION_EXHAUSTED,
        `Service center id not available after ${outcome.attempts} attempts`,
        true,
        orderNumber,
      ),
    );
  }

  return ok({
    orderNumber,
    serviceCenterId: outcome.id,
    customerName,
    appointment,
    attempts: outcome.attempts,
    reused: false,
  });
}
