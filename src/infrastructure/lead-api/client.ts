import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { createLeadResponseSchema, lookupLeadResponseSchema } from './schemas.js';
import { AccessTokenProvider } from './token.js';
import type { FetchFn, LeadApi, LeadApiSettings, LeadSubmission, RecentLead } from './types.js';

const log = logger.child({ module: 'lead-api' });

const SERVICE_PROVIDER_TYPE_CODE = 10;
const LEAD_DESCRIPTION = 'Water treatment service';

export function buildPoBatchPayload(submission: LeadSubmission, settings: Pick<LeadApiSettings, 'vendorId' | 'programGroup'>) {
  return {
    SFILEADPOBATCHICONX_Input: {
      ListOfMmSvCsServiceProviderLeadInbound: {
        MmSvCsServiceProviderLeadHeaderInbound: [
          {
            Id: submission.orderNumber,
            ContactFirstName: submission.firstName,
            ContactLastName: submission.lastName,
            Description: LEAD_DESCRIPTION,
            MMSVCSServiceProviderOrderNumber: submission.orderNumber,
            MMSVPreferredContactPhoneNumber: submission.phone,
            MMSVSiteAddress: submission.address,
            MMSVSiteCity: submission.city,
            MMSVSiteState: submission.state,
            MMSVSitePostalCode: submission.zipCode,
            MMSVSiteCountry: 'US',
            MMSVStoreNumber: submission.storeId,
            SFIMVendor: Number(settings.vendorId),
            SFIProgramGroupNameUnconstrained: settings.programGroup,
            SFIReferralStore: submission.storeId,
            SFIWorkflowOnlyStatus: 'Confirmed',
            MMSVCSNeedAck: 'N',
            MMSVCSSubmitLeadFlag: 'N',
            MMSVCSSVSTypeCode: SERVICE_PROVIDER_TYPE_CODE,
            SFIContractDate: submission.submittedAt,
            MMSVCSLeadBatchNumber: `BATCH${submission.orderNumber.replace(/^ORD/, '')}`,
            ...(submission.email !== undefined && { MainEmailAddress: submission.email }),
            ListOfMmSvCsServiceProviderAppointment: {
              MmSvCsServiceProviderAppointment: [
                {
                  Id: 'APPT1',
                  OriginalApptDate: '',
                  ScheduleDate: submission.appointment,
                  RescheduledFlag: 'N',
                  PreferredScheduleDate: submission.appointment,
                },
              ],
            },
          },
        ],
      },
    },
  };
}

export function buildLookupPayload(orderNumber: string) {
  return {
    SFILEADLOOKUPWS_Input: {
      PageSize: '10',
      StartRowNum: '0',
      ListOfSfileadbows: {
        Sfileadheaderws: [{ MMSVCSServiceProviderOrderNumber: orderNumber }],
      },
    },
  };
}

export function buildPhoneLookupPayload(phone: string) {
  return {
    SFILEADLOOKUPWS_Input: {
      PageSize: '50',
      StartRowNum: '0',
      ListOfSfileadbows: {
        Sfileadheaderws: [{ MMSVPreferredContactPhoneNumber: phone }],
      },
    },
  };
}

/** Reads the date part of `MM/DD/YYYY[ HH:MM:SS]` or `YYYY-MM-DD` as local midnight. */
export function parseLeadDate(text: string): Date | null {
  const day = text.trim().split(/\s+/)[0] ?? '';
  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(day);
  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(day);

  let year: number;
  let month: number;
  let date: number;
  if (us) {
    [year, month, date] = [Number(us[3]), Number(us[1]), Number(us[2])];
  } else if (iso) {
    [year, month, date] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
  } else {
    return null;
  }

  const parsed = new Date(year, month - 1, date);
  return parsed.getMonth() === month - 1 && parsed.getDate() === date ? parsed : null;
}

function unexpectedShape(path: string, issues: { path: (string | number)[]; message: string }[]): AppError {
  const details = issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
  log.error({ path, errorCode: ErrorCode.LEAD_API_ERROR, details }, 'Unexpected lead API response');
  return createAppError(ErrorCode.LEAD_API_ERROR, `Unexpected response shape from ${path}`, true, details);
}

export class LeadApiClient implements LeadApi {
  private readonly tokens: AccessTokenProvider;

  constructor(
    private readonly settings: LeadApiSettings,
    private readonly fetchFn: FetchFn = fetch,
    tokens?: AccessTokenProvider,
  ) {
    this.tokens = tokens ?? new AccessTokenProvider(settings, fetchFn);
  }

  async createLead(submission: LeadSubmission): Promise<Result<void, AppError>> {
    const body = await this.post('/leads/pobatch', buildPoBatchPayload(submission, this.settings));
    if (!body.ok) return body;

    const parsed = createLeadResponseSchema.safeParse(body.value);
    if (!parsed.success) return err(unexpectedShape('/leads/pobatch', parsed.error.issues));

    const output = parsed.data.SFILEADPOBATCHICONX_Output;
    if (output?.Status !== 'Success') {
      const details = output
        ? `${output.Error_spcCode ?? 'N/A'}: ${output.Error_spcMessage ?? 'Unknown error'}`
        : 'Response has no batch output';
      log.error(
        { orderNumber: submission.orderNumber, errorCode: ErrorCode.LEAD_CREATION_FAILED, retryable: false, details },
        'Lead creation rejected',
      );
      return err(createAppError(ErrorCode.LEAD_CREATION_FAILED, 'Lead API rejected the lead', false, details));
    }

    log.info({ orderNumber: submission.orderNumber }, 'Lead created');
    return ok(undefined);
  }

  async lookupServiceCenterId(orderNumber: string): Promise<Result<string | null, AppError>> {
    const body = await this.post('/leads/lookup', buildLookupPayload(orderNumber));
    if (!body.ok) return body;

    const parsed = lookupLeadResponseSchema.safeParse(body.value);
    if (!parsed.success) return err(unexpectedShape('/leads/lookup', parsed.error.issues));

    const leads = parsed.data.SFILEADLOOKUPWS_Output?.ListOfSfileadbows?.Sfileadheaderws ?? [];
    const id = leads[0]?.Id;
    return ok(id !== undefined && id.length > 0 ? id : null);
  }

  async findRecentLeadByPhone(phone: string, since: Date): Promise<Result<RecentLead | null, AppError>> {
    const body = await this.post('/leads/lookup', buildPhoneLookupPayload(phone));
    if (!body.ok) return body;

    const parsed = lookupLeadResponseSchema.safeParse(body.value);
    if (!parsed.success) return err(unexpectedShape('/leads/lookup', parsed.error.issues));

    const leads = parsed.data.SFILEADLOOKUPWS_Output?.ListOfSfileadbows?.Sfileadheaderws ?? [];
    for (const lead of leads) {
      if (!lead.Id || lead.Created === undefined) continue;

      // a creation date the lead system formats unexpectedly still counts as recent
      const createdAt = parseLeadDate(lead.Created);
      if (createdAt === null || createdAt.getTime() >= since.getTime()) {
        log.info({ serviceCenterId: lead.Id, created: lead.Created, leadCount: leads.length }, 'Recent lead found for phone');
        return ok({ serviceCenterId: lead.Id, orderNumber: lead.MMSVCSServiceProviderOrderNumber ?? null, createdAt });
      }
    }

    log.debug({ leadCount: leads.length }, 'No recent lead for phone');
    return ok(null);
  }

  private async post(path: string, payload: unknown): Promise<Result<unknown, AppError>> {
    const token = await this.tokens.getToken();
    if (!token.ok) return token;

    let response: Response;
    try {
      response = await this.fetchFn(`${this.settings.baseUrl}${path}`, {
        method: 'POST',
        headers: { appToken: token.value, 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });
    } catch (cause) {
      const details = describeError(cause);
      log.error({ path, errorCode: ErrorCode.LEAD_API_ERROR, retryable: true, details }, 'Lead API request failed');
      return err(createAppError(ErrorCode.LEAD_API_ERROR, `Lead API request to ${path} failed`, true, details));
    }

    if (response.status === 401 || response.status === 403) {
      this.tokens.invalidate();
    }

    if (!response.ok) {
      const details = `HTTP ${response.status}: ${await response.text()}`;
      log.error({ path, errorCode: ErrorCode.LEAD_API_ERROR, retryable: true, details }, 'Lead API returned an error status');
      return err(createAppError(ErrorCode.LEAD_API_ERROR, `Lead API request to ${path} failed`, true, details));
    }

    try {
      return ok(await response.json());
    } catch (cause) {
      const details = describeError(cause);
      return err(createAppError(ErrorCode.LEAD_API_ERROR, `Lead API returned invalid JSON for ${path}`, true, details));
    }
  }
}

export function createLeadApiClient(settings: LeadApiSettings): LeadApiClient {
  return new LeadApiClient(settings);
}
