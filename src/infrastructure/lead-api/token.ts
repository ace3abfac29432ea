import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { ACCESS_TOKEN_STATE_VERSION, type AccessTokenState } from '../../domain/schemas.js';
import { tokenResponseSchema } from './schemas.js';
import type { FetchFn, LeadApiSettings } from './types.js';

const log = logger.child({ module: 'lead-api-token' });

export const TOKEN_EXPIRY_MARGIN_MS = 5 * 60 * 1000;

function authError(message: string, details?: string): AppError {
  return createAppError(ErrorCode.LEAD_API_AUTH_ERROR, message, false, details);
}

/**
 * Client-credentials token for the lead API, cached until five minutes
 * before it expires.
 */
export class AccessTokenProvider {
  private state: AccessTokenState | null = null;

  constructor(
    private readonly settings: Pick<LeadApiSettings, 'baseUrl' | 'apiKey' | 'apiSecret' | 'timeoutMs'>,
    private readonly fetchFn: FetchFn = fetch,
    private readonly now: () => number = Date.now,
  ) {}

  async getToken(): Promise<Result<string, AppError>> {
    if (this.state && this.now() < this.state.expiresAt - TOKEN_EXPIRY_MARGIN_MS) {
      return ok(this.state.accessToken);
    }
    return this.refresh();
  }

  invalidate(): void {
    this.state = null;
  }

  private async refresh(): Promise<Result<string, AppError>> {
    const credentials = Buffer.from(`${this.settings.apiKey}:${this.settings.apiSecret}`).toString('base64');

    let response: Response;
    try {
      response = await this.fetchFn(`${this.settings.baseUrl}/auth/accesstoken?grant_type=client_credentials`, {
        method: 'GET',
        headers: { Authorization: `Basic ${credentials}`, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });
    } catch (cause) {
      const details = describeError(cause);
      log.error({ errorCode: ErrorCode.LEAD_API_ERROR, retryable: true, details }, 'Token request failed');
      return err(createAppError(ErrorCode.LEAD_API_ERROR, 'Lead API token request failed', true, details));
    }

    if (!response.ok) {
      const details = `HTTP ${response.status}: ${await response.text()}`;
      log.error({ errorCode: ErrorCode.LEAD_API_AUTH_ERROR, retryable: false, details }, 'Token request rejected');
      return err(authError('Lead API rejected the client credentials', details));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (cause) {
      return err(authError('Lead API returned an unreadable token response', describeError(cause)));
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      log.error({ errorCode: ErrorCode.LEAD_API_AUTH_ERROR, details }, 'Token response invalid');
      return err(authError('Lead API returned an invalid token response', details));
    }

    this.state = {
      version: ACCESS_TOKEN_STATE_VERSION,
      accessToken: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000,
    };
    log.info({ expiresInSeconds: parsed.data.expires_in }, 'Lead API token obtained');
    return ok(this.state.accessToken);
  }
}
