export {
  LeadApiClient,
  buildLookupPayload,
  buildPhoneLookupPayload,
  buildPoBatchPayload,
  createLeadApiClient,
  parseLeadDate,
} from './client.js';
export { AccessTokenProvider, TOKEN_EXPIRY_MARGIN_MS } from './token.js';
export type { FetchFn, LeadApi, LeadApiSettings, LeadSubmission, RecentLead } from './types.js';
