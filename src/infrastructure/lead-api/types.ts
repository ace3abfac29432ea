import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export type FetchFn = typeof fetch;

export interface LeadApiSettings {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  vendorId: string;
  programGroup: string;
  timeoutMs: number;
}

export interface LeadSubmission {
  orderNumber: string;
  firstName: string;
  lastName: string;
  phone: string;
  address: string;
  city: string;
  state: string;
  zipCode: string;
  storeId: string;
  email?: string;
  /** MM/DD/YYYY HH:MM:SS */
  appointment: string;
  /** MM/DD/YYYY HH:MM:SS */
  submittedAt: string;
}

export interface RecentLead {
  serviceCenterId: string;
  orderNumber: string | null;
  /** Null when the lead system reports no readable creation date. */
  createdAt: Date | null;
}

export interface LeadApi {
  createLead(submission: LeadSubmission): Promise<Result<void, AppError>>;
  /** Resolves to null while the lead is not yet visible to lookups. */
  lookupServiceCenterId(orderNumber: string): Promise<Result<string | null, AppError>>;
  /** Most recent lead for the phone number created on or after `since`. */
  findRecentLeadByPhone(phone: string, since: Date): Promise<Result<RecentLead | null, AppError>>;
}
