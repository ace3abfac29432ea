import { describe, it, expect, vi } from 'vitest';
import {
  AccessTokenProvider,
  LeadApiClient,
  buildPoBatchPayload,
  parseLeadDate,
  type FetchFn,
  type LeadSubmission,
} from '../../src/infrastructure/lead-api/index.js';
import { ErrorCode } from '../../src/domain/errors.js';

const settings = {
  baseUrl: 'https://leads.test',
  apiKey: 'test-key',
  apiSecret: 'test-secret',
  vendorId: '12345',
  programGroup: 'SF&I Water Treatment',
  timeoutMs: 1000,
};

const submission: LeadSubmission = {
  orderNumber: 'ORD0000000042',
  firstName: 'Daniel',
  lastName: 'Rivera',
  phone: '7865550142',
  address: '1420 SW 87 AVE',
  city: 'Miami',
  state: 'FL',
  zipCode: '33174',
  storeId: '6310',
  appointment: '03/17/2026 08:00:00',
  submittedAt: '03/14/2026 10:30:00',
};

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

function fakeFetch(routes: Record<string, () => Response>) {
  return vi.fn<FetchFn>(async (input) => {
    const url = String(input);
    for (const [fragment, respond] of Object.entries(routes)) {
      if (url.includes(fragment)) return respond();
    }
    throw new Error(`unexpected request ${url}`);
  });
}

const tokenRoute = { '/auth/accesstoken': () => json({ access_token: 'test-token', expires_in: 1800 }) };

describe('AccessTokenProvider', () => {
  it('requests a token with basic credentials and caches it', async () => {
    const fetchFn = fakeFetch(tokenRoute);
    const provider = new AccessTokenProvider(settings, fetchFn, () => 0);

    expect(await provider.getToken()).toEqual({ ok: true, value: 'test-token' });
    expect(await provider.getToken()).toEqual({ ok: true, value: 'test-token' });

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn).toHaveBeenCalledWith(
      'https://leads.test/auth/accesstoken?grant_type=client_credentials',
      expect.objectContaining({
        method: 'GET',
        headers: {
          Authorization: `Basic ${Buffer.from('test-key:test-secret').toString('base64')}`,
          Accept: 'application/json',
        },
      }),
    );
  });

  it('refreshes the token five minutes before it expires', async () => {
    const fetchFn = fakeFetch(tokenRoute);
    let now = 0;
    const provider = new AccessTokenProvider(settings, fetchFn, () => now);

    await provider.getToken();
    now = 1_499_999;
    await provider.getToken();
    expect(fetchFn).toHaveBeenCalledTimes(1);

    now = 1_500_000;
    await provider.getToken();
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('reports rejected credentials as an auth error', async () => {
    const fetchFn = fakeFetch({ '/auth/accesstoken': () => new Response('denied', { status: 401 }) });
    const provider = new AccessTokenProvider(settings, fetchFn);

    const result = await provider.getToken();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.LEAD_API_AUTH_ERROR);
    expect(result.error.retryable).toBe(false);
    expect(result.error.details).toBe('HTTP 401: denied');
  });
});

describe('LeadApiClient', () => {
  it('submits the lead batch with the token in the appToken header', async () => {
    const fetchFn = fakeFetch({
      ...tokenRoute,
      '/leads/pobatch': () => json({ SFILEADPOBATCHICONX_Output: { Status: 'Success' } }),
    });
    const client = new LeadApiClient(settings, fetchFn);

    const result = await client.createLead(submission);

    expect(result).toEqual({ ok: true, value: undefined });
    expect(fetchFn).toHaveBeenNthCalledWith(
      2,
      'https://leads.test/leads/pobatch',
      expect.objectContaining({
        method: 'POST',
        headers: expect.objectContaining({ appToken: 'test-token' }),
        body: JSON.stringify(buildPoBatchPayload(submission, settings)),
      }),
    );
  });

  it('reports a rejected batch as a creation failure', async () => {
    const fetchFn = fakeFetch({
      ...tokenRoute,
      '/leads/pobatch': () =>
        json({ SFILEADPOBATCHICONX_Output: { Status: 'Error', Error_spcCode: 'E100', Error_spcMessage: 'Invalid store' } }),
    });
    const client = new LeadApiClient(settings, fetchFn);

    const result = await client.createLead(submission);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.LEAD_CREATION_FAILED);
    expect(result.error.details).toBe('E100: Invalid store');
  });

  it('reports an error status as a retryable API error', async () => {
    const fetchFn = fakeFetch({
      ...tokenRoute,
      '/leads/lookup': () => new Response('upstream down', { status: 502 }),
    });
    const client = new LeadApiClient(settings, fetchFn);

    const result = await client.lookupServiceCenterId('ORD0000000042');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.LEAD_API_ERROR);
    expect(result.error.retryable).toBe(true);
    expect(result.error.details).toBe('HTTP 502: upstream down');
  });

  it('returns the service center id once the lead is visible', async () => {
    const fetchFn = fakeFetch({
      ...tokenRoute,
      '/leads/lookup': () =>
        json({ SFILEADLOOKUPWS_Output: { ListOfSfileadbows: { Sfileadheaderws: [{ Id: 'F54933529', Status: 'New' }] } } }),
    });
    const client = new LeadApiClient(settings, fetchFn);

    expect(await client.lookupServiceCenterId('ORD0000000042')).toEqual({ ok: true, value: 'F54933529' });
    const [, init] = fetchFn.mock.calls[1];
    expect(init?.body).toBe(
      JSON.stringify({
        SFILEADLOOKUPWS_Input: {
          PageSize: '10',
          StartRowNum: '0',
          ListOfSfileadbows: { Sfileadheaderws: [{ MMSVCSServiceProviderOrderNumber: 'ORD0000000042' }] },
        },
      }),
    );
  });

  it('returns null while the lead is not visible yet', async () => {
    const fetchFn = fakeFetch({
      ...tokenRoute,
      '/leads/lookup': () => json({ SFILEADLOOKUPWS_Output: { ListOfSfileadbows: { Sfileadheaderws: [] } } }),
    });
    const client = new LeadApiClient(settings, fetchFn);

    expect(await client.lookupServiceCenterId('ORD0000000042')).toEqual({ ok: true, value: null });
  });
});

describe('LeadApiClient.findRecentLeadByPhone', () => {
  const since = new Date(2026, 2, 1);

  function clientWithLeads(leads: Record<string, string>[]) {
    const fetchFn = fakeFetch({
      ...tokenRoute,
      '/leads/lookup': () => json({ SFILEADLOOKUPWS_Output: { ListOfSfileadbows: { Sfileadheaderws: leads } } }),
    });
    return { fetchFn, client: new LeadApiClient(settings, fetchFn) };
  }

  it('looks leads up by preferred contact phone', async () => {
    const { fetchFn, client } = clientWithLeads([]);

    expect(await client.findRecentLeadByPhone('7865550142', since)).toEqual({ ok: true, value: null });
    const [, init] = fetchFn.mock.calls[1];
    expect(init?.body).toBe(
      JSON.stringify({
        SFILEADLOOKUPWS_Input: {
          PageSize: '50',
          StartRowNum: '0',
          ListOfSfileadbows: { Sfileadheaderws: [{ MMSVPreferredContactPhoneNumber: '7865550142' }] },
        },
      }),
    );
  });

  it('returns a lead created inside the window', async () => {
    const { client } = clientWithLeads([
      { Id: 'F11112222', MMSVCSServiceProviderOrderNumber: 'ORD0000000007', Created: '03/10/2026 09:15:00' },
    ]);

    expect(await client.findRecentLeadByPhone('7865550142', since)).toEqual({
      ok: true,
      value: { serviceCenterId: 'F11112222', orderNumber: 'ORD0000000007', createdAt: new Date(2026, 2, 10) },
    });
  });

  it('ignores leads created before the window', async () => {
    const { client } = clientWithLeads([
      { Id: 'F11112222', Created: '02/01/2026' },
      { Id: 'F33334444', Created: '2025-12-24' },
    ]);

    expect(await client.findRecentLeadByPhone('7865550142', since)).toEqual({ ok: true, value: null });
  });

  it('skips leads without a creation date and treats an unreadable one as recent', async () => {
    const { client } = clientWithLeads([
      { Id: 'F11112222' },
      { Id: 'F33334444', Created: 'yesterday' },
    ]);

    expect(await client.findRecentLeadByPhone('7865550142', since)).toEqual({
      ok: true,
      value: { serviceCenterId: 'F33334444', orderNumber: null, createdAt: null },
    });
  });
});

describe('parseLeadDate', () => {
  it('reads US and ISO dates as local midnight', () => {
    expect(parseLeadDate('03/10/2026 09:15:00')).toEqual(new Date(2026, 2, 10));
    expect(parseLeadDate('2026-03-10')).toEqual(new Date(2026, 2, 10));
  });

  it('rejects impossible and unknown formats', () => {
    expect(parseLeadDate('02/30/2026')).toBeNull();
    expect(parseLeadDate('March 10')).toBeNull();
  });
});

describe('buildPoBatchPayload', () => {
  it('carries the order number, vendor and appointment', () => {
    const payload = buildPoBatchPayload({ ...submission, email: 'customer@example.com' }, settings);
    const [header] = payload.SFILEADPOBATCHICONX_Input.ListOfMmSvCsServiceProviderLeadInbound.MmSvCsServiceProviderLeadHeaderInbound;

    expect(header.Id).toBe('ORD0000000042');
    expect(header.MMSVCSServiceProviderOrderNumber).toBe('ORD0000000042');
    expect(header.SFIMVendor).toBe(12345);
    expect(header.MainEmailAddress).toBe('customer@example.com');
    expect(header.MMSVCSLeadBatchNumber).toBe('BATCH0000000042');
    expect(header.ListOfMmSvCsServiceProviderAppointment.MmSvCsServiceProviderAppointment[0].ScheduleDate).toBe(
      '03/17/2026 08:00:00',
    );
  });
});
