import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../../src/api/app.js';
import { ok, err } from '../../src/domain/result.js';
import { createAppError, ErrorCode } from '../../src/domain/errors.js';
import type { LeadApi } from '../../src/infrastructure/lead-api/types.js';

const createLead = vi.fn<LeadApi['createLead']>();
const lookupServiceCenterId = vi.fn<LeadApi['lookupServiceCenterId']>();
const findRecentLeadByPhone = vi.fn<LeadApi['findRecentLeadByPhone']>();

const app = createApp({
  api: { createLead, lookupServiceCenterId, findRecentLeadByPhone },
  polling: { maxAttempts: 2, initialDelayMs: 0, backoffFactor: 1.5, maxDelayMs: 0, idPattern: /^F\d{8}$/ },
  sleep: async () => {},
  generateOrderNumber: () => 'ORD0000000042',
});

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  await new Promise<void>((resolve) => {
    server = app.listen(0, () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

beforeEach(() => {
  vi.clearAllMocks();
  createLead.mockResolvedValue(ok(undefined));
  lookupServiceCenterId.mockResolvedValue(ok('F54933529'));
  findRecentLeadByPhone.mockResolvedValue(ok(null));
});

const validBody = {
  first_name: 'Daniel',
  last_name: 'Rivera',
  phone: '(786) 555-0142',
  address: '1420 SW 87 AVE',
  city: 'Miami',
  state: 'fl',
  zip_code: '33174',
  store_id: '6310',
};

function postLead(body: unknown): Promise<Response> {
  return fetch(`${baseUrl}/create-lead`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('GET /health', () => {
  it('reports ok', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.status).toBe('ok');
  });
});

describe('GET /openapi.json', () => {
  it('serves the API description', async () => {
    const response = await fetch(`${baseUrl}/openapi.json`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(Object.keys(body.paths)).toEqual(['/health', '/create-lead']);
  });
});

describe('POST /create-lead', () => {
  it('returns the order number and resolved service center id', async () => {
    const response = await postLead({ ...validBody, appointment_date: '04/01/2026', appointment_time: '14:30' });
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toEqual({
      success: true,
      data: {
        orderNumber: 'ORD0000000042',
        serviceCenterId: 'F54933529',
        customerName: 'Daniel Rivera',
        appointment: '04/01/2026 14:30:00',
        attempts: 1,
        reused: false,
      },
      error: null,
    });
    expect(createLead).toHaveBeenCalledWith(expect.objectContaining({ phone: '7865550142', state: 'FL' }));
  });

  it('returns a recent lead for the same phone instead of creating one', async () => {
    findRecentLeadByPhone.mockResolvedValue(
      ok({ serviceCenterId: 'F11112222', orderNumber: 'ORD0000000007', createdAt: new Date(2026, 2, 10) }),
    );

    const response = await postLead(validBody);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.data.serviceCenterId).toBe('F11112222');
    expect(body.data.reused).toBe(true);
    expect(createLead).not.toHaveBeenCalled();
  });

  it('accepts a phone written with the country code', async () => {
    const response = await postLead({ ...validBody, phone: '+1 786 555 0142' });

    expect(response.status).toBe(200);
    expect(createLead).toHaveBeenCalledWith(expect.objectContaining({ phone: '7865550142' }));
  });

  it('defaults the appointment to 08:00', async () => {
    const response = await postLead(validBody);
    const body = await response.json();

    expect(body.data.appointment).toMatch(/^\d{2}\/\d{2}\/\d{4} 08:00:00$/);
  });

  it('rejects an invalid body with 422 before calling the lead system', async () => {
    const response = await postLead({ ...validBody, phone: '555-0142' });
    const body = await response.json();

    expect(response.status).toBe(422);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.details).toBe('phone: Phone must contain 10 digits');
    expect(createLead).not.toHaveBeenCalled();
  });

  it('rejects malformed JSON with 400', async () => {
    const response = await fetch(`${baseUrl}/create-lead`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"first_name":',
    });

    expect(response.status).toBe(400);
  });

  it('maps a rejected lead to 502', async () => {
    createLead.mockResolvedValue(err(createAppError(ErrorCode.LEAD_CREATION_FAILED, 'Lead API rejected the lead', false, 'E100: Invalid store')));

    const response = await postLead(validBody);
    const body = await response.json();

    expect(response.status).toBe(502);
    expect(body.error).toEqual({
      code: 'LEAD_CREATION_FAILED',
      message: 'Lead creation failed',
      details: 'E100: Invalid store',
      retryable: false,
    });
  });

  it('maps an exhausted id acquisition to 504 with the order number', async () => {
    lookupServiceCenterId.mockResolvedValue(ok(null));

    const response = await postLead(validBody);
    const body = await response.json();

    expect(response.status).toBe(504);
    expect(body.error.code).toBe('LEAD_ID_ACQUISITION_EXHAUSTED');
    expect(body.error.details).toBe('ORD0000000042');
    expect(body.error.retryable).toBe(true);
    expect(lookupServiceCenterId).toHaveBeenCalledTimes(2);
  });

  it('maps rejected API credentials to 503', async () => {
    createLead.mockResolvedValue(err(createAppError(ErrorCode.LEAD_API_AUTH_ERROR, 'Lead API rejected the client credentials', false)));

    const response = await postLead(validBody);

    expect(response.status).toBe(503);
  });
});
