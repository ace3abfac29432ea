import { describe, it, expect } from 'vitest';
import {
  accessTokenStateSchema,
  leadRequestInput,
  processedStateSchema,
  representativeRegistrySchema,
  type LeadRequestInput,
} from '../../src/domain/schemas.js';

const validLead: LeadRequestInput = {
  first_name: ' Daniel ',
  last_name: 'Rivera',
  phone: '(786) 555-0142',
  address: '1420 SW 87 AVE',
  city: 'Miami',
  state: 'fl',
  zip_code: '33174',
  store_id: '6310',
};

describe('leadRequestInput', () => {
  it('normalizes a valid request', () => {
    const result = leadRequestInput.safeParse(validLead);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toEqual({
      firstName: 'Daniel',
      lastName: 'Rivera',
      phone: '7865550142',
      address: '1420 SW 87 AVE',
      city: 'Miami',
      state: 'FL',
      zipCode: '33174',
      storeId: '6310',
      email: undefined,
      appointmentDate: undefined,
      appointmentTime: undefined,
    });
  });

  it('accepts an explicit appointment', () => {
    const result = leadRequestInput.safeParse({ ...validLead, appointment_date: '04/01/2026', appointment_time: '09:30' });

    expect(result.success).toBe(true);
  });

  it('rejects a malformed appointment time', () => {
    const result = leadRequestInput.safeParse({ ...validLead, appointment_time: '9:30am' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].path).toEqual(['appointment_time']);
  });

  it('rejects a missing first name', () => {
    const result = leadRequestInput.safeParse({ ...validLead, first_name: '   ' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].message).toBe('First name is required');
  });

  it('drops a leading country code from the phone', () => {
    const result = leadRequestInput.safeParse({ ...validLead, phone: '+1 (786) 555-0142' });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.phone).toBe('7865550142');
  });

  it('rejects an eleven-digit phone that does not start with 1', () => {
    const result = leadRequestInput.safeParse({ ...validLead, phone: '27865550142' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].message).toBe('Phone must contain 10 digits');
  });

  it('rejects a four-digit ZIP code', () => {
    expect(leadRequestInput.safeParse({ ...validLead, zip_code: '3317' }).success).toBe(false);
  });
});

describe('representativeRegistrySchema', () => {
  it('defaults aliases to an empty list', () => {
    const result = representativeRegistrySchema.safeParse({
      representatives: [{ name: 'John Smith', ledgerId: 'sheet-john' }],
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.representatives[0].aliases).toEqual([]);
  });

  it('rejects duplicate representative names', () => {
    const result = representativeRegistrySchema.safeParse({
      representatives: [
        { name: 'John Smith', ledgerId: 'sheet-a' },
        { name: 'John Smith', ledgerId: 'sheet-b' },
      ],
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].message).toBe("Duplicate representative 'John Smith'");
    expect(result.error.issues[0].path).toEqual(['representatives', 1, 'name']);
  });
});

describe('processedStateSchema', () => {
  it('accepts versioned entries with ISO timestamps', () => {
    const result = processedStateSchema.safeParse({
      version: 1,
      entries: [{ documentId: 'a.pdf', sourceRef: 'inbox/a.pdf', processedAt: '2026-03-14T12:00:00.000Z' }],
    });

    expect(result.success).toBe(true);
  });

  it('rejects an unknown version', () => {
    expect(processedStateSchema.safeParse({ version: 2, entries: [] }).success).toBe(false);
  });

  it('rejects a non-ISO timestamp', () => {
    const result = processedStateSchema.safeParse({
      version: 1,
      entries: [{ documentId: 'a.pdf', sourceRef: '', processedAt: '03/14/2026' }],
    });

    expect(result.success).toBe(false);
  });
});

describe('accessTokenStateSchema', () => {
  it('accepts a versioned token with an epoch expiry', () => {
    const result = accessTokenStateSchema.safeParse({ version: 1, accessToken: 'test-token', expiresAt: 1_700_000_000_000 });

    expect(result.success).toBe(true);
  });

  it('rejects an empty token', () => {
    expect(accessTokenStateSchema.safeParse({ version: 1, accessToken: '', expiresAt: 0 }).success).toBe(false);
  });
});
