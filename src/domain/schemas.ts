import { z } from 'zod';
import { normalizePhone } from './phone.js';
import { CONTRACT_FIELDS, NORMALIZER_KINDS } from './types.js';
import type { LeadRequest } from './types.js';

export const contractFieldSchema = z.enum(CONTRACT_FIELDS);

const patternCandidateSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/, 'Only i, m, s and u flags are supported').optional(),
  template: z.string().optional(),
  confidence: z.number().min(0).max(1).optional(),
});

export const extractionRuleSetSchema = z.object({
  version: z.literal(1),
  rules: z.array(
    z.object({
      field: contractFieldSchema,
      normalize: z.enum(NORMALIZER_KINDS),
      candidates: z.array(patternCandidateSchema).min(1),
      exclude: z.array(z.string()).optional(),
    }),
  ),
  required: z.array(contractFieldSchema).default([]),
  requiredAnyOf: z.array(z.array(contractFieldSchema).min(1)).default([]),
  equipmentAliases: z.record(z.string(), z.array(z.string())).default({}),
});

export const representativeRegistrySchema = z.object({
  representatives: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        ledgerId: z.string().trim().min(1),
        aliases: z.array(z.string().trim().min(1)).default([]),
      }),
    )
    .superRefine((reps, ctx) => {
      const seen = new Set<string>();
      for (const [index, rep] of reps.entries()) {
        if (seen.has(rep.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'name'],
            message: `Duplicate representative '${rep.name}'`,
          });
        }
        seen.add(rep.name);
      }
    }),
});

export const PROCESSED_STATE_VERSION = 1;

export const processedStateSchema = z.object({
  version: z.literal(PROCESSED_STATE_VERSION),
  entries: z.array(
    z.object({
      documentId: z.string().min(1),
      sourceRef: z.string(),
      processedAt: z.string().datetime(),
    }),
  ),
});

export const ACCESS_TOKEN_STATE_VERSION = 1;

export const accessTokenStateSchema = z.object({
  version: z.literal(ACCESS_TOKEN_STATE_VERSION),
  accessToken: z.string().min(1),
  expiresAt: z.number().int().nonnegative(),
});

export const leadRequestInput = z
  .object({
    first_name: z.string().trim().min(1, 'First name is required'),
    last_name: z.string().trim().min(1, 'Last name is required'),
    phone: z
      .string()
      .transform(normalizePhone)
      .pipe(z.string().length(10, 'Phone must contain 10 digits')),
    address: z.string().trim().min(1, 'Address is required'),
    city: z.string().trim().min(1, 'City is required'),
    state: z.string().trim().length(2, 'State must be a 2-letter code'),
    zip_code: z.string().trim().regex(/^\d{5}$/, 'ZIP code must be 5 digits'),
    store_id: z.string().trim().min(1, 'Store id is required'),
    email: z.string().trim().email().optional(),
    appointment_date: z
      .string()
      .regex(/^\d{2}\/\d{2}\/\d{4}$/, 'Appointment date must be MM/DD/YYYY')
      .optional(),
    appointment_time: z
      .string()
      .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Appointment time must be HH:MM')
      .optional(),
  })
  .transform(
    (input): LeadRequest => ({
      firstName: input.first_name,
      lastName: input.last_name,
      phone: input.phone,
      address: input.address,
      city: input.city,
      state: input.state.toUpperCase(),
      zipCode: input.zip_code,
      storeId: input.store_id,
      email: input.email,
      appointmentDate: input.appointment_date,
      appointmentTime: input.appointment_time,
    }),
  );

export type ProcessedState = z.infer<typeof processedStateSchema>;
export type AccessTokenState = z.infer<typeof accessTokenStateSchema>;
export type LeadRequestInput = z.input<typeof leadRequestInput>;
