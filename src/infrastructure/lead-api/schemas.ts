import { z } from 'zod';

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().int().positive().default(1800),
});

export const createLeadResponseSchema = z.object({
  SFILEADPOBATCHICONX_Output: z
    .object({
      Status: z.string().optional(),
      Error_spcMessage: z.string().optional(),
      Error_spcCode: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export const lookupLeadResponseSchema = z.object({
  SFILEADLOOKUPWS_Output: z
    .object({
      ListOfSfileadbows: z
        .object({
          Sfileadheaderws: z
            .array(
              z
                .object({
                  Id: z.string().optional(),
                  MMSVCSServiceProviderOrderNumber: z.string().optional(),
                  Created: z.string().optional(),
                })
                .passthrough(),
            )
            .default([]),
        })
        .optional(),
    })
    .optional(),
});
