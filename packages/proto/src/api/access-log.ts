import { z } from 'zod';
import { IdSchema, OptionalDateSchema, paginationSchema } from './common';

const CredentialTypeSchema = z.enum(['AccessCode', 'Master', 'TemporaryPin', 'User', 'Face', 'None']);

export function accessLogQuerySchema(maxPageSize: number) {
  return paginationSchema(maxPageSize).extend({
    buildingId: IdSchema.optional(),
    accessPointId: IdSchema.optional(),
    codeId: IdSchema.optional(),
    userId: IdSchema.optional(),
    success: z
      .enum(['true', 'false'])
      .transform((value) => value === 'true')
      .optional(),
    credentialType: CredentialTypeSchema.optional(),
    from: OptionalDateSchema,
    to: OptionalDateSchema,
  });
}

export const AccessLogResponseSchema = z.object({
  id: z.string(),
  accessPointId: z.string(),
  userId: z.string().nullable(),
  credentialType: CredentialTypeSchema,
  credentialRefId: z.string().nullable(),
  success: z.boolean(),
  reason: z.string().nullable(),
  occurredAt: z.string().datetime(),
});

export type AccessLogQueryParams = z.infer<ReturnType<typeof accessLogQuerySchema>>;
export type AccessLogResponse = z.infer<typeof AccessLogResponseSchema>;
