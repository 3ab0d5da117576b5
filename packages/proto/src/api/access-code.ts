import { z } from 'zod';
import { IdSchema, OptionalDateSchema, paginationSchema } from './common';

export const AccessCodeParamsSchema = z.object({
  id: IdSchema,
});

export const CreateAccessCodeRequestSchema = z.object({
  buildingId: IdSchema.optional(),
  accessPointId: IdSchema.optional(),
  tenantId: IdSchema.optional(),
  code: z.string().min(1, 'Code is required'),
  isSingleUse: z.boolean().default(false),
  validFrom: OptionalDateSchema,
  expiresAt: OptionalDateSchema,
});

export const UpdateAccessCodeRequestSchema = z
  .object({
    code: z.string().min(1).optional(),
    isSingleUse: z.boolean().optional(),
    validFrom: OptionalDateSchema,
    expiresAt: OptionalDateSchema,
  })
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: 'At least one field must be provided',
  });

export const ListAccessCodesQuerySchema = paginationSchema(100).extend({
  buildingId: IdSchema.optional(),
  accessPointId: IdSchema.optional(),
});

export const AccessCodeResponseSchema = z.object({
  id: z.string(),
  buildingId: z.string(),
  accessPointId: z.string().nullable(),
  tenantId: z.string().nullable(),
  code: z.string().nullable(),
  validFrom: z.string().datetime().nullable(),
  expiresAt: z.string().datetime().nullable(),
  isSingleUse: z.boolean(),
  isActive: z.boolean(),
  consumedAt: z.string().datetime().nullable(),
  createdBy: z.string(),
  createdAt: z.string().datetime(),
});

export type CreateAccessCodeRequest = z.infer<typeof CreateAccessCodeRequestSchema>;
export type UpdateAccessCodeRequest = z.infer<typeof UpdateAccessCodeRequestSchema>;
export type ListAccessCodesQuery = z.infer<typeof ListAccessCodesQuerySchema>;
export type AccessCodeResponse = z.infer<typeof AccessCodeResponseSchema>;
