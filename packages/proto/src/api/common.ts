import { z } from 'zod';

export const IdSchema = z.string().regex(/^\d{1,18}$/, 'Invalid id');

const IsoDateSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export const OptionalDateSchema = IsoDateSchema.optional();

export function paginationSchema(maxPageSize: number) {
  return z.object({
    page: z.coerce.number().int().min(1).default(1),
    pageSize: z.coerce.number().int().min(1).max(maxPageSize).default(Math.min(20, maxPageSize)),
  });
}

export type Id = z.infer<typeof IdSchema>;
