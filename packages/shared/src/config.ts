import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

const JwtKeySchema = z.object({
  kid: z.string().min(1),
  secret: z.string().min(32),
});

export const JwtConfigSchema = z.object({
  JWT_ACTIVE_KID: z.string().min(1),
  JWT_KEYS: z
    .string()
    .transform((raw, ctx) => {
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be a JSON array' });
        return z.NEVER;
      }
    })
    .pipe(z.array(JwtKeySchema).min(1)),
  JWT_ISSUER: z.string().default('gatehouse'),
  JWT_ACCESS_TOKEN_TTL: z.string().regex(/^\d+$/).default('900'),
});

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(JwtConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().int().default(3000),
    VERIFY_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(30),
    FACE_MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
    ACCESS_LOG_MAX_PAGE_SIZE: z.coerce.number().int().positive().default(100),
  })
  .refine((config) => config.JWT_KEYS.some((key) => key.kid === config.JWT_ACTIVE_KID), {
    message: 'JWT_ACTIVE_KID must name one of JWT_KEYS',
    path: ['JWT_ACTIVE_KID'],
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
