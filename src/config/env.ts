import { z } from 'zod';

const DEFAULT_CORS_ORIGINS = 'http://localhost:3000,http://localhost:3001';

export const envSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  SESSION_SECRET: z
    .string()
    .min(16, 'SESSION_SECRET must be at least 16 characters'),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(604800),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  PORT: z.coerce.number().int().positive().default(8080),
  CORS_ORIGIN: z.string().default(DEFAULT_CORS_ORIGINS),
});

export type Env = z.infer<typeof envSchema>;

/**
 * ConfigModule.forRoot の validate に渡す関数。
 * 不正な値があれば起動時に変数名つきで失敗させる。
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}
