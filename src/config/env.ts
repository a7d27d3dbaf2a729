import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const envSchema = z.object({
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY must not be empty').optional(),
  OPENAI_MODEL: z.string().min(1, 'OPENAI_MODEL must not be empty').default('gpt-4o-mini'),
  OFFICES_CONFIG_PATH: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(60),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const details = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    .join('; ');
  throw new Error(`Invalid environment configuration: ${details}`);
}

export const env = Object.freeze(parsed.data);

export type EnvConfig = typeof env;
