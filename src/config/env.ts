import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.string().default('3000'),
  FRONTEND_URL: z.string().url().optional(),
  PREDICTION_API_BASE_URL: z.string().url().default('http://127.0.0.1:8000'),
  PREDICT_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(10_000),
  FAILURE_RISK_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(5_000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug']).default('info'),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(100)
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export const env = parseEnv(process.env);
