import path from 'path';
import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  APP_URL: z.string().url().default('http://localhost:3000'),
  DATA_DIR: z.string().min(1).default(path.join(process.cwd(), 'data')),
  STEAM_WEB_API_KEY: z.string().optional().default(''),
  STEAM_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  LOGIN_POLL_ATTEMPTS: z.coerce.number().int().positive().default(30),
  LOGIN_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1000),
  FINALIZE_MAX_ROUNDS: z.coerce.number().int().positive().default(30),
  FINALIZE_ROUND_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  ENROLLMENT_TTL_SEC: z.coerce.number().int().positive().default(900)
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

export const env: Env = loadEnv();
