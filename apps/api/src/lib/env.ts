import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// Load .env from monorepo root
const here = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(here, '../../../../.env') });

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.coerce.number().default(3001),
  API_HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  INTERNAL_API_KEY: z.string().min(1).optional(),

  // Channel credentials; a channel without credentials is left unconfigured.
  TELEGRAM_BOT_TOKEN: z.string().min(1).optional(),
  TELEGRAM_CHAT_ID: z.string().min(1).optional(),
  SMS_GATEWAY_URL: z.string().url().optional(),
  SMS_GATEWAY_TOKEN: z.string().min(1).optional(),
  SMS_RECIPIENT: z.string().min(1).optional(),

  // Schedule (process-local wall clock). Unusable values fall back to the
  // defaults at scheduling time.
  BATCH_TIMES: z.string().default('09:00,13:00,17:00'),
  WEEKLY_DAY: z.coerce.number().default(0).catch(Number.NaN),
  WEEKLY_TIME: z.string().default('20:00'),

  // Dedup cooldowns in hours
  COOLDOWN_IMMEDIATE_HOURS: z.coerce.number().positive().default(4),
  COOLDOWN_BATCHED_HOURS: z.coerce.number().positive().default(8),
  COOLDOWN_WEEKLY_HOURS: z.coerce.number().positive().default(168),
  COOLDOWN_SILENT_HOURS: z.coerce.number().positive().default(1),
  // kind=hours pairs, e.g. "blocker_resolved=2,task_status=12"
  COOLDOWN_OVERRIDES: z.string().default(''),

  AUDIT_LOG_PATH: z.string().default('logs/notifications.log'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | undefined;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
    throw new Error('Invalid environment variables');
  }
  return result.data;
}

export function getEnv(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
