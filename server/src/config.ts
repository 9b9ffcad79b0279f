import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => (typeof value === 'boolean' ? value : value === 'true' || value === '1'));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  DATABASE_PATH: z.string().trim().min(1).default('data/ledger.db'),
  SESSION_LIFETIME_SECS: z.coerce.number().int().positive().default(60 * 60 * 24),
  PAGE_SIZE: z.coerce.number().int().min(1).max(500).default(20),
  CURRENCY_SYMBOL: z.string().default(''),
  LOG_REQUESTS: booleanFlag.default('true'),
});

export interface Config {
  port: number;
  databasePath: string;
  sessionLifetimeSecs: number;
  pageSize: number;
  currencySymbol: string;
  logRequests: boolean;
}

/**
 * Read settings from an environment map (process.env by default).
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    databasePath: e.DATABASE_PATH,
    sessionLifetimeSecs: e.SESSION_LIFETIME_SECS,
    pageSize: e.PAGE_SIZE,
    currencySymbol: e.CURRENCY_SYMBOL,
    logRequests: e.LOG_REQUESTS,
  };
}
