import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { AppConfig } from './types.js';

const MINUTE_MS = 60_000;

// Node timers cap out at 2^31-1 ms; anything longer fires after 1 ms.
const MAX_TIMER_MS = 2 ** 31 - 1;
export const MAX_MINUTES = Math.floor(MAX_TIMER_MS / MINUTE_MS);

const minutesSchema = z.coerce
  .number()
  .positive()
  .max(MAX_MINUTES)
  .refine((minutes) => Math.round(minutes * MINUTE_MS) >= 1, { message: 'must be at least 1 ms' });

const KEEP_BLANK = new Set(['DB_PASSWORD']);

const EnvSchema = z.object({
  DB_HOST: z.string().trim().default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65_535).default(3306),
  DB_USER: z.string({ required_error: 'DB_USER is required' }).trim(),
  DB_PASSWORD: z.string().default(''),
  DB_NAME: z.string({ required_error: 'DB_NAME is required' }).trim(),
  DB_CHARSET: z.string().trim().default('utf8mb4'),
  DB_COLLATION: z.string().trim().default('utf8mb4_unicode_ci'),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DESKTOP_FOLDER_NAME: z
    .string()
    .trim()
    .refine((name) => !/[\\/]/.test(name) && name !== '.' && name !== '..', {
      message: 'must be a single folder name',
    })
    .default('DatabaseExports'),
  OUTPUT_BASE_DIR: z.string().trim().optional(),
  INTERVAL_MINUTES: minutesSchema.default(5),
  RETRY_DELAY_MINUTES: minutesSchema.optional(),
  EXPORT_TABLES_FILE: z.string().trim().optional(),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']))
    .default('info'),
  NODE_ENV: z.string().trim().default('production'),
});

// Blank variables count as unset so `.env` templates with empty values fall back to defaults.
// DB_PASSWORD keeps whitespace-only values; only an empty string counts as unset there.
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value == null) continue;
    if (value.trim() !== '' || (KEEP_BLANK.has(key) && value !== '')) out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(problems, { cause: parsed.error });
  }

  const vars = parsed.data;
  const intervalMs = Math.round(vars.INTERVAL_MINUTES * MINUTE_MS);

  return {
    db: {
      host: vars.DB_HOST,
      port: vars.DB_PORT,
      user: vars.DB_USER,
      password: vars.DB_PASSWORD,
      database: vars.DB_NAME,
      charset: vars.DB_CHARSET,
      collation: vars.DB_COLLATION,
      connectTimeoutMs: vars.DB_CONNECT_TIMEOUT_MS,
    },
    export: {
      folderName: vars.DESKTOP_FOLDER_NAME,
      baseDir: vars.OUTPUT_BASE_DIR ?? null,
      tablesFile: vars.EXPORT_TABLES_FILE ?? null,
    },
    schedule: {
      intervalMs,
      retryDelayMs: vars.RETRY_DELAY_MINUTES == null ? intervalMs : Math.round(vars.RETRY_DELAY_MINUTES * MINUTE_MS),
    },
    logLevel: vars.LOG_LEVEL,
    nodeEnv: vars.NODE_ENV,
  };
}
