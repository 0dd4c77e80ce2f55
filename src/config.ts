import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './utils/logger';

const ROOT_DIR = path.join(__dirname, '..');

export interface MailConfig {
  address: string;
  appPassword: string;
  host: string;
}

export interface AppConfig {
  databasePath: string;
  companiesFile: string;
  requestTimeoutMs: number;
  maxRetries: number;
  rateLimitDelayMs: number;
  concurrency: number;
  failureWarningRatio: number;
  emailDaysBack: number;
  runTimeoutMs: number;
  port: number;
  logLevel: LogLevel;
  // null when either mailbox secret is missing; email-alert sources are then skipped
  mail: MailConfig | null;
}

const optionalText = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const intWithDefault = (fallback: number, min = 0) =>
  z
    .string()
    .optional()
    .transform(value => (value && value.trim() ? value.trim() : undefined))
    .pipe(z.coerce.number().int().min(min).optional())
    .transform(value => value ?? fallback);

const envSchema = z.object({
  DATABASE_PATH: optionalText,
  COMPANIES_FILE: optionalText,
  REQUEST_TIMEOUT_MS: intWithDefault(30_000, 1),
  MAX_RETRIES: intWithDefault(2),
  RATE_LIMIT_DELAY_MS: intWithDefault(2_000),
  SCRAPE_CONCURRENCY: intWithDefault(1, 1),
  FAILURE_WARNING_RATIO: z
    .string()
    .optional()
    .transform(value => (value && value.trim() ? value.trim() : undefined))
    .pipe(z.coerce.number().min(0).max(1).optional())
    .transform(value => value ?? 0.2),
  EMAIL_DAYS_BACK: intWithDefault(7, 1),
  RUN_TIMEOUT_MS: intWithDefault(30 * 60_000, 1),
  PORT: intWithDefault(3001, 1),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform(value => (value && value.trim() ? value.trim().toLowerCase() : undefined))
    .pipe(z.enum(['debug', 'info']).optional())
    .transform(value => value ?? 'info'),
  GMAIL_ADDRESS: optionalText,
  GMAIL_APP_PASSWORD: optionalText,
  IMAP_HOST: optionalText,
});

function resolvePath(value: string | undefined, fallback: string): string {
  if (!value) return path.join(ROOT_DIR, fallback);
  return path.isAbsolute(value) ? value : path.join(ROOT_DIR, value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  const mail =
    e.GMAIL_ADDRESS && e.GMAIL_APP_PASSWORD
      ? { address: e.GMAIL_ADDRESS, appPassword: e.GMAIL_APP_PASSWORD, host: e.IMAP_HOST ?? 'imap.gmail.com' }
      : null;

  return Object.freeze({
    databasePath: resolvePath(e.DATABASE_PATH, 'data/jobs.db'),
    companiesFile: resolvePath(e.COMPANIES_FILE, 'data/companies.json'),
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    maxRetries: e.MAX_RETRIES,
    rateLimitDelayMs: e.RATE_LIMIT_DELAY_MS,
    concurrency: e.SCRAPE_CONCURRENCY,
    failureWarningRatio: e.FAILURE_WARNING_RATIO,
    emailDaysBack: e.EMAIL_DAYS_BACK,
    runTimeoutMs: e.RUN_TIMEOUT_MS,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    mail,
  });
}
