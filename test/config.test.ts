import path from 'path';
import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      requestTimeoutMs: 30_000,
      maxRetries: 2,
      rateLimitDelayMs: 2_000,
      concurrency: 1,
      failureWarningRatio: 0.2,
      emailDaysBack: 7,
      runTimeoutMs: 1_800_000,
      port: 3001,
      logLevel: 'info',
      mail: null,
    });
    expect(config.databasePath.endsWith(path.join('data', 'jobs.db'))).toBe(true);
    expect(config.companiesFile.endsWith(path.join('data', 'companies.json'))).toBe(true);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('parses numeric overrides', () => {
    const config = loadConfig({ SCRAPE_CONCURRENCY: '4', RATE_LIMIT_DELAY_MS: '0', FAILURE_WARNING_RATIO: '0.5' });

    expect(config.concurrency).toBe(4);
    expect(config.rateLimitDelayMs).toBe(0);
    expect(config.failureWarningRatio).toBe(0.5);
  });

  it('keeps absolute paths and resolves relative ones', () => {
    const absolute = path.resolve('/var/lib/jobs/jobs.db');
    expect(loadConfig({ DATABASE_PATH: absolute }).databasePath).toBe(absolute);

    const relative = loadConfig({ DATABASE_PATH: 'tmp/test.db' }).databasePath;
    expect(path.isAbsolute(relative)).toBe(true);
    expect(relative.endsWith(path.join('tmp', 'test.db'))).toBe(true);
  });

  it('reads the log level', () => {
    expect(loadConfig({ LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(loadConfig({ LOG_LEVEL: '' }).logLevel).toBe('info');
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ MAX_RETRIES: 'lots' })).toThrow(ConfigError);
    expect(() => loadConfig({ SCRAPE_CONCURRENCY: '0' })).toThrow(/SCRAPE_CONCURRENCY/);
    expect(() => loadConfig({ FAILURE_WARNING_RATIO: '1.5' })).toThrow(ConfigError);
  });

  it('enables the mailbox only when both secrets are present', () => {
    expect(loadConfig({ GMAIL_ADDRESS: 'alerts@example.com' }).mail).toBeNull();
    expect(loadConfig({ GMAIL_APP_PASSWORD: 'test-secret' }).mail).toBeNull();
    expect(loadConfig({ GMAIL_ADDRESS: 'alerts@example.com', GMAIL_APP_PASSWORD: 'test-secret' }).mail).toEqual({
      address: 'alerts@example.com',
      appPassword: 'test-secret',
      host: 'imap.gmail.com',
    });
  });
});
