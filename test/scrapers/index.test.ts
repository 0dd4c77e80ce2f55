import { describe, it, expect } from 'vitest';
import { resolveAdapter } from '../../src/scrapers/index';
import { GreenhouseAdapter } from '../../src/scrapers/greenhouse';
import { AmazonAdapter } from '../../src/scrapers/amazon';
import { WorkdayAdapter } from '../../src/scrapers/workday';
import { EmailAlertAdapter } from '../../src/scrapers/email-alerts';
import { createHttpClient } from '../../src/scrapers/http';
import type { MailboxConnector } from '../../src/scrapers/mailbox';
import type { AppConfig } from '../../src/config';
import type { Company } from '../../src/registry';
import type { AdapterContext } from '../../src/scrapers/types';
import { testCompany, testConfig } from '../helpers';

const http = createHttpClient({ timeoutMs: 1000, maxRetries: 0, retryDelayMs: 0 });
const noMailbox: MailboxConnector = {
  open: async () => {
    throw new Error('not used');
  },
};

function ctx(company: Partial<Company>, config: Partial<AppConfig> = {}): AdapterContext {
  return { company: testCompany(company), http, config: testConfig(config) };
}

describe('resolveAdapter', () => {
  it('builds the adapter for the source family', () => {
    const resolution = resolveAdapter(ctx({ sourceFamily: 'greenhouse', sourceIdentifier: 'acme' }));
    expect('adapter' in resolution && resolution.adapter).toBeInstanceOf(GreenhouseAdapter);
  });

  it('skips manual sources and missing identifiers', () => {
    expect(resolveAdapter(ctx({ sourceFamily: 'manual' }))).toEqual({ skipped: 'manual source' });
    expect(resolveAdapter(ctx({ sourceFamily: 'lever', sourceIdentifier: '' }))).toEqual({
      skipped: 'no source identifier for lever',
    });
  });

  it('lets Amazon default its city', () => {
    const resolution = resolveAdapter(ctx({ sourceFamily: 'amazon', sourceIdentifier: '' }));
    expect('adapter' in resolution && resolution.adapter).toBeInstanceOf(AmazonAdapter);
  });

  it('validates Workday career site urls', () => {
    const valid = resolveAdapter(
      ctx({ sourceFamily: 'workday', sourceIdentifier: 'https://acme.wd3.myworkdayjobs.com/en-US/Acme_Careers' }),
    );
    expect('adapter' in valid && valid.adapter).toBeInstanceOf(WorkdayAdapter);

    expect(resolveAdapter(ctx({ sourceFamily: 'workday', sourceIdentifier: 'https://acme.com/careers' }))).toEqual({
      skipped: 'unrecognized Workday URL: https://acme.com/careers',
    });
  });

  it('skips email alerts without mailbox credentials', () => {
    expect(resolveAdapter(ctx({ sourceFamily: 'email_alert', sourceIdentifier: 'hp' }), () => noMailbox)).toEqual({
      skipped: 'mailbox credentials not configured',
    });
    expect(resolveAdapter(ctx({ sourceFamily: 'email_alert', sourceIdentifier: 'globex' }), () => noMailbox)).toEqual({
      skipped: 'unknown alert profile: globex',
    });
  });

  it('builds email alert adapters when credentials are present', () => {
    const mail = { address: 'alerts@example.com', appPassword: 'test-secret', host: 'imap.example.com' };
    const seen: string[] = [];
    const resolution = resolveAdapter(
      ctx({ id: 'hp', sourceFamily: 'email_alert', sourceIdentifier: 'hp' }, { mail }),
      config => {
        seen.push(config.address);
        return noMailbox;
      },
    );
    expect('adapter' in resolution && resolution.adapter).toBeInstanceOf(EmailAlertAdapter);
    expect(seen).toEqual(['alerts@example.com']);
  });
});
