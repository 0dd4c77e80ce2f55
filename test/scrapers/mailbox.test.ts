import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ImapMailboxConnector } from '../../src/scrapers/mailbox';
import { ALERT_PROFILES, EmailAlertAdapter } from '../../src/scrapers/email-alerts';
import { createHttpClient } from '../../src/scrapers/http';
import type { MailConfig } from '../../src/config';
import { testCompany, testConfig } from '../helpers';

interface FakeClient {
  emit(event: string, ...args: unknown[]): boolean;
  listenerCount(event: string): number;
  logout: () => Promise<void>;
}

const clients = vi.hoisted((): FakeClient[] => []);

// Drops the connection mid-search: emits 'error', then the pending command rejects
vi.mock('imapflow', async () => {
  const { EventEmitter } = await import('node:events');

  class ImapFlow extends EventEmitter {
    connect = vi.fn(async () => {});
    getMailboxLock = vi.fn(async () => ({ release: vi.fn() }));
    search = vi.fn(async () => {
      this.emit('error', new Error('Socket closed unexpectedly'));
      throw new Error('Connection not available');
    });
    fetch = vi.fn();
    logout = vi.fn(async () => {});
    close = vi.fn();

    constructor() {
      super();
      clients.push(this);
    }
  }

  return { ImapFlow };
});

const MAIL: MailConfig = { address: 'alerts@example.com', appPassword: 'test-secret', host: 'imap.example.com' };

describe('ImapMailboxConnector', () => {
  beforeEach(() => {
    clients.length = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs connection errors emitted after connect instead of throwing them', async () => {
    const session = await new ImapMailboxConnector(MAIL).open();
    const [client] = clients;

    expect(client.listenerCount('error')).toBe(1);
    expect(() => client.emit('error', new Error('read ECONNRESET'))).not.toThrow();
    expect(console.warn).toHaveBeenCalledWith('[Mailbox]', 'imap.example.com: connection error: read ECONNRESET');

    await expect(session.search('careers@hp.com', new Date())).rejects.toThrow('Connection not available');
    await session.close();
    expect(client.logout).toHaveBeenCalledTimes(1);
  });

  it('lets an alert source finish with no postings when the socket drops', async () => {
    const adapter = new EmailAlertAdapter(
      {
        company: testCompany({ id: 'hp', sourceFamily: 'email_alert', sourceIdentifier: 'hp' }),
        http: createHttpClient({ timeoutMs: 1000, maxRetries: 0, retryDelayMs: 0 }),
        config: testConfig({ mail: MAIL }),
      },
      ALERT_PROFILES.hp,
      new ImapMailboxConnector(MAIL),
    );

    await expect(adapter.scrape()).resolves.toEqual([]);
    expect(console.warn).toHaveBeenCalledWith('[Mailbox]', 'imap.example.com: connection error: Socket closed unexpectedly');
    expect(clients[0].logout).toHaveBeenCalledTimes(1);
  });
});
