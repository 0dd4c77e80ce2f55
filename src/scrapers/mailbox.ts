import { ImapFlow } from 'imapflow';
import type { MailConfig } from '../config';
import { createLogger, errorMessage } from '../utils/logger';

const log = createLogger('Mailbox');

export interface MailMessage {
  source: Buffer;
  receivedAt?: Date;
}

/** An open, selected inbox. `close` must be called on every exit path. */
export interface MailboxSession {
  search(sender: string, since: Date): Promise<MailMessage[]>;
  close(): Promise<void>;
}

export interface MailboxConnector {
  open(): Promise<MailboxSession>;
}

export class MailboxAuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MailboxAuthError';
  }
}

function isAuthFailure(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('authenticationFailed' in error && error.authenticationFailed === true) return true;
  return /auth/i.test(errorMessage(error));
}

/** IMAP over TLS (port 993) through imapflow. */
export class ImapMailboxConnector implements MailboxConnector {
  constructor(private readonly config: MailConfig) {}

  async open(): Promise<MailboxSession> {
    const client = new ImapFlow({
      host: this.config.host,
      port: 993,
      secure: true,
      auth: { user: this.config.address, pass: this.config.appPassword },
      logger: false,
    });
    // Socket errors after connect are emitted, not thrown; pending commands still reject
    client.on('error', (error: unknown) => {
      log.warn(`${this.config.host}: connection error: ${errorMessage(error)}`);
    });

    try {
      await client.connect();
    } catch (error) {
      client.close();
      if (isAuthFailure(error)) throw new MailboxAuthError(errorMessage(error));
      throw error;
    }

    let lock: { release(): void };
    try {
      lock = await client.getMailboxLock('INBOX');
    } catch (error) {
      await client.logout();
      throw error;
    }

    return {
      async search(sender: string, since: Date): Promise<MailMessage[]> {
        const uids = await client.search({ from: sender, since }, { uid: true });
        if (!uids || uids.length === 0) return [];

        const messages: MailMessage[] = [];
        for await (const message of client.fetch(uids, { source: true, internalDate: true }, { uid: true })) {
          if (!message.source) continue;
          const receivedAt = message.internalDate ? new Date(message.internalDate) : undefined;
          messages.push({ source: message.source, receivedAt });
        }
        return messages;
      },

      async close(): Promise<void> {
        lock.release();
        try {
          await client.logout();
        } catch (error) {
          log.debug(`logout failed, closing socket: ${errorMessage(error)}`);
          client.close();
        }
      },
    };
  }
}
