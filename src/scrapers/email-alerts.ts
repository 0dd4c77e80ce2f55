import { parse, HTMLElement } from 'node-html-parser';
import { simpleParser } from 'mailparser';
import { subDays } from 'date-fns';
import type { SourceAdapter, JobCandidate, AdapterContext } from './types';
import { buildCandidate, keepMatching } from './candidate';
import { closestAncestor } from './successfactors';
import { MailboxAuthError, type MailboxConnector, type MailboxSession, type MailMessage } from './mailbox';
import { SourceFetchError } from '../errors';
import { createLogger, errorMessage } from '../utils/logger';
import { collapseSpaces } from '../utils/html';
import { formatDay } from '../utils/dates';

const log = createLogger('EmailAlerts');

export interface AlertProfile {
  senders: string[];
  urlPatterns: RegExp[];
}

export const ALERT_PROFILES: Record<string, AlertProfile> = {
  microsoft: {
    senders: [
      'donotreply@email.careers.microsoft.com',
      'careers@microsoft.com',
      'microsoft@talent.icims.com',
      'noreply@microsoft.com',
      'jobs-noreply@linkedin.com',
    ],
    urlPatterns: [/careers\.microsoft\.com/i, /jobs\.careers\.microsoft\.com/i, /microsoft\.eightfold\.ai/i],
  },
  hp: {
    senders: ['careers@hp.com', 'noreply@hp.com', 'hp@talent.icims.com', 'no-reply@eightfold.ai', 'hp@eightfold.ai'],
    urlPatterns: [/apply\.hp\.com/i, /hp\.com\/careers/i, /jobs\.hp\.com/i],
  },
  revolut: {
    senders: ['careers@revolut.com', 'noreply@revolut.com', 'talent@revolut.com', 'jobs@revolut.com'],
    urlPatterns: [/revolut\.com\/careers/i, /revolut\.com\/.*position/i],
  },
};

const GENERIC_LINK_TEXT = new Set(['view job', 'apply', 'apply now', 'learn more', 'see all jobs', 'view all']);
const EXCLUDED_HREF = /unsubscribe|privacy/i;
const PLACE_PATTERN = /barcelona|sant cugat|spain|madrid|remote|hybrid/i;
const PLACE_SPAN = /[A-Za-z\s,]*(?:Spain|Barcelona|Madrid|Sant Cugat|Remote|Hybrid)[A-Za-z\s,]*/i;

export interface AlertPosting {
  title: string;
  url: string;
  location: string;
}

function isGeneric(title: string): boolean {
  return title.length < 5 || GENERIC_LINK_TEXT.has(title.toLowerCase());
}

function titleForLink(link: HTMLElement): string | null {
  const text = collapseSpaces(link.text);
  if (!isGeneric(text)) return text;

  // Generic anchor text: use the heading or emphasis in the surrounding card
  const card = closestAncestor(link, ['tr', 'div', 'td']);
  const heading = card?.querySelector('h2, h3, h4, strong, b');
  const recovered = heading ? collapseSpaces(heading.text) : '';
  return recovered && !isGeneric(recovered) ? recovered : null;
}

/** Best-effort place name from the text around a job link. */
export function locationNearLink(link: HTMLElement, title: string): string {
  const card = closestAncestor(link, ['tr', 'div', 'td', 'li']);
  if (!card) return '';

  const lines = card.structuredText.split('\n').map(line => collapseSpaces(line));
  for (const line of lines) {
    // The title often shares a line with the place name
    const rest = line.startsWith(title) ? line.slice(title.length) : line;
    if (!PLACE_PATTERN.test(rest)) continue;
    const span = rest.match(PLACE_SPAN);
    if (span) return span[0].replace(/^[\s,]+|[\s,]+$/g, '');
  }
  return '';
}

/** Job links in an alert email body that point at one of the profile's career sites. */
export function parseAlertBody(body: string, profile: AlertProfile): AlertPosting[] {
  const root = parse(body);
  const postings: AlertPosting[] = [];

  for (const link of root.querySelectorAll('a')) {
    const href = (link.getAttribute('href') ?? '').trim();
    if (!href || EXCLUDED_HREF.test(href)) continue;
    if (!profile.urlPatterns.some(pattern => pattern.test(href))) continue;

    const title = titleForLink(link);
    if (!title) continue;

    postings.push({ title, url: href, location: locationNearLink(link, title) });
  }

  return postings;
}

export class EmailAlertAdapter implements SourceAdapter {
  readonly family = 'email_alert' as const;
  readonly name: string;

  constructor(
    private readonly ctx: AdapterContext,
    private readonly profile: AlertProfile,
    private readonly connector: MailboxConnector,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.name = `email:${ctx.company.id}`;
  }

  async scrape(): Promise<JobCandidate[]> {
    const { company } = this.ctx;

    let session: MailboxSession;
    try {
      session = await this.connector.open();
    } catch (error) {
      if (error instanceof MailboxAuthError) {
        log.warn(`${company.id}: mailbox authentication failed, skipping: ${error.message}`);
        return [];
      }
      throw new SourceFetchError(this.name, 'imap', `mailbox connection failed: ${errorMessage(error)}`);
    }

    const candidates: Array<JobCandidate | null> = [];
    try {
      const since = subDays(this.now(), this.ctx.config.emailDaysBack);
      for (const sender of this.profile.senders) {
        let messages: MailMessage[];
        try {
          messages = await session.search(sender, since);
        } catch (error) {
          log.debug(`${company.id}: search for ${sender} failed: ${errorMessage(error)}`);
          continue;
        }
        for (const message of messages) {
          candidates.push(...(await this.parseMessage(message)));
        }
      }
    } finally {
      await session.close();
    }

    const { matching, total } = keepMatching(candidates);
    log.info(`${company.id}: ${matching.length} matching jobs from ${total} total`);
    return matching;
  }

  private async parseMessage(message: MailMessage): Promise<Array<JobCandidate | null>> {
    const { company } = this.ctx;
    try {
      const mail = await simpleParser(message.source);
      const body = mail.html || mail.textAsHtml || mail.text || '';
      if (!body) return [];

      // Alerts carry no posting date; the arrival date stands in for it
      const postedDate = formatDay(mail.date ?? message.receivedAt ?? this.now());
      return parseAlertBody(body, this.profile).map(posting =>
        buildCandidate(
          company.id,
          { title: posting.title, url: posting.url, location: posting.location, postedDate, description: '' },
          { requireEnglish: false },
        ),
      );
    } catch (error) {
      log.debug(`${company.id}: could not parse alert email: ${errorMessage(error)}`);
      return [];
    }
  }
}
