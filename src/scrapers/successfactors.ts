import { parse, HTMLElement } from 'node-html-parser';
import type { SourceAdapter, JobCandidate, AdapterContext } from './types';
import { buildCandidate, keepMatching, type PostingFields } from './candidate';
import { createLogger, errorMessage } from '../utils/logger';
import { cleanWhitespace, collapseSpaces } from '../utils/html';
import { parseDay } from '../utils/dates';

const DATE_PATTERNS = ['d MMM yyyy', 'd MMMM yyyy', 'MMM d, yyyy', 'MMMM d, yyyy', 'yyyy-MM-dd'];
const JOB_LINK_PATTERN = /\/job\/.*?\/\d+\/?/;

const log = createLogger('SuccessFactors');

export interface SearchRow {
  title: string;
  href: string;
  location: string;
  posted: string;
}

function text(element: HTMLElement | null): string {
  return element ? collapseSpaces(element.text) : '';
}

/** Nearest ancestor whose tag is one of `tags` (lowercase). */
export function closestAncestor(element: HTMLElement, tags: string[]): HTMLElement | null {
  let node: HTMLElement | null = element.parentNode;
  while (node) {
    if (tags.includes((node.rawTagName || '').toLowerCase())) return node;
    node = node.parentNode;
  }
  return null;
}

/** Rows of a job2web search results page, with a link-pattern fallback for customised themes. */
export function parseSearchResults(html: string): SearchRow[] {
  const root = parse(html);
  const rows: SearchRow[] = [];

  for (const row of root.querySelectorAll('tr.data-row')) {
    const link = row.querySelector('a.jobTitle-link') ?? row.querySelector('a[href*="/job/"]');
    if (!link) continue;
    rows.push({
      title: text(link),
      href: link.getAttribute('href') ?? '',
      location: text(row.querySelector('span.jobLocation') ?? row.querySelector('[class*="location"]')),
      posted: text(row.querySelector('span.jobDate') ?? row.querySelector('[class*="date"]')),
    });
  }
  if (rows.length > 0) return rows;

  for (const link of root.querySelectorAll('a')) {
    const href = link.getAttribute('href') ?? '';
    if (!JOB_LINK_PATTERN.test(href)) continue;
    const container = closestAncestor(link, ['tr', 'li', 'div']);
    rows.push({
      title: text(link),
      href,
      location: text(container?.querySelector('[class*="location"]') ?? null),
      posted: text(container?.querySelector('[class*="date"]') ?? null),
    });
  }
  return rows;
}

export function extractDescription(html: string): string {
  const root = parse(html);
  const container =
    root.querySelector('[class*="jobdescription"]') ??
    root.querySelector('[class*="jobDescription"]') ??
    root.querySelector('[class*="job-description"]') ??
    root.querySelector('[id*="description"]') ??
    root.querySelector('article');
  return container ? cleanWhitespace(container.structuredText) : '';
}

export class SuccessFactorsAdapter implements SourceAdapter {
  readonly family = 'successfactors' as const;
  readonly name: string;
  private readonly baseUrl: string;

  constructor(private readonly ctx: AdapterContext) {
    this.name = `successfactors:${ctx.company.id}`;
    this.baseUrl = ctx.company.sourceIdentifier.replace(/\/$/, '');
  }

  async scrape(): Promise<JobCandidate[]> {
    const { company } = this.ctx;
    const queries = company.options.queries?.length ? company.options.queries : [''];
    const rows: SearchRow[] = [];
    let lastError: unknown;
    let failures = 0;

    for (const query of queries) {
      try {
        rows.push(...(await this.search(query)));
      } catch (error) {
        failures++;
        lastError = error;
        log.error(`${company.id}: search for "${query}" failed: ${errorMessage(error)}`);
      }
    }
    if (failures === queries.length) throw lastError;

    // Search terms overlap, so the same posting can come back more than once
    const seen = new Set<string>();
    const candidates: Array<JobCandidate | null> = [];
    for (const row of rows) {
      if (!row.href || seen.has(row.href)) continue;
      seen.add(row.href);
      const fields: PostingFields = {
        title: row.title,
        url: row.href,
        location: row.location,
        postedDate: parseDay(row.posted, DATE_PATTERNS),
        description: company.options.fetchDetails ? await this.fetchDescription(row.href) : '',
      };
      candidates.push(buildCandidate(company.id, fields, { requireEnglish: false, baseUrl: this.baseUrl }));
    }

    const { matching, total } = keepMatching(candidates);
    log.info(`${company.id}: ${matching.length} matching jobs from ${total} total`);
    return matching;
  }

  private async search(query: string): Promise<SearchRow[]> {
    const params = new URLSearchParams({
      q: query,
      locationsearch: this.ctx.company.options.location ?? 'barcelona',
      locale: 'en_US',
    });
    const html = await this.ctx.http.getText(`${this.baseUrl}/search/?${params}`, { source: this.name });
    return parseSearchResults(html);
  }

  private async fetchDescription(href: string): Promise<string> {
    const url = href.startsWith('http') ? href : `${this.baseUrl}${href}`;
    try {
      return extractDescription(await this.ctx.http.getText(url, { source: this.name }));
    } catch (error) {
      log.debug(`${this.ctx.company.id}: no description for ${url}: ${errorMessage(error)}`);
      return '';
    }
  }
}
