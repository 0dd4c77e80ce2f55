import type { SourceAdapter, JobCandidate, AdapterContext } from './types';
import { buildCandidate, keepMatching } from './candidate';
import { readCookie } from './http';
import { SourceFetchError } from '../errors';
import { createLogger } from '../utils/logger';
import { parseRelativeDay } from '../utils/dates';

const PAGE_LIMIT = 20; // Workday rejects larger pages
const MAX_JOBS = 500;
const CSRF_COOKIE = 'CALYPSO_CSRF_TOKEN';

const log = createLogger('Workday');

interface WorkdayPosting {
  title?: string;
  externalPath?: string;
  locationsText?: string;
  postedOn?: string;
  bulletFields?: string[];
}

interface WorkdayPage {
  total?: number;
  jobPostings?: WorkdayPosting[];
}

export interface WorkdaySite {
  origin: string;
  tenant: string;
  site: string;
}

/** "https://acme.wd3.myworkdayjobs.com/en-US/Acme_Careers" → origin, tenant and site id. */
export function parseWorkdaySite(careersUrl: string): WorkdaySite | null {
  let parsed: URL;
  try {
    parsed = new URL(careersUrl);
  } catch {
    return null;
  }
  const tenant = parsed.hostname.split('.')[0];
  const segments = parsed.pathname.split('/').filter(Boolean);
  const site = segments[segments.length - 1];
  if (!tenant || !site || !parsed.hostname.endsWith('myworkdayjobs.com')) return null;
  return { origin: parsed.origin, tenant, site };
}

export class WorkdayAdapter implements SourceAdapter {
  readonly family = 'workday' as const;
  readonly name: string;

  constructor(
    private readonly ctx: AdapterContext,
    private readonly site: WorkdaySite,
  ) {
    this.name = `workday:${ctx.company.id}`;
  }

  async scrape(): Promise<JobCandidate[]> {
    const { company } = this.ctx;
    const postings = await this.fetchPostings();

    const { matching, total } = keepMatching(
      postings.map(posting => {
        const bullets = posting.bulletFields ?? [];
        return buildCandidate(
          company.id,
          {
            title: posting.title,
            url: posting.externalPath ? `${this.site.origin}/en-US/${this.site.site}${posting.externalPath}` : undefined,
            location: posting.locationsText || bullets.slice(0, 2).join(', '),
            postedDate: parseRelativeDay(posting.postedOn),
            description: '',
          },
          { requireEnglish: true },
        );
      }),
    );

    log.info(`${company.id}: ${matching.length} matching jobs from ${total} total`);
    return matching;
  }

  private async fetchPostings(): Promise<WorkdayPosting[]> {
    const { http } = this.ctx;
    const { origin, tenant, site } = this.site;

    // The careers page sets the CSRF cookie the jobs endpoint expects
    const mainUrl = `${origin}/en-US/${site}`;
    const main = await http.getRaw(mainUrl, { source: this.name });
    if (!main.ok) {
      throw new SourceFetchError(this.name, mainUrl, `careers page returned HTTP ${main.status}`, main.status);
    }
    const csrf = readCookie(main.headers, CSRF_COOKIE);
    const headers: Record<string, string> = {};
    if (csrf) {
      headers['X-CALYPSO-CSRF-TOKEN'] = csrf;
      headers.Cookie = `${CSRF_COOKIE}=${csrf}`;
    } else {
      log.warn(`${this.ctx.company.id}: no CSRF token found, trying without`);
    }

    const apiUrl = `${origin}/wday/cxs/${tenant}/${site}/jobs`;
    const postings: WorkdayPosting[] = [];
    let total: number | undefined;

    for (let offset = 0; offset < MAX_JOBS; offset += PAGE_LIMIT) {
      const data = await http.postJson<WorkdayPage>(
        apiUrl,
        { appliedFacets: {}, limit: PAGE_LIMIT, offset, searchText: '' },
        { source: this.name, headers },
      );
      const batch = Array.isArray(data.jobPostings) ? data.jobPostings : [];
      // Only the first page reports an accurate total
      if (total === undefined) total = data.total ?? 0;
      if (batch.length === 0) break;

      postings.push(...batch);
      log.debug(`${this.ctx.company.id}: fetched ${postings.length}/${total}`);
      if (postings.length >= total) break;
    }

    return postings;
  }
}
