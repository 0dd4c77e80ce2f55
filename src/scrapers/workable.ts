import type { SourceAdapter, JobCandidate, AdapterContext } from './types';
import { buildCandidate, keepMatching } from './candidate';
import { createLogger, errorMessage } from '../utils/logger';
import { htmlToText } from '../utils/html';
import { isoDayPrefix } from '../utils/dates';

const API_BASE = 'https://apply.workable.com/api/v3/accounts';
const MAX_PAGES = 10;

const log = createLogger('Workable');

interface WorkableListing {
  shortcode?: string;
  title?: string;
  location?: { city?: string; country?: string } | string | null;
  department?: string | string[];
  published_on?: string;
  published?: string;
}

interface WorkableDetail {
  description?: string;
  requirements?: string;
  benefits?: string;
}

function formatLocation(location: WorkableListing['location']): string {
  if (!location) return '';
  if (typeof location === 'string') return location;
  return [location.city, location.country].filter(Boolean).join(', ');
}

function formatDepartment(department: WorkableListing['department']): string {
  return Array.isArray(department) ? department.join(', ') : department ?? '';
}

export class WorkableAdapter implements SourceAdapter {
  readonly family = 'workable' as const;
  readonly name: string;

  constructor(private readonly ctx: AdapterContext) {
    this.name = `workable:${ctx.company.id}`;
  }

  async scrape(): Promise<JobCandidate[]> {
    const { company } = this.ctx;
    const listings = await this.fetchListings();

    const candidates: Array<JobCandidate | null> = [];
    for (const listing of listings) {
      if (!listing.shortcode) continue;
      const description = await this.fetchDescription(listing.shortcode);
      candidates.push(
        buildCandidate(
          company.id,
          {
            title: listing.title,
            url: `https://apply.workable.com/${company.sourceIdentifier}/j/${listing.shortcode}/`,
            location: formatLocation(listing.location),
            department: formatDepartment(listing.department),
            postedDate: isoDayPrefix(listing.published_on ?? listing.published),
            description,
          },
          { requireEnglish: true },
        ),
      );
    }

    const { matching, total } = keepMatching(candidates);
    log.info(`${company.id}: ${matching.length} matching jobs from ${total} total`);
    return matching;
  }

  private async fetchListings(): Promise<WorkableListing[]> {
    const { company, http } = this.ctx;
    const url = `${API_BASE}/${encodeURIComponent(company.sourceIdentifier)}/jobs`;
    const listings: WorkableListing[] = [];
    let token: string | undefined;

    for (let page = 1; page <= MAX_PAGES; page++) {
      const body = token ? { token } : {};
      const data = await http.postJson<{ results?: WorkableListing[]; nextPage?: string }>(url, body, {
        source: this.name,
      });
      listings.push(...(Array.isArray(data.results) ? data.results : []));
      token = data.nextPage;
      if (!token) break;
    }

    return listings;
  }

  // A missing description degrades the posting, it does not fail the source
  private async fetchDescription(shortcode: string): Promise<string> {
    const { company, http } = this.ctx;
    const url = `${API_BASE}/${encodeURIComponent(company.sourceIdentifier)}/jobs/${shortcode}`;
    try {
      const detail = await http.postJson<WorkableDetail>(url, {}, { source: this.name });
      return htmlToText([detail.description, detail.requirements, detail.benefits].filter(Boolean).join('\n'));
    } catch (error) {
      log.debug(`${company.id}: no description for ${shortcode}: ${errorMessage(error)}`);
      return '';
    }
  }
}
