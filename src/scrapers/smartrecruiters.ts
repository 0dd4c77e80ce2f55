import type { SourceAdapter, JobCandidate, AdapterContext } from './types';
import { buildCandidate, keepMatching } from './candidate';
import { createLogger, errorMessage } from '../utils/logger';
import { htmlToText } from '../utils/html';
import { isoDayPrefix } from '../utils/dates';

const API_BASE = 'https://api.smartrecruiters.com/v1/companies';
const PAGE_LIMIT = 100;
const MAX_PAGES = 10;
const DESCRIPTION_SECTIONS = ['jobDescription', 'qualifications', 'additionalInformation'] as const;

const log = createLogger('SmartRecruiters');

interface SmartRecruitersPosting {
  id?: string;
  name?: string;
  location?: { city?: string; country?: string; remote?: boolean } | null;
  department?: { label?: string } | null;
  releasedDate?: string;
}

interface SmartRecruitersPage {
  offset?: number;
  totalFound?: number;
  content?: SmartRecruitersPosting[];
}

type SectionName = (typeof DESCRIPTION_SECTIONS)[number];

interface SmartRecruitersDetail {
  jobAd?: { sections?: Partial<Record<SectionName, { text?: string }>> };
}

export class SmartRecruitersAdapter implements SourceAdapter {
  readonly family = 'smartrecruiters' as const;
  readonly name: string;

  constructor(private readonly ctx: AdapterContext) {
    this.name = `smartrecruiters:${ctx.company.id}`;
  }

  async scrape(): Promise<JobCandidate[]> {
    const { company } = this.ctx;
    const slug = company.sourceIdentifier;
    const postings = await this.fetchPostings();

    const candidates: Array<JobCandidate | null> = [];
    for (const posting of postings) {
      if (!posting.id) continue;
      const location = [posting.location?.city, posting.location?.country].filter(Boolean).join(', ');
      candidates.push(
        buildCandidate(
          company.id,
          {
            title: posting.name,
            url: `https://jobs.smartrecruiters.com/${slug}/${posting.id}`,
            location,
            department: posting.department?.label,
            postedDate: isoDayPrefix(posting.releasedDate),
            description: await this.fetchDescription(posting.id),
          },
          { requireEnglish: true },
        ),
      );
    }

    const { matching, total } = keepMatching(candidates);
    log.info(`${company.id}: ${matching.length} matching jobs from ${total} total`);
    return matching;
  }

  private async fetchPostings(): Promise<SmartRecruitersPosting[]> {
    const { company, http } = this.ctx;
    const base = `${API_BASE}/${encodeURIComponent(company.sourceIdentifier)}/postings`;
    const postings: SmartRecruitersPosting[] = [];

    for (let page = 0; page < MAX_PAGES; page++) {
      const data = await http.getJson<SmartRecruitersPage>(
        `${base}?limit=${PAGE_LIMIT}&offset=${page * PAGE_LIMIT}`,
        { source: this.name },
      );
      const content = Array.isArray(data.content) ? data.content : [];
      postings.push(...content);

      const total = data.totalFound ?? 0;
      if (content.length === 0 || postings.length >= total) break;
    }

    return postings;
  }

  private async fetchDescription(postingId: string): Promise<string> {
    const { company, http } = this.ctx;
    const url = `${API_BASE}/${encodeURIComponent(company.sourceIdentifier)}/postings/${postingId}`;
    try {
      const detail = await http.getJson<SmartRecruitersDetail>(url, { source: this.name });
      const sections = detail.jobAd?.sections ?? {};
      const parts = DESCRIPTION_SECTIONS.map(name => sections[name]?.text).filter(
        (text): text is string => Boolean(text),
      );
      return htmlToText(parts.join('\n'));
    } catch (error) {
      log.debug(`${company.id}: no description for ${postingId}: ${errorMessage(error)}`);
      return '';
    }
  }
}
