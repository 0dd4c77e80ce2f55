import type { SourceAdapter, JobCandidate, AdapterContext } from './types';
import { buildCandidate, keepMatching } from './candidate';
import { createLogger } from '../utils/logger';
import { htmlToText } from '../utils/html';
import { parseDay } from '../utils/dates';

const SEARCH_URL = 'https://www.amazon.jobs/en/search.json';
const JOBS_BASE = 'https://www.amazon.jobs';
const RESULT_LIMIT = 100;
const MAX_PAGES = 10;

const log = createLogger('Amazon');

interface AmazonJob {
  title?: string;
  normalized_location?: string;
  location?: string;
  city?: string;
  description_short?: string;
  basic_qualifications?: string;
  preferred_qualifications?: string;
  job_path?: string;
  job_category?: string;
  business_category?: string;
  posted_date?: string;
}

interface AmazonSearchPage {
  hits?: number;
  jobs?: AmazonJob[];
}

export class AmazonAdapter implements SourceAdapter {
  readonly family = 'amazon' as const;
  readonly name: string;

  constructor(private readonly ctx: AdapterContext) {
    this.name = `amazon:${ctx.company.id}`;
  }

  async scrape(): Promise<JobCandidate[]> {
    const { company } = this.ctx;
    const jobs = await this.fetchJobs();

    const { matching, total } = keepMatching(
      jobs.map(job => {
        const description = htmlToText(
          [job.description_short, job.basic_qualifications, job.preferred_qualifications]
            .filter(Boolean)
            .join('\n\n'),
        );
        const location = job.normalized_location || job.location || job.city;
        const candidate = buildCandidate(
          company.id,
          {
            title: job.title,
            url: job.job_path ? `${JOBS_BASE}${job.job_path}` : undefined,
            location,
            department: job.job_category || job.business_category,
            postedDate: parseDay(job.posted_date, ['MMMM d, yyyy']),
            description,
          },
          { requireEnglish: true },
        );
        // The city field alone can place a posting in the target city
        if (candidate && !candidate.isTargetLocation && (job.city ?? '').toLowerCase().includes('barcelona')) {
          return { ...candidate, isTargetLocation: true };
        }
        return candidate;
      }),
    );

    log.info(`${company.id}: ${matching.length} matching jobs from ${total} total`);
    return matching;
  }

  private async fetchJobs(): Promise<AmazonJob[]> {
    const { company, http } = this.ctx;
    const city = company.sourceIdentifier || 'Barcelona';
    const country = company.options.country ?? 'ESP';
    const jobs: AmazonJob[] = [];

    for (let page = 0; page < MAX_PAGES; page++) {
      const params = new URLSearchParams({
        city,
        country,
        offset: String(page * RESULT_LIMIT),
        result_limit: String(RESULT_LIMIT),
        sort: 'recent',
      });
      const data = await http.getJson<AmazonSearchPage>(`${SEARCH_URL}?${params}`, { source: this.name });
      const batch = Array.isArray(data.jobs) ? data.jobs : [];
      jobs.push(...batch);

      if (batch.length < RESULT_LIMIT || jobs.length >= (data.hits ?? 0)) break;
    }

    return jobs;
  }
}
