import type { SourceAdapter, JobCandidate, AdapterContext } from './types';
import { buildCandidate, keepMatching } from './candidate';
import { createLogger } from '../utils/logger';
import { htmlToText } from '../utils/html';
import { isoDayPrefix } from '../utils/dates';

const API_BASE = 'https://api.ashbyhq.com/posting-api/job-board';
const JOBS_BASE = 'https://jobs.ashbyhq.com';

const log = createLogger('Ashby');

interface AshbyJob {
  id?: string;
  title?: string;
  location?: string;
  department?: string;
  descriptionPlain?: string;
  descriptionHtml?: string;
  publishedAt?: string;
  jobUrl?: string;
}

export class AshbyAdapter implements SourceAdapter {
  readonly family = 'ashby' as const;
  readonly name: string;

  constructor(private readonly ctx: AdapterContext) {
    this.name = `ashby:${ctx.company.id}`;
  }

  async scrape(): Promise<JobCandidate[]> {
    const { company, http } = this.ctx;
    const org = company.sourceIdentifier;
    const data = await http.getJson<{ jobs?: AshbyJob[] }>(`${API_BASE}/${encodeURIComponent(org)}`, {
      source: this.name,
    });
    const jobs = Array.isArray(data.jobs) ? data.jobs : [];

    const { matching, total } = keepMatching(
      jobs.map(job =>
        buildCandidate(
          company.id,
          {
            title: job.title,
            url: job.id ? `${JOBS_BASE}/${org}/${job.id}` : job.jobUrl,
            location: job.location,
            department: job.department,
            postedDate: isoDayPrefix(job.publishedAt),
            description: job.descriptionPlain || htmlToText(job.descriptionHtml ?? ''),
          },
          { requireEnglish: true },
        ),
      ),
    );

    log.info(`${company.id}: ${matching.length} matching jobs from ${total} total`);
    return matching;
  }
}
