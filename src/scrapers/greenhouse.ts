import type { SourceAdapter, JobCandidate, AdapterContext } from './types';
import { buildCandidate, keepMatching } from './candidate';
import { createLogger } from '../utils/logger';
import { htmlToText } from '../utils/html';
import { isoDayPrefix } from '../utils/dates';

const API_BASE = 'https://boards-api.greenhouse.io/v1/boards';

const log = createLogger('Greenhouse');

interface GreenhouseJob {
  title?: string;
  absolute_url?: string;
  location?: { name?: string } | null;
  content?: string;
  updated_at?: string;
  departments?: { name?: string }[];
}

export class GreenhouseAdapter implements SourceAdapter {
  readonly family = 'greenhouse' as const;
  readonly name: string;

  constructor(private readonly ctx: AdapterContext) {
    this.name = `greenhouse:${ctx.company.id}`;
  }

  async scrape(): Promise<JobCandidate[]> {
    const { company, http } = this.ctx;
    const url = `${API_BASE}/${encodeURIComponent(company.sourceIdentifier)}/jobs?content=true`;
    const data = await http.getJson<{ jobs?: GreenhouseJob[] }>(url, { source: this.name });
    const jobs = Array.isArray(data.jobs) ? data.jobs : [];

    const { matching, total } = keepMatching(
      jobs.map(job =>
        buildCandidate(
          company.id,
          {
            title: job.title,
            url: job.absolute_url,
            location: job.location?.name,
            department: job.departments?.[0]?.name,
            postedDate: isoDayPrefix(job.updated_at),
            description: htmlToText(job.content ?? ''),
          },
          { requireEnglish: true },
        ),
      ),
    );

    log.info(`${company.id}: ${matching.length} matching jobs from ${total} total`);
    return matching;
  }
}
