import type { SourceAdapter, JobCandidate, AdapterContext } from './types';
import { buildCandidate, keepMatching } from './candidate';
import { createLogger } from '../utils/logger';
import { htmlToText } from '../utils/html';
import { dayFromEpochMs } from '../utils/dates';

const API_BASE = 'https://api.lever.co/v0/postings';

const log = createLogger('Lever');

interface LeverPosting {
  text?: string;
  hostedUrl?: string;
  categories?: { location?: string; team?: string } | null;
  descriptionPlain?: string;
  description?: string;
  createdAt?: number;
}

export class LeverAdapter implements SourceAdapter {
  readonly family = 'lever' as const;
  readonly name: string;

  constructor(private readonly ctx: AdapterContext) {
    this.name = `lever:${ctx.company.id}`;
  }

  async scrape(): Promise<JobCandidate[]> {
    const { company, http } = this.ctx;
    const url = `${API_BASE}/${encodeURIComponent(company.sourceIdentifier)}`;
    const data = await http.getJson<LeverPosting[] | { ok?: boolean }>(url, { source: this.name });
    const postings = Array.isArray(data) ? data : [];

    const { matching, total } = keepMatching(
      postings.map(posting =>
        buildCandidate(
          company.id,
          {
            title: posting.text,
            url: posting.hostedUrl,
            location: posting.categories?.location,
            department: posting.categories?.team,
            postedDate: dayFromEpochMs(posting.createdAt),
            description: posting.descriptionPlain || htmlToText(posting.description ?? ''),
          },
          { requireEnglish: true },
        ),
      ),
    );

    log.info(`${company.id}: ${matching.length} matching jobs from ${total} total`);
    return matching;
  }
}
