import type { AdapterContext, AdapterResolution } from './types';
import type { Company } from '../registry';
import type { AppConfig } from '../config';
import type { JobStore } from '../db';
import { createHttpClient, PerHostThrottle, type HttpClient } from './http';
import { resolveAdapter } from './index';
import { createLogger, errorMessage } from '../utils/logger';

const log = createLogger('Runner');

export interface RunDependencies {
  store: JobStore;
  config: AppConfig;
  http?: HttpClient;
  resolve?: (ctx: AdapterContext) => AdapterResolution;
  sleep?: (ms: number) => Promise<void>;
}

export interface SourceOutcome {
  companyId: string;
  status: 'completed' | 'failed' | 'skipped';
  jobsFound: number;
  jobsNew: number;
  error?: string;
}

export interface RunSummary {
  totalNew: number;
  succeeded: number;
  failed: number;
  skipped: number;
  configured: number;
  outcomes: SourceOutcome[];
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export async function runSource(company: Company, deps: RunDependencies, http: HttpClient): Promise<SourceOutcome> {
  const { store, config } = deps;
  const resolve = deps.resolve ?? resolveAdapter;
  const runId = store.startScrapeRun(company.id);

  let resolution: AdapterResolution;
  try {
    resolution = resolve({ company, http, config });
  } catch (error) {
    const message = errorMessage(error);
    store.completeScrapeRun(runId, 'failed', 0, 0, message);
    log.error(`${company.id} failed:`, message);
    return { companyId: company.id, status: 'failed', jobsFound: 0, jobsNew: 0, error: message };
  }

  if ('skipped' in resolution) {
    store.completeScrapeRun(runId, 'skipped', 0, 0, resolution.skipped);
    log.info(`Skipping ${company.id}: ${resolution.skipped}`);
    return { companyId: company.id, status: 'skipped', jobsFound: 0, jobsNew: 0, error: resolution.skipped };
  }

  try {
    log.info(`Starting scrape for ${company.id} (${resolution.adapter.family})...`);
    const candidates = await resolution.adapter.scrape();

    let jobsNew = 0;
    for (const candidate of candidates) {
      if (store.submitJob(candidate) === 'inserted') {
        jobsNew++;
        log.info(`New job: ${candidate.title} at ${company.id}`);
      }
    }

    store.completeScrapeRun(runId, 'completed', candidates.length, jobsNew);
    log.info(`${company.id} complete: ${candidates.length} found, ${jobsNew} new`);
    return { companyId: company.id, status: 'completed', jobsFound: candidates.length, jobsNew };
  } catch (error) {
    const message = errorMessage(error);
    store.completeScrapeRun(runId, 'failed', 0, 0, message);
    log.error(`${company.id} failed:`, message);
    return { companyId: company.id, status: 'failed', jobsFound: 0, jobsNew: 0, error: message };
  }
}

/**
 * Runs every configured source. One source's failure never stops the rest;
 * with `concurrency` above 1 sources are spread over that many workers, each
 * pausing `rateLimitDelayMs` between its sources.
 */
export async function runAllSources(companies: Company[], deps: RunDependencies): Promise<RunSummary> {
  const { config } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const http =
    deps.http ??
    createHttpClient({
      timeoutMs: config.requestTimeoutMs,
      maxRetries: config.maxRetries,
      retryDelayMs: 1000,
      throttle: config.concurrency > 1 ? new PerHostThrottle(config.rateLimitDelayMs) : undefined,
    });

  log.info('='.repeat(50));
  log.info(`Starting scrape run for ${companies.length} sources`);

  const outcomes: SourceOutcome[] = new Array(companies.length);
  let next = 0;

  const worker = async () => {
    while (next < companies.length) {
      const index = next++;
      outcomes[index] = await runSource(companies[index], deps, http);
      if (next < companies.length && config.rateLimitDelayMs > 0) {
        await sleep(config.rateLimitDelayMs);
      }
    }
  };

  const workers = Math.max(1, Math.min(config.concurrency, companies.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));

  const summary: RunSummary = {
    totalNew: outcomes.reduce((sum, outcome) => sum + outcome.jobsNew, 0),
    succeeded: outcomes.filter(outcome => outcome.status === 'completed').length,
    failed: outcomes.filter(outcome => outcome.status === 'failed').length,
    skipped: outcomes.filter(outcome => outcome.status === 'skipped').length,
    configured: companies.length,
    outcomes,
  };

  log.info('-'.repeat(50));
  log.info(`Scraping complete: ${summary.totalNew} new jobs found`);
  log.info(`Sources scraped: ${summary.succeeded}/${summary.configured} (${summary.skipped} not run)`);
  if (summary.failed > summary.configured * config.failureWarningRatio) {
    log.warn(`High failure rate: ${summary.failed}/${summary.configured} sources failed`);
  }
  log.info('='.repeat(50));

  return summary;
}
