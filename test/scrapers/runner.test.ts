import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { runAllSources } from '../../src/scrapers/runner';
import { initializeDatabase } from '../../src/db/schema';
import { closeDatabase, getJobById, getScrapeRuns, setDatabase, sqliteStore } from '../../src/db';
import { SourceFetchError } from '../../src/errors';
import { createHttpClient } from '../../src/scrapers/http';
import { identityKey } from '../../src/utils/hash';
import type { AdapterContext, AdapterResolution, JobCandidate, SourceAdapter } from '../../src/scrapers/types';
import { candidate, testCompany, testConfig } from '../helpers';

function fakeAdapter(scrape: () => Promise<JobCandidate[]>): SourceAdapter {
  return { name: 'fake', family: 'greenhouse', scrape };
}

const http = createHttpClient({ timeoutMs: 1000, maxRetries: 0, retryDelayMs: 0 });

describe('runAllSources', () => {
  beforeEach(() => {
    setDatabase(initializeDatabase(':memory:'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    closeDatabase();
    vi.restoreAllMocks();
  });

  it('keeps going after a source fails and stores the first of two identical postings', async () => {
    const resolutions: Record<string, AdapterResolution> = {
      broken: {
        adapter: fakeAdapter(async () => {
          throw new SourceFetchError('greenhouse:broken', 'https://example.com', 'HTTP 500', 500);
        }),
      },
      acme: {
        adapter: fakeAdapter(async () => [
          candidate({ description: 'first attempt' }),
          candidate({ description: 'second attempt' }),
        ]),
      },
      handpicked: { skipped: 'manual source' },
    };
    const sleep = vi.fn(async (_ms: number) => {});

    const summary = await runAllSources(
      [testCompany({ id: 'broken' }), testCompany({ id: 'acme' }), testCompany({ id: 'handpicked' })],
      {
        store: sqliteStore,
        config: testConfig({ rateLimitDelayMs: 2000 }),
        http,
        resolve: (ctx: AdapterContext) => resolutions[ctx.company.id],
        sleep,
      },
    );

    expect(summary).toMatchObject({ totalNew: 1, succeeded: 1, failed: 1, skipped: 1, configured: 3 });
    expect(summary.outcomes.map(outcome => [outcome.companyId, outcome.status, outcome.jobsNew])).toEqual([
      ['broken', 'failed', 0],
      ['acme', 'completed', 1],
      ['handpicked', 'skipped', 0],
    ]);

    const stored = getJobById(identityKey('acme', 'https://acme.com/jobs/42'));
    expect(stored?.description).toBe('first attempt');

    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(console.warn).toHaveBeenCalledWith('[Runner]', 'High failure rate: 1/3 sources failed');

    const runs = getScrapeRuns();
    expect(runs.map(run => `${run.source}:${run.status}`).sort()).toEqual([
      'acme:completed',
      'broken:failed',
      'handpicked:skipped',
    ]);
    expect(runs.find(run => run.source === 'broken')?.error).toBe('greenhouse:broken: HTTP 500');
  });

  it('reports duplicates from an earlier run as no new records', async () => {
    const deps = {
      store: sqliteStore,
      config: testConfig(),
      http,
      resolve: (): AdapterResolution => ({ adapter: fakeAdapter(async () => [candidate()]) }),
    };

    const first = await runAllSources([testCompany()], deps);
    const second = await runAllSources([testCompany()], deps);

    expect(first.totalNew).toBe(1);
    expect(second.totalNew).toBe(0);
    expect(second.outcomes[0]).toMatchObject({ status: 'completed', jobsFound: 1, jobsNew: 0 });
  });

  it('does not warn when failures stay within the configured ratio', async () => {
    const companies = ['a', 'b', 'c', 'd', 'e'].map(id => testCompany({ id }));
    const summary = await runAllSources(companies, {
      store: sqliteStore,
      config: testConfig(),
      http,
      resolve: ctx =>
        ctx.company.id === 'a'
          ? { adapter: fakeAdapter(async () => Promise.reject(new Error('timeout'))) }
          : { adapter: fakeAdapter(async () => []) },
    });

    expect(summary.failed).toBe(1);
    expect(summary.succeeded).toBe(4);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('spreads sources over a bounded pool and keeps outcomes in registry order', async () => {
    let running = 0;
    let peak = 0;
    const companies = ['a', 'b', 'c', 'd'].map(id => testCompany({ id }));

    const summary = await runAllSources(companies, {
      store: sqliteStore,
      config: testConfig({ concurrency: 2 }),
      http,
      resolve: ctx => ({
        adapter: fakeAdapter(async () => {
          running++;
          peak = Math.max(peak, running);
          await new Promise(resolve => setTimeout(resolve, 10));
          running--;
          return [candidate({ companyId: ctx.company.id, url: `https://${ctx.company.id}.example.com/jobs/1` })];
        }),
      }),
    });

    expect(peak).toBe(2);
    expect(summary.totalNew).toBe(4);
    expect(summary.outcomes.map(outcome => outcome.companyId)).toEqual(['a', 'b', 'c', 'd']);
  });
});
