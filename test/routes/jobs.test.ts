import type { Server } from 'http';
import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import { createApp } from '../../src/app';
import { initializeDatabase } from '../../src/db/schema';
import { closeDatabase, completeScrapeRun, setDatabase, startScrapeRun, submitJob } from '../../src/db';
import { companyIndex } from '../../src/registry';
import { identityKey } from '../../src/utils/hash';
import { candidate, testCompany } from '../helpers';

const companies = companyIndex([
  testCompany({ id: 'acme', name: 'Acme Analytics', knownVisaSponsor: true, ethicsRating: 'good' }),
]);

const BARCELONA_ID = identityKey('acme', 'https://acme.com/jobs/1');

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = createApp(companies).listen(0);
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>(resolve => server.close(() => resolve()));
  closeDatabase();
});

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
  closeDatabase();
  setDatabase(initializeDatabase(':memory:'));
  submitJob(
    candidate({
      url: 'https://acme.com/jobs/1',
      title: 'Senior Data Scientist',
      location: 'Barcelona (Hybrid)',
      description: 'Hybrid role, relocation offered.',
      mentionsRelocation: true,
    }),
    new Date('2026-01-10T09:00:00.000Z'),
  );
  submitJob(
    candidate({ url: 'https://acme.com/jobs/2', title: 'Data Engineer', location: 'Madrid' }),
    new Date('2026-01-12T09:00:00.000Z'),
  );
});

describe('jobs API', () => {
  it('lists target-location jobs with reporting fields', async () => {
    const response = await fetch(`${baseUrl}/api/jobs`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      success: true,
      total: 1,
      jobs: [
        {
          identityKey: BARCELONA_ID,
          companyName: 'Acme Analytics',
          ethicsRating: 'good',
          visaStatus: 'maybe',
          visaLabel: 'Maybe (relocation mentioned)',
          workType: 'hybrid',
          greatFit: true,
        },
      ],
    });
  });

  it('returns recent jobs newest first', async () => {
    const response = await fetch(`${baseUrl}/api/jobs/recent?since=2026-01-01T00:00:00Z`);

    expect(await response.json()).toMatchObject({
      total: 2,
      jobs: [{ url: 'https://acme.com/jobs/2' }, { url: 'https://acme.com/jobs/1' }],
    });
  });

  it('rejects an invalid since parameter', async () => {
    const response = await fetch(`${baseUrl}/api/jobs/recent?since=yesterday`);
    expect(response.status).toBe(400);
  });

  it('returns a single job or 404', async () => {
    const found = await fetch(`${baseUrl}/api/jobs/${BARCELONA_ID}`);
    expect(found.status).toBe(200);
    expect(await found.json()).toMatchObject({ job: { title: 'Senior Data Scientist' } });

    const missing = await fetch(`${baseUrl}/api/jobs/0000000000000000`);
    expect(missing.status).toBe(404);
  });

  it('updates status and notes', async () => {
    const response = await fetch(`${baseUrl}/api/jobs/${BARCELONA_ID}`, {
      method: 'PATCH',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ status: 'interested', notes: 'Ask about the team' }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ job: { status: 'interested', notes: 'Ask about the team' } });
  });

  it('validates status updates', async () => {
    const unknownStatus = await fetch(`${baseUrl}/api/jobs/${BARCELONA_ID}`, {
      method: 'PATCH',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ status: 'hired' }),
    });
    expect(unknownStatus.status).toBe(400);

    const empty = await fetch(`${baseUrl}/api/jobs/${BARCELONA_ID}`, {
      method: 'PATCH',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({}),
    });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toEqual({ success: false, error: 'status or notes is required' });
  });

  it('reports stats and scrape runs', async () => {
    const runId = startScrapeRun('acme');
    completeScrapeRun(runId, 'completed', 2, 2);

    const stats = await (await fetch(`${baseUrl}/api/jobs/stats`)).json();
    expect(stats).toMatchObject({ success: true, total: 2, matching: 1, byCompany: { acme: 2 } });

    const runs = await (await fetch(`${baseUrl}/api/scrape-runs`)).json();
    expect(runs).toMatchObject({
      runs: [{ source: 'acme', status: 'completed', jobsFound: 2, jobsNew: 2 }],
    });
  });

  it('answers the health check', async () => {
    const body = await (await fetch(`${baseUrl}/health`)).json();
    expect(body).toMatchObject({ status: 'ok', service: 'jobs' });
  });
});
