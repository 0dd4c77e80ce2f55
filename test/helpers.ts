import type { AppConfig } from '../src/config';
import type { Company } from '../src/registry';
import type { JobCandidate } from '../src/scrapers/types';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    databasePath: ':memory:',
    companiesFile: 'data/companies.json',
    requestTimeoutMs: 1000,
    maxRetries: 0,
    rateLimitDelayMs: 0,
    concurrency: 1,
    failureWarningRatio: 0.2,
    emailDaysBack: 7,
    runTimeoutMs: 60_000,
    port: 0,
    logLevel: 'info',
    mail: null,
    ...overrides,
  };
}

export function testCompany(overrides: Partial<Company> = {}): Company {
  return {
    id: 'acme',
    name: 'Acme',
    sourceFamily: 'greenhouse',
    sourceIdentifier: 'acme',
    knownVisaSponsor: false,
    ethicsRating: 'neutral',
    notes: '',
    options: {},
    ...overrides,
  };
}

export function candidate(overrides: Partial<JobCandidate> = {}): JobCandidate {
  return {
    companyId: 'acme',
    title: 'Data Scientist',
    url: 'https://acme.com/jobs/42',
    location: 'Barcelona, Spain',
    description: 'Build models.',
    isTargetLocation: true,
    isTargetRole: true,
    mentionsVisaSupport: false,
    mentionsRelocation: false,
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/html', ...headers } });
}

export function requestUrl(input: string | URL | Request): string {
  return input instanceof Request ? input.url : String(input);
}

export function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}
