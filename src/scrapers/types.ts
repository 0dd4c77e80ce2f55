import type { Company, SourceFamily } from '../registry';
import type { HttpClient } from './http';
import type { AppConfig } from '../config';

export interface ClassificationFlags {
  isTargetLocation: boolean;
  isTargetRole: boolean;
  mentionsVisaSupport: boolean;
  mentionsRelocation: boolean;
}

/**
 * A normalized posting produced by an adapter, already classified.
 * `postedDate` is YYYY-MM-DD or absent when the source gives no reliable date.
 */
export interface JobCandidate extends ClassificationFlags {
  companyId: string;
  title: string;
  url: string;
  location?: string;
  department?: string;
  postedDate?: string;
  description: string;
}

/** A candidate as persisted: identity and discovery time are assigned by the store. */
export interface JobRecord extends JobCandidate {
  identityKey: string;
  discoveredAt: string;
  status: string;
  notes: string | null;
}

export interface SourceAdapter {
  name: string;
  family: SourceFamily;
  scrape(): Promise<JobCandidate[]>;
}

export interface AdapterContext {
  company: Company;
  http: HttpClient;
  config: AppConfig;
}

/** Outcome of building an adapter for a registry entry. */
export type AdapterResolution =
  | { adapter: SourceAdapter }
  | { skipped: string };
