import { classifyPosting, isEnglishPosting, isMatch } from './filters';
import type { JobCandidate } from './types';
import { canonicalUrl, collapseSpaces } from '../utils/html';

export interface PostingFields {
  title?: string | null;
  url?: string | null;
  location?: string | null;
  department?: string | null;
  postedDate?: string;
  description?: string | null;
}

export interface BuildOptions {
  // Structured-API sources carry descriptions worth checking for language
  requireEnglish: boolean;
  baseUrl?: string;
}

function optionalText(value: string | null | undefined): string | undefined {
  const text = collapseSpaces(value ?? '');
  return text || undefined;
}

/**
 * Normalizes and classifies one posting. Returns null when the posting has
 * no title, no resolvable URL, or fails the language gate.
 */
export function buildCandidate(companyId: string, fields: PostingFields, opts: BuildOptions): JobCandidate | null {
  const title = collapseSpaces(fields.title ?? '');
  const url = canonicalUrl(fields.url, opts.baseUrl);
  if (!companyId || !title || !url) return null;

  const description = (fields.description ?? '').trim();
  if (opts.requireEnglish && !isEnglishPosting(title, description)) return null;

  const location = optionalText(fields.location);
  return {
    companyId,
    title,
    url,
    location,
    department: optionalText(fields.department),
    postedDate: fields.postedDate,
    description,
    ...classifyPosting({ title, description, location }),
  };
}

/** First occurrence per URL, restricted to postings that pass location and role. */
export function keepMatching(candidates: Array<JobCandidate | null>): { matching: JobCandidate[]; total: number } {
  const seen = new Set<string>();
  const unique: JobCandidate[] = [];
  for (const candidate of candidates) {
    if (!candidate || seen.has(candidate.url)) continue;
    seen.add(candidate.url);
    unique.push(candidate);
  }
  return { matching: unique.filter(isMatch), total: unique.length };
}
