// Classification heuristics shared by every adapter.
// All predicates are pure and case-insensitive.

import type { ClassificationFlags } from './types';

// Target city, its airport code, or remote/hybrid work tied to Spain/Barcelona
const TARGET_LOCATION_PATTERNS = [
  /\bbarcelona\b/i,
  /\bbcn\b/i,
  /\bspain\b.*\bremote\b/i,
  /\bremote\b.*\bspain\b/i,
  /\bhybrid\b.*\bbarcelona\b/i,
  /\bbarcelona\b.*\bhybrid\b/i,
];

// Role-family phrases; no exclusions are applied at this stage
const ROLE_KEYWORDS = [
  'data scientist',
  'data analyst',
  'data engineer',
  'machine learning',
  'ml engineer',
  'ai engineer',
  'artificial intelligence',
  'analytics engineer',
  'applied scientist',
  'research scientist',
  'deep learning',
  'nlp engineer',
  'computer vision',
  'data science',
];

const GREAT_FIT_KEYWORDS = [
  'data scientist',
  'data science',
  'machine learning engineer',
  'ml engineer',
  'mle',
  'data analyst',
  'ai engineer',
  'applied scientist',
  'research scientist',
  'deep learning',
  'nlp engineer',
  'computer vision engineer',
  'artificial intelligence',
];

const GREAT_FIT_DESCRIPTION_SIGNALS = ['data scientist', 'machine learning engineer', 'ml engineer', 'data analyst'];

// Checked against the title only
const GREAT_FIT_EXCLUSIONS = [
  'intern',
  'internship',
  'product manager',
  'product owner',
  'software engineer',
  'software developer',
  'backend engineer',
  'frontend engineer',
  'full stack',
  'fullstack',
  'devops',
  'sre',
  'site reliability',
  'account manager',
  'sales',
  'marketing',
  'recruiter',
  'hr ',
  'human resources',
  'content',
  'designer',
  'ux ',
  'ui ',
  'customer success',
  'support engineer',
  'qa engineer',
  'test engineer',
  'project manager',
  'program manager',
  'business analyst',
  'financial analyst',
  'junior',
];

const VISA_KEYWORDS = [
  'visa sponsorship',
  'visa sponsor',
  'work permit',
  'work authorization',
  'relocation support',
  'relocation package',
  'relocation assistance',
  'willing to relocate',
  'help with relocation',
];

const RELOCATION_KEYWORDS = ['relocation', 'relocate', 'moving assistance', 'moving package'];

// Spanish and Catalan marker words
const NON_ENGLISH_PATTERNS = [
  /\bsomos\b/i,
  /\bbuscamos\b/i,
  /\bempresa\b/i,
  /\btrabajo\b/i,
  /\bexperiencia\b/i,
  /\brequisitos\b/i,
  /\bresponsabilidades\b/i,
  /\bofrecemos\b/i,
  /\bcientífico de datos(?![\p{L}])/iu,
  /\bingeniero\b/i,
  /\banalista\b/i,
  /\bcerquem\b/i,
  /\bfeina\b/i,
];

export const NON_ENGLISH_THRESHOLD = 3;

const REMOTE_PATTERN = /\b(remote|remoto|work from home|wfh|anywhere|distributed)\b/i;
const HYBRID_PATTERN = /\b(hybrid|híbrido|hibrido|flexible working|\d\s*days? (in|at) (the )?office)\b/i;
const ONSITE_PATTERN = /\b(on-?site|in-office|office-based|presencial)\b/i;

export type WorkType = 'remote' | 'hybrid' | 'onsite' | 'unknown';

export type VisaStatus = 'yes' | 'maybe' | 'likely' | 'unknown';

export const VISA_STATUS_LABELS: Record<VisaStatus, string> = {
  yes: 'Yes (job posting)',
  maybe: 'Maybe (relocation mentioned)',
  likely: 'Likely (company sponsors)',
  unknown: 'Unknown',
};

export function isTargetLocation(location: string | undefined | null, title: string, description: string): boolean {
  const text = `${location ?? ''} ${title} ${description}`;
  return TARGET_LOCATION_PATTERNS.some(pattern => pattern.test(text));
}

export function isTargetRole(title: string, description: string): boolean {
  const text = `${title} ${description}`.toLowerCase();
  return ROLE_KEYWORDS.some(keyword => text.includes(keyword));
}

export function countNonEnglishMarkers(text: string): number {
  return NON_ENGLISH_PATTERNS.filter(pattern => pattern.test(text)).length;
}

export function isEnglishPosting(title: string, description: string): boolean {
  return countNonEnglishMarkers(`${title} ${description}`) < NON_ENGLISH_THRESHOLD;
}

export function detectVisaMentions(description: string): { mentionsVisaSupport: boolean; mentionsRelocation: boolean } {
  const text = description.toLowerCase();
  return {
    mentionsVisaSupport: VISA_KEYWORDS.some(keyword => text.includes(keyword)),
    mentionsRelocation: RELOCATION_KEYWORDS.some(keyword => text.includes(keyword)),
  };
}

/** Stricter than isTargetRole: core DS/ML/AI titles, with non-core titles excluded. */
export function isGreatFit(title: string, description = ''): boolean {
  const titleLower = title.toLowerCase();

  if (GREAT_FIT_EXCLUSIONS.some(exclusion => titleLower.includes(exclusion))) return false;
  if (GREAT_FIT_KEYWORDS.some(keyword => titleLower.includes(keyword))) return true;

  const descLower = description.toLowerCase();
  return GREAT_FIT_DESCRIPTION_SIGNALS.some(signal => descLower.includes(signal));
}

export function classifyPosting(posting: {
  title: string;
  description: string;
  location?: string | null;
}): ClassificationFlags {
  return {
    isTargetLocation: isTargetLocation(posting.location, posting.title, posting.description),
    isTargetRole: isTargetRole(posting.title, posting.description),
    ...detectVisaMentions(posting.description),
  };
}

/** A candidate is forwarded to the store only when both predicates hold. */
export function isMatch(flags: ClassificationFlags): boolean {
  return flags.isTargetLocation && flags.isTargetRole;
}

/**
 * Remote is decided first, then hybrid overrides it; on-site only applies
 * when neither matched.
 */
export function classifyWorkType(text: string): WorkType {
  let workType: WorkType = 'unknown';
  if (REMOTE_PATTERN.test(text)) workType = 'remote';
  if (HYBRID_PATTERN.test(text)) workType = 'hybrid';
  if (workType === 'unknown' && ONSITE_PATTERN.test(text)) workType = 'onsite';
  return workType;
}

export function visaStatus(
  flags: Pick<ClassificationFlags, 'mentionsVisaSupport' | 'mentionsRelocation'>,
  knownVisaSponsor: boolean,
): VisaStatus {
  if (flags.mentionsVisaSupport) return 'yes';
  if (flags.mentionsRelocation) return 'maybe';
  if (knownVisaSponsor) return 'likely';
  return 'unknown';
}

/** Read-time location check on the persisted location text. */
export function isTargetLocationText(location: string | null | undefined): boolean {
  const loc = (location ?? '').toLowerCase();
  return loc.includes('barcelona') || loc.includes('spain') || loc.includes('bcn');
}
