import { format, isValid, parse, subDays } from 'date-fns';

const DAY_FORMAT = 'yyyy-MM-dd';

export function formatDay(date: Date): string {
  return format(date, DAY_FORMAT);
}

/** "2026-01-13T10:00:00Z" → "2026-01-13"; anything else → undefined. */
export function isoDayPrefix(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const match = value.match(/^(\d{4}-\d{2}-\d{2})/);
  if (!match) return undefined;
  return isValid(parse(match[1], DAY_FORMAT, new Date())) ? match[1] : undefined;
}

export function dayFromEpochMs(value: unknown): string | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) return undefined;
  const date = new Date(value);
  return isValid(date) ? formatDay(date) : undefined;
}

/** Tries each date-fns pattern in turn ("January 13, 2026" with 'MMMM d, yyyy'). */
export function parseDay(text: string | undefined | null, patterns: string[]): string | undefined {
  const trimmed = (text ?? '').trim();
  if (!trimmed) return undefined;
  for (const pattern of patterns) {
    const parsed = parse(trimmed, pattern, new Date());
    if (isValid(parsed)) return formatDay(parsed);
  }
  return undefined;
}

/**
 * Workday-style relative dates: "Posted Today", "Posted Yesterday",
 * "Posted 3 Days Ago". Open-ended values such as "Posted 30+ Days Ago" are unknown.
 */
export function parseRelativeDay(text: string | undefined | null, now: Date = new Date()): string | undefined {
  const lower = (text ?? '').toLowerCase();
  if (!lower) return undefined;
  if (lower.includes('+')) return undefined;
  if (lower.includes('today')) return formatDay(now);
  if (lower.includes('yesterday')) return formatDay(subDays(now, 1));
  const match = lower.match(/(\d+)\s*days?\s*ago/);
  if (match) return formatDay(subDays(now, parseInt(match[1], 10)));
  return undefined;
}
