import { parse } from 'node-html-parser';

/** HTML fragment → plain text with block elements on their own lines. */
export function htmlToText(html: string): string {
  if (!html) return '';
  // Escaped markup (Greenhouse content) is decoded once before tags are handled
  const source = /&lt;\w/.test(html) ? parse(html).text : html;
  const withBreaks = source
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|h[1-6]|tr)>/gi, '\n')
    .replace(/<li[^>]*>/gi, '- ');
  return cleanWhitespace(parse(withBreaks).text);
}

export function cleanWhitespace(text: string): string {
  return text
    .replace(/[ \t\u00a0]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function collapseSpaces(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

const TRACKING_PARAM = /^(utm_\w+|gh_src|src|ref|referrer|source|trk)$/i;

/**
 * Application URL with scheme added when missing, tracking parameters and
 * fragment removed. Other query parameters (job ids such as `gh_jid`) stay.
 * Returns undefined for empty input.
 */
export function canonicalUrl(raw: string | undefined | null, base?: string): string | undefined {
  let url = (raw ?? '').trim();
  if (!url) return undefined;
  if (url.startsWith('//')) {
    url = `https:${url}`;
  } else if (url.startsWith('/') && base) {
    url = `${base.replace(/\/$/, '')}${url}`;
  } else if (!/^https?:\/\//i.test(url)) {
    url = `https://${url}`;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url.replace(/#.*$/, '');
  }
  parsed.hash = '';
  const tracking = [...parsed.searchParams.keys()].filter(key => TRACKING_PARAM.test(key));
  for (const key of tracking) parsed.searchParams.delete(key);
  return parsed.toString();
}
