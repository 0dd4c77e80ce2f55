import { createHash } from 'crypto';

export const IDENTITY_KEY_LENGTH = 16;

/**
 * Deterministic primary key for a posting: the first 16 hex characters of
 * sha256("companyId:url"). Same company and URL always give the same key.
 */
export function identityKey(companyId: string, url: string): string {
  if (!companyId || !url) {
    throw new Error('identityKey requires a company id and a url');
  }
  return createHash('sha256').update(`${companyId}:${url}`).digest('hex').slice(0, IDENTITY_KEY_LENGTH);
}
