/**
 * Opportunity fingerprinting.
 *
 * Two listings describe the same opportunity when their normalized title,
 * normalized organization and canonical URL agree. Listings without a URL
 * fall back to a shingle of the description, so reposts with reordered
 * whitespace or punctuation still collide.
 */

import { createHash } from 'crypto';

/** Query parameters that identify the referrer, never the listing */
const TRACKING_PARAM = /^(utm_.+|ref|source)$/i;

const SHINGLE_SIZE = 3;
const MAX_SHINGLES = 8;

/**
 * Lower-case, strip combining marks, collapse every run of characters that
 * are neither letters nor digits (in any script) to one space.
 */
export function normalizeText(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

/**
 * Canonical form of a listing URL: lower-cased host without `www.`, no
 * fragment, no tracking parameters, no trailing slash. Unparseable input is
 * returned trimmed and lower-cased.
 *
 * @example
 * canonicalizeUrl('https://WWW.Example.com/jobs/42/?utm_source=x#apply');
 * // 'https://example.com/jobs/42'
 */
export function canonicalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return url.trim().toLowerCase();
  }

  const host = parsed.hostname.toLowerCase().replace(/^www\./, '');
  const params = [...parsed.searchParams.entries()]
    .filter(([key]) => !TRACKING_PARAM.test(key))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const query = params.length > 0 ? `?${new URLSearchParams(params).toString()}` : '';
  const path = parsed.pathname.replace(/\/+$/, '');
  const port = parsed.port ? `:${parsed.port}` : '';

  return `${parsed.protocol}//${host}${port}${path}${query}`;
}

/**
 * Sorted distinct word 3-shingles of the description, first 8 joined by `|`.
 * Descriptions shorter than one shingle yield their normalized text.
 */
export function descriptionShingle(description: string): string {
  const words = normalizeText(description).split(' ').filter(Boolean);
  if (words.length < SHINGLE_SIZE) {
    return words.join(' ');
  }

  const shingles = new Set<string>();
  for (let i = 0; i + SHINGLE_SIZE <= words.length; i++) {
    shingles.add(words.slice(i, i + SHINGLE_SIZE).join(' '));
  }
  return [...shingles].sort().slice(0, MAX_SHINGLES).join('|');
}

export interface FingerprintInput {
  title: string;
  organization: string;
  url?: string;
  description?: string;
}

export function computeFingerprint(input: FingerprintInput): string {
  const locator = input.url
    ? `url:${canonicalizeUrl(input.url)}`
    : `desc:${descriptionShingle(input.description ?? '')}`;

  return createHash('sha256')
    .update([normalizeText(input.title), normalizeText(input.organization), locator].join('\n'))
    .digest('hex');
}
