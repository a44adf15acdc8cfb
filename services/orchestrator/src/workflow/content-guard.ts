/**
 * Draft content guard.
 *
 * Flags drafts that carry personal data (email addresses, phone, national
 * id or card numbers) or links to hosts other than the listing's own. A
 * flagged draft is never auto-approved: it waits for a reviewer with the
 * flags recorded as the reason.
 */

export type ContentFlag = 'pii_email' | 'pii_phone' | 'pii_national_id' | 'pii_card_number' | 'external_link';

export interface ContentCheck {
  flags: ContentFlag[];
  /** Hosts of the external links found */
  externalHosts: string[];
}

const PII_PATTERNS: ReadonlyArray<readonly [ContentFlag, RegExp]> = [
  ['pii_email', /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/],
  ['pii_phone', /\b(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/],
  ['pii_national_id', /\b\d{3}-\d{2}-\d{4}\b/],
  ['pii_card_number', /\b(?:\d{4}[-\s]?){3}\d{4}\b/],
];

const LINK_PATTERN = /https?:\/\/([a-z0-9-]+(?:\.[a-z0-9-]+)+)/gi;

function bareHost(host: string): string {
  return host.toLowerCase().replace(/^www\./, '');
}

function isAllowed(host: string, allowed: string[]): boolean {
  return allowed.some(candidate => host === candidate || host.endsWith(`.${candidate}`));
}

/** Host of `url` without `www.`, or undefined when it does not parse. */
export function hostOf(url: string | undefined): string | undefined {
  if (!url) return undefined;
  try {
    return bareHost(new URL(url).hostname);
  } catch {
    return undefined;
  }
}

export function checkDraftContent(content: string, allowedHosts: string[] = []): ContentCheck {
  const flags: ContentFlag[] = [];
  for (const [flag, pattern] of PII_PATTERNS) {
    if (pattern.test(content)) flags.push(flag);
  }

  const allowed = allowedHosts.map(bareHost);
  const externalHosts: string[] = [];
  for (const match of content.matchAll(LINK_PATTERN)) {
    const host = bareHost(match[1]);
    if (!isAllowed(host, allowed) && !externalHosts.includes(host)) {
      externalHosts.push(host);
    }
  }
  if (externalHosts.length > 0) flags.push('external_link');

  return { flags, externalHosts };
}
