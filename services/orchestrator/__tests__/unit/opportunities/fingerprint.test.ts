/**
 * Fingerprint Unit Tests
 */

import { describe, it, expect } from '@jest/globals';

import {
  canonicalizeUrl,
  computeFingerprint,
  descriptionShingle,
  normalizeText,
} from '../../../src/opportunities/fingerprint';

describe('normalizeText', () => {
  it('should lower-case, strip accents and collapse punctuation', () => {
    expect(normalizeText('Café  Engineer!!')).toBe('cafe engineer');
  });

  it('should keep letters and digits of non-Latin scripts', () => {
    expect(normalizeText('Инженер-Программист')).toBe('инженер программист');
    expect(normalizeText('東京 オフィス, 2024')).toBe('東京 オフィス 2024');
  });
});

describe('canonicalizeUrl', () => {
  it('should drop www, fragment, tracking parameters and trailing slash', () => {
    expect(canonicalizeUrl('https://WWW.Example.com/jobs/42/?utm_source=x#apply')).toBe('https://example.com/jobs/42');
  });

  it('should keep other parameters in sorted order', () => {
    expect(canonicalizeUrl('https://example.com/p?b=2&ref=feed&a=1')).toBe('https://example.com/p?a=1&b=2');
  });

  it('should fall back to trimmed lower-case text for unparseable input', () => {
    expect(canonicalizeUrl('  Not A Url ')).toBe('not a url');
  });
});

describe('descriptionShingle', () => {
  it('should return normalized text when shorter than one shingle', () => {
    expect(descriptionShingle('Remote, Role')).toBe('remote role');
  });

  it('should join sorted distinct 3-shingles', () => {
    expect(descriptionShingle('one two three four')).toBe('one two three|two three four');
  });
});

describe('computeFingerprint', () => {
  const base = {
    title: 'Backend Engineer',
    organization: 'Example Labs',
    url: 'https://example.com/jobs/42',
  };

  it('should match listings that differ only in case, punctuation and tracking', () => {
    const repost = {
      title: 'backend engineer!',
      organization: 'EXAMPLE LABS',
      url: 'https://www.example.com/jobs/42/?utm_campaign=spring',
    };
    expect(computeFingerprint(repost)).toBe(computeFingerprint(base));
  });

  it('should differ when the organization differs', () => {
    expect(computeFingerprint({ ...base, organization: 'Other Labs' })).not.toBe(computeFingerprint(base));
  });

  it('should use the description when there is no url', () => {
    const a = { title: 'Grant', organization: 'Fund', description: 'Funding for open source maintainers.' };
    const b = { title: 'Grant', organization: 'Fund', description: 'funding  for open-source maintainers' };
    expect(computeFingerprint(a)).toBe(computeFingerprint(b));
    expect(computeFingerprint(a)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should separate distinct non-Latin listings without a url', () => {
    const engineer = {
      title: 'Инженер-программист',
      organization: 'Северная Лаборатория',
      description: 'Разработка серверных сервисов на TypeScript',
    };
    const sales = {
      title: 'Менеджер по продажам',
      organization: 'Южный Банк',
      description: 'Работа с корпоративными клиентами и договорами',
    };
    expect(computeFingerprint(engineer)).not.toBe(computeFingerprint(sales));
  });
});
