/**
 * Content guard Unit Tests
 */

import { describe, it, expect } from '@jest/globals';

import { checkDraftContent, hostOf } from '../../../src/workflow/content-guard';

describe('checkDraftContent', () => {
  it('should pass plain prose', () => {
    expect(checkDraftContent('Dear hiring team, I would like to apply.')).toEqual({ flags: [], externalHosts: [] });
  });

  it('should flag contact details in a fixed order', () => {
    const check = checkDraftContent('Call 555-123-4567 or mail applicant@example.org');

    expect(check.flags).toEqual(['pii_email', 'pii_phone']);
  });

  it('should flag national id and card numbers', () => {
    expect(checkDraftContent('SSN 123-45-6789').flags).toEqual(['pii_national_id']);
    expect(checkDraftContent('Card 4111 1111 1111 1111').flags).toEqual(['pii_card_number']);
  });

  it('should allow links to an allowed host and its subdomains', () => {
    const check = checkDraftContent(
      'See https://www.example.com/job and https://careers.example.com/apply',
      ['example.com']
    );

    expect(check).toEqual({ flags: [], externalHosts: [] });
  });

  it('should list each external host once', () => {
    const check = checkDraftContent(
      'https://portfolio.example.net/a https://PORTFOLIO.example.net/b https://jobs.example.com/x',
      ['jobs.example.com']
    );

    expect(check.flags).toEqual(['external_link']);
    expect(check.externalHosts).toEqual(['portfolio.example.net']);
  });
});

describe('hostOf', () => {
  it('should strip www and lowercase the host', () => {
    expect(hostOf('https://WWW.Example.com/path?q=1')).toBe('example.com');
  });

  it('should return undefined for a missing or malformed url', () => {
    expect(hostOf(undefined)).toBeUndefined();
    expect(hostOf('not a url')).toBeUndefined();
  });
});
