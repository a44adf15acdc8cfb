/**
 * Feature Extraction Unit Tests
 */

import { describe, it, expect } from '@jest/globals';

import { DAY_MS } from '@pipeline/core';
import {
  compensationFit,
  cosineSimilarity,
  deadlineUrgency,
  experienceMatch,
  prestige,
  skillMatch,
  tokenize,
} from '../../../src/scoring/features';

describe('tokenize', () => {
  it('should drop short words and stop words', () => {
    expect(tokenize('Build the APIs for our team')).toEqual(['build', 'apis', 'team']);
  });
});

describe('cosineSimilarity', () => {
  it('should be 0 when either side is empty', () => {
    expect(cosineSimilarity([], ['redis'])).toBe(0);
  });

  it('should be 1 for identical token bags', () => {
    expect(cosineSimilarity(['redis', 'node'], ['node', 'redis'])).toBeCloseTo(1, 10);
  });
});

describe('skillMatch', () => {
  it('should be 1 when nothing is required', () => {
    expect(skillMatch([], ['typescript'])).toBe(1);
  });

  it('should penalize missing skills', () => {
    expect(skillMatch(['typescript', 'go'], ['TypeScript'])).toBeCloseTo(0.4, 10);
  });

  it('should give half credit for substring matches', () => {
    expect(skillMatch(['react'], ['react native'])).toBe(0.5);
  });

  it('should never go below 0', () => {
    expect(skillMatch(['go', 'rust'], [])).toBe(0);
  });
});

describe('experienceMatch', () => {
  it('should combine years and role overlap', () => {
    expect(experienceMatch(5, 4, 'Backend Engineer', ['Backend Engineer'])).toBeCloseTo(0.86, 10);
  });

  it('should be 1 with no requirement and no past roles', () => {
    expect(experienceMatch(undefined, 0, 'Analyst', [])).toBeCloseTo(1, 10);
  });
});

describe('deadlineUrgency', () => {
  const discoveredAt = 1_000_000;

  it.each([
    [undefined, 0.3],
    [discoveredAt + 2 * DAY_MS, 1],
    [discoveredAt + 5 * DAY_MS, 0.9],
    [discoveredAt + 10 * DAY_MS, 0.7],
    [discoveredAt + 20 * DAY_MS, 0.5],
    [discoveredAt + 45 * DAY_MS, 0.3],
    [discoveredAt - 1, 0],
  ])('deadline %p scores %p', (deadline, expected) => {
    expect(deadlineUrgency(deadline, discoveredAt)).toBe(expected);
  });
});

describe('prestige', () => {
  it('should score known organizations, programs and everything else', () => {
    expect(prestige('Google DeepMind')).toBe(0.95);
    expect(prestige('Y Combinator')).toBe(0.9);
    expect(prestige('Example Labs')).toBe(0.5);
  });

  it('should match whole words only', () => {
    expect(prestige('Metal Works')).toBe(0.5);
  });
});

describe('compensationFit', () => {
  it.each([
    [120, 100, 1],
    [100, 100, 0.8],
    [95, 100, 0.5],
    [50, 100, 0.3],
    [undefined, 100, 0.5],
  ])('max %p against min %p scores %p', (max, min, expected) => {
    expect(compensationFit(max, min)).toBe(expected);
  });
});
