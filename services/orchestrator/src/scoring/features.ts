/**
 * Feature extraction for fit scoring.
 *
 * Every function is pure and returns a value in [0, 1]. Nothing here reads
 * the wall clock: urgency is measured from the opportunity's discovery time.
 */

import { DAY_MS } from '@pipeline/core';
import type { FeatureVector, Opportunity, UserProfile } from '@pipeline/types';
import { normalizeText } from '../opportunities/fingerprint';
import prestigeData from './prestige.json';

const STOP_WORDS = new Set([
  'and', 'the', 'for', 'with', 'our', 'you', 'your', 'are', 'from', 'this', 'that', 'will',
  'have', 'has', 'into', 'their', 'who', 'all', 'can', 'not', 'but', 'its', 'about', 'more',
]);

/** Neutral value for features with nothing to compare */
const NEUTRAL = 0.5;

export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(' ')
    .filter(token => token.length > 2 && !STOP_WORDS.has(token));
}

function termFrequencies(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * Cosine similarity of the two texts' term-frequency vectors.
 */
export function cosineSimilarity(a: string[], b: string[]): number {
  const left = termFrequencies(a);
  const right = termFrequencies(b);
  let dot = 0;
  for (const [term, count] of left) {
    dot += count * (right.get(term) ?? 0);
  }
  const norm = (v: Map<string, number>): number => Math.sqrt([...v.values()].reduce((sum, c) => sum + c * c, 0));
  const denominator = norm(left) * norm(right);
  return denominator === 0 ? 0 : dot / denominator;
}

export function semanticSimilarity(profile: UserProfile, opportunity: Opportunity): number {
  const profileTokens = tokenize(
    [...profile.interests, profile.careerGoals ?? '', ...profile.skills, ...profile.pastRoles].join(' ')
  );
  const fields = opportunity.rawFields;
  const opportunityTokens = tokenize([fields.title, fields.description ?? '', ...fields.tags].join(' '));

  if (profileTokens.length === 0 || opportunityTokens.length === 0) {
    return NEUTRAL;
  }
  return cosineSimilarity(profileTokens, opportunityTokens);
}

/**
 * Exact matches count fully, substring matches half; each missing skill
 * costs 0.2 / required.
 */
export function skillMatch(requiredSkills: string[], profileSkills: string[]): number {
  if (requiredSkills.length === 0) return 1;

  const required = requiredSkills.map(s => s.toLowerCase().trim());
  const owned = profileSkills.map(s => s.toLowerCase().trim()).filter(Boolean);

  let exact = 0;
  let partial = 0;
  for (const skill of required) {
    if (owned.includes(skill)) {
      exact++;
    } else if (owned.some(have => have.includes(skill) || skill.includes(have))) {
      partial++;
    }
  }

  const n = required.length;
  const missing = n - exact - partial;
  const score = exact / n + (partial / n) * 0.5 - (missing * 0.2) / n;
  return Math.max(0, Math.min(1, score));
}

/**
 * 70% years of experience against the requirement, 30% overlap between the
 * title and past role names.
 */
export function experienceMatch(
  requiredYears: number | undefined,
  profileYears: number,
  title: string,
  pastRoles: string[]
): number {
  let yearsScore = 1;
  if (requiredYears !== undefined && requiredYears > 0) {
    if (profileYears >= requiredYears) yearsScore = 1;
    else if (profileYears >= requiredYears * 0.7) yearsScore = 0.8;
    else if (profileYears >= requiredYears * 0.5) yearsScore = 0.5;
    else yearsScore = 0.3;
  }

  let roleScore = 1;
  const keywords = normalizeText(title).split(' ').filter(word => word.length > 2);
  if (keywords.length > 0 && pastRoles.length > 0) {
    const roles = pastRoles.map(role => role.toLowerCase());
    let matches = 0;
    for (const role of roles) {
      for (const keyword of keywords) {
        if (role.includes(keyword)) matches++;
      }
    }
    roleScore = Math.min(1, matches / keywords.length);
  }

  return yearsScore * 0.7 + roleScore * 0.3;
}

/**
 * Closer deadlines score higher. Days are whole days between discovery and
 * deadline; a deadline already passed at discovery scores 0.
 */
export function deadlineUrgency(deadline: number | undefined, discoveredAt: number): number {
  if (deadline === undefined) return 0.3;

  const days = Math.floor((deadline - discoveredAt) / DAY_MS);
  if (days < 0) return 0;
  if (days <= 3) return 1;
  if (days <= 7) return 0.9;
  if (days <= 14) return 0.7;
  if (days <= 30) return 0.5;
  return 0.3;
}

export function historicalSuccessRate(profile: UserProfile, opportunity: Opportunity): number {
  return profile.successRates?.[opportunity.rawFields.opportunityType] ?? NEUTRAL;
}

function containsPhrase(haystack: string, phrase: string): boolean {
  return ` ${haystack} `.includes(` ${normalizeText(phrase)} `);
}

export function prestige(organization: string): number {
  const normalized = normalizeText(organization);
  if (prestigeData.organizations.some(name => containsPhrase(normalized, name))) {
    return prestigeData.scores.organization;
  }
  if (prestigeData.programs.some(name => containsPhrase(normalized, name))) {
    return prestigeData.scores.program;
  }
  return prestigeData.scores.default;
}

export function compensationFit(compensationMax: number | undefined, minCompensation: number | undefined): number {
  if (compensationMax === undefined || minCompensation === undefined) return NEUTRAL;

  if (compensationMax >= minCompensation * 1.2) return 1;
  if (compensationMax >= minCompensation) return 0.8;
  if (compensationMax >= minCompensation * 0.9) return 0.5;
  return 0.3;
}

export function computeFeatures(profile: UserProfile, opportunity: Opportunity): FeatureVector {
  const fields = opportunity.rawFields;
  return {
    semanticSimilarity: semanticSimilarity(profile, opportunity),
    skillMatch: skillMatch(fields.requiredSkills, profile.skills),
    experienceMatch: experienceMatch(fields.experienceYears, profile.experienceYears, fields.title, profile.pastRoles),
    deadlineUrgency: deadlineUrgency(fields.deadline, opportunity.discoveredAt),
    historicalSuccessRate: historicalSuccessRate(profile, opportunity),
    prestige: prestige(fields.organization),
    compensationFit: compensationFit(fields.compensationMax, profile.minCompensation),
  };
}
