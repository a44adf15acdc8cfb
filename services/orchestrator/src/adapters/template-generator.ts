/**
 * Local generator used when no GENERATOR_URL is configured.
 *
 * Fills a plain cover-letter template from the profile and the listing. The
 * quality score reflects how many of the listing's required skills the draft
 * can claim, so thin matches land in review rather than auto-approval.
 */

import type {
  GeneratedDraft,
  GenerationConstraints,
  Generator,
  Opportunity,
  UserProfile,
} from '@pipeline/types';

const BASE_QUALITY = 0.5;
const SKILL_QUALITY_SPAN = 0.4;

export class TemplateGenerator implements Generator {
  async generate(
    profile: UserProfile,
    opportunity: Opportunity,
    constraints: GenerationConstraints
  ): Promise<GeneratedDraft> {
    const { title, organization, requiredSkills } = opportunity.rawFields;
    const owned = new Set(profile.skills.map(skill => skill.toLowerCase()));
    const matched = requiredSkills.filter(skill => owned.has(skill.toLowerCase()));

    const lines = [
      `Dear ${organization} team,`,
      '',
      `I am applying for ${title}.`,
    ];
    if (profile.pastRoles.length > 0) {
      lines.push(`My background includes ${profile.pastRoles.join(', ')}.`);
    }
    if (matched.length > 0) {
      lines.push(`I bring hands-on experience with ${matched.join(', ')}.`);
    }
    if (profile.careerGoals) {
      lines.push(profile.careerGoals);
    }
    lines.push('', 'Thank you for your consideration.');

    let content = lines.join('\n');
    if (constraints.maxWords !== undefined) {
      content = content.split(/\s+/).slice(0, constraints.maxWords).join(' ');
    }

    const coverage = requiredSkills.length === 0 ? 0.5 : matched.length / requiredSkills.length;
    const qualityScore = Math.round((BASE_QUALITY + SKILL_QUALITY_SPAN * coverage) * 100) / 100;
    return { content, qualityScore };
  }
}
