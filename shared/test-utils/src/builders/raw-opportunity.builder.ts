/**
 * Test Data Builder for RawOpportunity
 */

import type { OpportunityType, RawOpportunity } from '@pipeline/types';

export class RawOpportunityBuilder {
  private raw: RawOpportunity = {
    source: 'test-board',
    title: 'Backend Engineer',
    organization: 'Example Labs',
    url: 'https://jobs.example.com/backend-engineer',
    description: 'Build services in TypeScript.',
    opportunityType: 'job',
    tags: [],
    requiredSkills: ['typescript', 'redis'],
  };

  withSource(source: string): this {
    this.raw.source = source;
    return this;
  }

  withTitle(title: string): this {
    this.raw.title = title;
    return this;
  }

  withOrganization(organization: string): this {
    this.raw.organization = organization;
    return this;
  }

  withUrl(url: string | undefined): this {
    this.raw.url = url;
    return this;
  }

  withDescription(description: string | undefined): this {
    this.raw.description = description;
    return this;
  }

  withType(opportunityType: OpportunityType): this {
    this.raw.opportunityType = opportunityType;
    return this;
  }

  withDeadline(deadline: number | undefined): this {
    this.raw.deadline = deadline;
    return this;
  }

  withRequiredSkills(...skills: string[]): this {
    this.raw.requiredSkills = skills;
    return this;
  }

  withTags(...tags: string[]): this {
    this.raw.tags = tags;
    return this;
  }

  withExperienceYears(years: number): this {
    this.raw.experienceYears = years;
    return this;
  }

  withCompensationMax(amount: number): this {
    this.raw.compensationMax = amount;
    return this;
  }

  withPlatform(platform: string): this {
    this.raw.platform = platform;
    return this;
  }

  discoveredAt(at: number): this {
    this.raw.discoveredAt = at;
    return this;
  }

  build(): RawOpportunity {
    return {
      ...this.raw,
      tags: this.raw.tags ? [...this.raw.tags] : undefined,
      requiredSkills: this.raw.requiredSkills ? [...this.raw.requiredSkills] : undefined,
    };
  }

  /** Distinct listings: each gets its own title and URL */
  buildMany(count: number): RawOpportunity[] {
    return Array.from({ length: count }, (_, i) => ({
      ...this.build(),
      title: `${this.raw.title} ${i + 1}`,
      url: `https://jobs.example.com/listing-${i + 1}`,
    }));
  }
}

export function rawOpportunity(): RawOpportunityBuilder {
  return new RawOpportunityBuilder();
}
