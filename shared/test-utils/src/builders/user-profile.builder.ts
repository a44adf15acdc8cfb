/**
 * Test Data Builder for UserProfile
 */

import type { OpportunityType, UserProfile } from '@pipeline/types';

export class UserProfileBuilder {
  private profile: UserProfile = {
    userId: 'user-1',
    skills: ['typescript', 'redis'],
    experienceYears: 4,
    pastRoles: ['Software Engineer'],
    interests: ['backend'],
  };

  withUserId(userId: string): this {
    this.profile.userId = userId;
    return this;
  }

  withSkills(...skills: string[]): this {
    this.profile.skills = skills;
    return this;
  }

  withExperienceYears(years: number): this {
    this.profile.experienceYears = years;
    return this;
  }

  withInterests(...interests: string[]): this {
    this.profile.interests = interests;
    return this;
  }

  withCareerGoals(goals: string): this {
    this.profile.careerGoals = goals;
    return this;
  }

  withMinCompensation(amount: number): this {
    this.profile.minCompensation = amount;
    return this;
  }

  withSuccessRate(type: OpportunityType, rate: number): this {
    this.profile.successRates = { ...this.profile.successRates, [type]: rate };
    return this;
  }

  build(): UserProfile {
    return {
      ...this.profile,
      skills: [...this.profile.skills],
      pastRoles: [...this.profile.pastRoles],
      interests: [...this.profile.interests],
      successRates: this.profile.successRates ? { ...this.profile.successRates } : undefined,
    };
  }
}

export function userProfile(): UserProfileBuilder {
  return new UserProfileBuilder();
}
