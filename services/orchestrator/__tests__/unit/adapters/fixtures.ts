import type { ApplicationPackage, Opportunity, OpportunityFields } from '@pipeline/types';

export function opportunityFixture(fields: Partial<OpportunityFields> = {}): Opportunity {
  return {
    id: 'opp_fixture',
    fingerprint: 'fp_fixture',
    source: 'test-board',
    rawFields: {
      title: 'Backend Engineer',
      organization: 'Example Labs',
      url: 'https://jobs.example.com/backend-engineer',
      opportunityType: 'job',
      tags: [],
      requiredSkills: ['typescript', 'redis'],
      sources: ['test-board'],
      ...fields,
    },
    discoveredAt: 1000,
    updatedAt: 1000,
  };
}

export const PACKAGE: ApplicationPackage = {
  applicationId: 'app_1',
  userId: 'user-1',
  opportunityId: 'opp_fixture',
  title: 'Backend Engineer',
  organization: 'Example Labs',
  content: 'Dear hiring team, I would like to apply.',
};
