import { describe, it, expect } from '@jest/globals';

import { userProfile } from '@pipeline/test-utils';
import { TemplateGenerator } from '../../../src/adapters/template-generator';
import { opportunityFixture } from './fixtures';

describe('TemplateGenerator', () => {
  const generator = new TemplateGenerator();

  it('should fill the letter from the profile and listing', async () => {
    const draft = await generator.generate(
      userProfile().build(),
      opportunityFixture({ requiredSkills: ['typescript', 'redis', 'kubernetes'] }),
      { applicationId: 'app_1', attempt: 1 }
    );

    expect(draft.content).toBe(
      [
        'Dear Example Labs team,',
        '',
        'I am applying for Backend Engineer.',
        'My background includes Software Engineer.',
        'I bring hands-on experience with typescript, redis.',
        '',
        'Thank you for your consideration.',
      ].join('\n')
    );
    expect(draft.qualityScore).toBe(0.77);
  });

  it('should score a listing without required skills at the midpoint', async () => {
    const draft = await generator.generate(userProfile().build(), opportunityFixture({ requiredSkills: [] }), {
      applicationId: 'app_1',
      attempt: 1,
    });

    expect(draft.qualityScore).toBe(0.7);
  });

  it('should cut the draft to the word limit', async () => {
    const draft = await generator.generate(userProfile().build(), opportunityFixture(), {
      applicationId: 'app_1',
      attempt: 1,
      maxWords: 5,
    });

    expect(draft.content).toBe('Dear Example Labs team, I');
  });
});
