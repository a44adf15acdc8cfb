import { describe, it, expect, jest } from '@jest/globals';

import { TransientError, ValidationError } from '@pipeline/core';
import { NullLogger, userProfile } from '@pipeline/test-utils';
import { HttpGeneratorClient } from '../../../src/adapters/http-generator-client';
import { opportunityFixture } from './fixtures';

const URL = 'http://generator.test/drafts';

function createClient(response: () => Promise<Response>) {
  const fetchImpl = jest.fn<typeof fetch>().mockImplementation(() => response());
  const client = new HttpGeneratorClient(
    { url: URL, headers: { Authorization: 'Bearer test-secret' } },
    { logger: new NullLogger(), fetchImpl }
  );
  return { client, fetchImpl };
}

const constraints = { applicationId: 'app_1', attempt: 2 };

describe('HttpGeneratorClient', () => {
  it('should POST the profile, listing and constraints', async () => {
    const { client, fetchImpl } = createClient(async () =>
      Response.json({ content: 'Dear team', qualityScore: 0.85 })
    );

    const draft = await client.generate(userProfile().build(), opportunityFixture(), constraints);

    expect(draft).toEqual({ content: 'Dear team', qualityScore: 0.85 });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(URL);
    expect(init?.method).toBe('POST');
    const headers = new Headers(init?.headers);
    expect(headers.get('Content-Type')).toBe('application/json');
    expect(headers.get('Authorization')).toBe('Bearer test-secret');
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      profile: { userId: 'user-1' },
      opportunity: { id: 'opp_fixture', title: 'Backend Engineer', organization: 'Example Labs' },
      constraints: { applicationId: 'app_1', attempt: 2 },
    });
  });

  it('should raise a transient error for a 503', async () => {
    const { client } = createClient(async () => new Response('overloaded', { status: 503 }));

    const result = client.generate(userProfile().build(), opportunityFixture(), constraints);

    await expect(result).rejects.toBeInstanceOf(TransientError);
    await expect(result).rejects.toThrow('Generation failed with HTTP 503');
  });

  it('should raise a permanent error for a 400', async () => {
    const { client } = createClient(async () => new Response('bad prompt', { status: 400 }));

    await expect(client.generate(userProfile().build(), opportunityFixture(), constraints)).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('should raise a transient error when the request cannot be sent', async () => {
    const { client } = createClient(() => Promise.reject(new Error('ECONNRESET')));

    await expect(client.generate(userProfile().build(), opportunityFixture(), constraints)).rejects.toThrow(
      'Generation request failed: ECONNRESET'
    );
  });

  it('should reject a response outside the draft shape', async () => {
    const { client } = createClient(async () => Response.json({ content: 'Dear team', qualityScore: 1.5 }));

    await expect(client.generate(userProfile().build(), opportunityFixture(), constraints)).rejects.toThrow(
      'Invalid generator response'
    );
  });
});
