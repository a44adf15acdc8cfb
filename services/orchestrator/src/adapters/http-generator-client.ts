/**
 * Generator backed by an HTTP service.
 *
 * POSTs `{ profile, opportunity, constraints }` as JSON and expects
 * `{ content, qualityScore }` back. The orchestrator owns timeouts and
 * retries; this client only classifies failures.
 */

import { z } from 'zod';
import type { ILogger } from '@pipeline/core';
import type {
  GeneratedDraft,
  GenerationConstraints,
  Generator,
  Opportunity,
  UserProfile,
} from '@pipeline/types';
import { parsePayload } from '../validation';
import { errorForStatus, networkError, readBody } from './http-errors';

const GeneratedDraftSchema = z.object({
  content: z.string().min(1),
  qualityScore: z.number().min(0).max(1),
});

export interface HttpGeneratorClientConfig {
  url: string;
  headers?: Record<string, string>;
}

export interface HttpGeneratorClientDeps {
  logger: ILogger;
  fetchImpl?: typeof fetch;
}

export class HttpGeneratorClient implements Generator {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: ILogger;

  constructor(private readonly config: HttpGeneratorClientConfig, deps: HttpGeneratorClientDeps) {
    this.logger = deps.logger;
    this.fetchImpl = deps.fetchImpl ?? fetch;
  }

  async generate(
    profile: UserProfile,
    opportunity: Opportunity,
    constraints: GenerationConstraints
  ): Promise<GeneratedDraft> {
    const body = JSON.stringify({
      profile,
      opportunity: { id: opportunity.id, ...opportunity.rawFields },
      constraints,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.config.headers },
        body,
      });
    } catch (error) {
      throw networkError('Generation', error);
    }

    if (!response.ok) {
      throw errorForStatus(response.status, 'Generation', await readBody(response));
    }

    const payload: unknown = await response.json();
    const draft = parsePayload(GeneratedDraftSchema, payload, 'generator response');
    this.logger.debug('Draft generated', {
      applicationId: constraints.applicationId,
      attempt: constraints.attempt,
      qualityScore: draft.qualityScore,
    });
    return draft;
  }
}
