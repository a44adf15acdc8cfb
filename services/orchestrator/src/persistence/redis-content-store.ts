import { randomUUID } from 'crypto';
import type { RedisCommands } from '@pipeline/core';
import type { GeneratedDraft } from '@pipeline/types';
import type { ContentStore } from '../workflow/content-store';
import { parsePayload } from '../validation';
import { StoredDraftSchema } from './record-schema';

export const DRAFTS_KEY = 'pipeline:drafts';

/** Drafts as JSON fields of one hash, keyed by reference. */
export class RedisContentStore implements ContentStore {
  constructor(private readonly redis: RedisCommands) {}

  async put(applicationId: string, draft: GeneratedDraft): Promise<string> {
    const ref = `draft_${applicationId}_${randomUUID()}`;
    await this.redis.hset(DRAFTS_KEY, { [ref]: JSON.stringify(draft) });
    return ref;
  }

  async get(ref: string): Promise<GeneratedDraft | undefined> {
    const data = await this.redis.hget(DRAFTS_KEY, ref);
    if (data === null) return undefined;
    const parsed: unknown = JSON.parse(data);
    return Object.freeze(parsePayload(StoredDraftSchema, parsed, 'stored draft'));
  }

  async delete(ref: string): Promise<void> {
    await this.redis.hdel(DRAFTS_KEY, ref);
  }
}
