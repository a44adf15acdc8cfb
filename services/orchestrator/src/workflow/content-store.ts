import { randomUUID } from 'crypto';
import type { GeneratedDraft } from '@pipeline/types';

/** Holds generated drafts; application records keep only the reference. */
export interface ContentStore {
  put(applicationId: string, draft: GeneratedDraft): Promise<string>;
  get(ref: string): Promise<GeneratedDraft | undefined>;
  delete(ref: string): Promise<void>;
}

export class InMemoryContentStore implements ContentStore {
  private readonly drafts = new Map<string, GeneratedDraft>();

  async put(applicationId: string, draft: GeneratedDraft): Promise<string> {
    const ref = `draft_${applicationId}_${randomUUID()}`;
    this.drafts.set(ref, Object.freeze({ ...draft }));
    return ref;
  }

  async get(ref: string): Promise<GeneratedDraft | undefined> {
    return this.drafts.get(ref);
  }

  async delete(ref: string): Promise<void> {
    this.drafts.delete(ref);
  }
}
