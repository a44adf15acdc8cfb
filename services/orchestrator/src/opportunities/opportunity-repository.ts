import type { Opportunity } from '@pipeline/types';

/**
 * Storage for opportunities. Fingerprints are unique; callers serialize
 * writes per fingerprint.
 */
export interface OpportunityRepository {
  get(id: string): Promise<Opportunity | undefined>;
  getByFingerprint(fingerprint: string): Promise<Opportunity | undefined>;
  /** Insert or replace by id */
  save(opportunity: Opportunity): Promise<void>;
  list(): Promise<Opportunity[]>;
}

export class InMemoryOpportunityRepository implements OpportunityRepository {
  private readonly byId = new Map<string, Opportunity>();
  private readonly idByFingerprint = new Map<string, string>();

  async get(id: string): Promise<Opportunity | undefined> {
    return this.byId.get(id);
  }

  async getByFingerprint(fingerprint: string): Promise<Opportunity | undefined> {
    const id = this.idByFingerprint.get(fingerprint);
    return id === undefined ? undefined : this.byId.get(id);
  }

  async save(opportunity: Opportunity): Promise<void> {
    this.byId.set(opportunity.id, opportunity);
    this.idByFingerprint.set(opportunity.fingerprint, opportunity.id);
  }

  async list(): Promise<Opportunity[]> {
    return [...this.byId.values()];
  }
}
