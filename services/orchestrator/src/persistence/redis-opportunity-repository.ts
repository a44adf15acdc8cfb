/**
 * Redis-backed opportunity repository.
 *
 * Records live in `pipeline:opportunity:{id}` (field `data`), with a
 * fingerprint → id hash and a set of every id beside them. Writes are
 * serialized per fingerprint by the OpportunityStore, so plain commands
 * suffice.
 */

import type { RedisCommands } from '@pipeline/core';
import type { Opportunity } from '@pipeline/types';
import type { OpportunityRepository } from '../opportunities/opportunity-repository';
import { parsePayload } from '../validation';
import { StoredOpportunitySchema } from './record-schema';

export const ALL_OPPORTUNITIES_KEY = 'pipeline:opportunities';
export const OPPORTUNITY_FINGERPRINTS_KEY = 'pipeline:opportunity-fingerprints';

export function opportunityKey(id: string): string {
  return `pipeline:opportunity:${id}`;
}

export class RedisOpportunityRepository implements OpportunityRepository {
  constructor(private readonly redis: RedisCommands) {}

  async get(id: string): Promise<Opportunity | undefined> {
    const data = await this.redis.hget(opportunityKey(id), 'data');
    return data === null ? undefined : this.decode(data);
  }

  async getByFingerprint(fingerprint: string): Promise<Opportunity | undefined> {
    const id = await this.redis.hget(OPPORTUNITY_FINGERPRINTS_KEY, fingerprint);
    return id === null ? undefined : this.get(id);
  }

  async save(opportunity: Opportunity): Promise<void> {
    await this.redis.hset(opportunityKey(opportunity.id), { data: JSON.stringify(opportunity) });
    await this.redis.hset(OPPORTUNITY_FINGERPRINTS_KEY, { [opportunity.fingerprint]: opportunity.id });
    await this.redis.sadd(ALL_OPPORTUNITIES_KEY, opportunity.id);
  }

  async list(): Promise<Opportunity[]> {
    const ids = await this.redis.smembers(ALL_OPPORTUNITIES_KEY);
    const records = await Promise.all(ids.map(id => this.get(id)));
    return records.filter((record): record is Opportunity => record !== undefined);
  }

  private decode(data: string): Opportunity {
    const parsed: unknown = JSON.parse(data);
    return parsePayload(StoredOpportunitySchema, parsed, 'stored opportunity');
  }
}
