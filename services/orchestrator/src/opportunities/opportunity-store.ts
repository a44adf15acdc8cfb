/**
 * Opportunity Store & Deduplicator
 *
 * Canonicalizes raw listings, fingerprints them and merges duplicates into
 * the record that already owns the fingerprint. Each fingerprint is handled
 * inside its own exclusive section, so concurrent ingestion of one listing
 * from several sources still yields a single record.
 *
 * Records are frozen values; a merge or score update installs a new value
 * under the same id. The id is derived from the fingerprint, so a listing
 * ingested again after its record was lost gets the id it had before.
 */

import { RawOpportunitySchema } from '@pipeline/config';
import { KeyedMutex, NotFoundError, ValidationError, systemClock } from '@pipeline/core';
import type { Clock, ILogger } from '@pipeline/core';
import type {
  IngestResult,
  Opportunity,
  OpportunityFields,
  RawOpportunity,
  Tier,
} from '@pipeline/types';
import { parsePayload } from '../validation';
import { computeFingerprint } from './fingerprint';
import { InMemoryOpportunityRepository } from './opportunity-repository';
import type { OpportunityRepository } from './opportunity-repository';

export interface OpportunityStoreConfig {
  /** Records not updated for this long are soft-archived */
  retentionMs: number;
}

export interface OpportunityStoreDeps {
  logger: ILogger;
  repository?: OpportunityRepository;
  clock?: Clock;
}

function distinct(values: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    const key = trimmed.toLowerCase();
    if (trimmed && !seen.has(key)) {
      seen.add(key);
      result.push(trimmed);
    }
  }
  return result;
}

function canonicalFields(raw: RawOpportunity): OpportunityFields {
  return {
    title: raw.title.trim(),
    organization: raw.organization.trim(),
    url: raw.url?.trim() || undefined,
    description: raw.description?.trim() || undefined,
    opportunityType: raw.opportunityType ?? 'other',
    deadline: raw.deadline,
    tags: distinct(raw.tags ?? []),
    requiredSkills: distinct(raw.requiredSkills ?? []),
    experienceYears: raw.experienceYears,
    compensationMax: raw.compensationMax,
    platform: raw.platform?.trim().toLowerCase() || undefined,
    location: raw.location?.trim() || undefined,
    sources: [raw.source.trim()],
  };
}

/**
 * Latest wins for every field the incoming listing carries; sources are
 * unioned in first-seen order.
 */
function mergeFields(existing: OpportunityFields, incoming: OpportunityFields, rawType: boolean): OpportunityFields {
  return {
    title: incoming.title,
    organization: incoming.organization,
    url: incoming.url ?? existing.url,
    description: incoming.description ?? existing.description,
    opportunityType: rawType ? incoming.opportunityType : existing.opportunityType,
    deadline: incoming.deadline ?? existing.deadline,
    tags: incoming.tags.length > 0 ? incoming.tags : existing.tags,
    requiredSkills: incoming.requiredSkills.length > 0 ? incoming.requiredSkills : existing.requiredSkills,
    experienceYears: incoming.experienceYears ?? existing.experienceYears,
    compensationMax: incoming.compensationMax ?? existing.compensationMax,
    platform: incoming.platform ?? existing.platform,
    location: incoming.location ?? existing.location,
    sources: distinct([...existing.sources, ...incoming.sources]),
  };
}

export function opportunityIdFor(fingerprint: string): string {
  return `opp_${fingerprint.slice(0, 24)}`;
}

function freeze(opportunity: Opportunity): Opportunity {
  Object.freeze(opportunity.rawFields.sources);
  Object.freeze(opportunity.rawFields.tags);
  Object.freeze(opportunity.rawFields.requiredSkills);
  Object.freeze(opportunity.rawFields);
  return Object.freeze(opportunity);
}

export class OpportunityStore {
  private readonly repository: OpportunityRepository;
  private readonly clock: Clock;
  private readonly logger: ILogger;
  private readonly locks = new KeyedMutex();

  constructor(private readonly config: OpportunityStoreConfig, deps: OpportunityStoreDeps) {
    this.repository = deps.repository ?? new InMemoryOpportunityRepository();
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger;
  }

  /**
   * Insert a new opportunity or merge into the one with the same fingerprint.
   *
   * @throws ValidationError when the payload misses source, title,
   *   organization, or both url and description
   */
  async ingest(input: unknown): Promise<IngestResult> {
    let raw: RawOpportunity;
    try {
      raw = parsePayload(RawOpportunitySchema, input, 'opportunity');
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn('Rejected malformed opportunity', { issues: error.issues });
      }
      throw error;
    }

    const fields = canonicalFields(raw);
    const fingerprint = computeFingerprint(fields);
    const now = this.clock.now();
    const discoveredAt = raw.discoveredAt ?? now;

    return this.locks.runExclusive(fingerprint, async () => {
      const existing = await this.repository.getByFingerprint(fingerprint);

      if (existing) {
        const merged = freeze({
          ...existing,
          rawFields: mergeFields(existing.rawFields, fields, raw.opportunityType !== undefined),
          discoveredAt: Math.min(existing.discoveredAt, discoveredAt),
          updatedAt: now,
          archivedAt: undefined,
        });
        await this.repository.save(merged);
        this.logger.debug('Merged duplicate opportunity', {
          opportunityId: existing.id,
          source: raw.source,
          sources: merged.rawFields.sources,
        });
        return { opportunity: merged, isNew: false };
      }

      const created = freeze({
        id: opportunityIdFor(fingerprint),
        fingerprint,
        source: raw.source.trim(),
        rawFields: fields,
        discoveredAt,
        updatedAt: now,
      });
      await this.repository.save(created);
      this.logger.info('Ingested opportunity', {
        opportunityId: created.id,
        source: created.source,
        title: fields.title,
        organization: fields.organization,
      });
      return { opportunity: created, isNew: true };
    });
  }

  get(id: string): Promise<Opportunity | undefined> {
    return this.repository.get(id);
  }

  getByFingerprint(fingerprint: string): Promise<Opportunity | undefined> {
    return this.repository.getByFingerprint(fingerprint);
  }

  list(): Promise<Opportunity[]> {
    return this.repository.list();
  }

  async require(id: string): Promise<Opportunity> {
    const opportunity = await this.repository.get(id);
    if (!opportunity) {
      throw new NotFoundError('Opportunity', id);
    }
    return opportunity;
  }

  /** Store the latest score and tier on the record. */
  async recordScore(id: string, score: number, tier: Tier): Promise<Opportunity> {
    const current = await this.require(id);
    return this.locks.runExclusive(current.fingerprint, async () => {
      const latest = await this.require(id);
      const updated = freeze({ ...latest, score, tier, updatedAt: this.clock.now() });
      await this.repository.save(updated);
      return updated;
    });
  }

  /**
   * Soft-archive records whose last update is older than the retention
   * window.
   *
   * @returns The number of records archived
   */
  async archiveStale(now: number): Promise<number> {
    let archived = 0;
    for (const opportunity of await this.repository.list()) {
      if (opportunity.archivedAt !== undefined || now - opportunity.updatedAt <= this.config.retentionMs) {
        continue;
      }
      await this.locks.runExclusive(opportunity.fingerprint, async () => {
        const latest = await this.repository.get(opportunity.id);
        if (!latest || latest.archivedAt !== undefined || now - latest.updatedAt <= this.config.retentionMs) {
          return;
        }
        await this.repository.save(freeze({ ...latest, archivedAt: now }));
        archived++;
      });
    }
    if (archived > 0) {
      this.logger.info('Archived stale opportunities', { archived });
    }
    return archived;
  }
}
