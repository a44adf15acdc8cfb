/**
 * Test Data Builder for ApplicationRecord
 *
 * Produces records in any state without walking the workflow, for repository
 * and API tests.
 */

import { ApplicationState } from '@pipeline/types';
import type { ApplicationRecord, FeatureVector, Outcome, Tier } from '@pipeline/types';

type MutableRecord = { -readonly [K in keyof ApplicationRecord]: ApplicationRecord[K] };

export class ApplicationRecordBuilder {
  private record: MutableRecord = {
    id: 'app_test_1',
    opportunityId: 'opp_test_1',
    userId: 'user-1',
    state: ApplicationState.Discovered,
    version: 1,
    createdAt: 1_000,
    updatedAt: 1_000,
    generationAttempts: 0,
  };

  withId(id: string): this {
    this.record.id = id;
    return this;
  }

  withOpportunityId(opportunityId: string): this {
    this.record.opportunityId = opportunityId;
    return this;
  }

  withUserId(userId: string): this {
    this.record.userId = userId;
    return this;
  }

  inState(state: ApplicationState): this {
    this.record.state = state;
    return this;
  }

  withVersion(version: number): this {
    this.record.version = version;
    return this;
  }

  createdAt(at: number): this {
    this.record.createdAt = at;
    this.record.updatedAt = at;
    return this;
  }

  scored(score: number, tier: Tier, weightsVersion: number, featureVector?: FeatureVector): this {
    this.record.score = score;
    this.record.tier = tier;
    this.record.weightsVersion = weightsVersion;
    this.record.featureVector = featureVector;
    return this;
  }

  onPlatform(platform: string): this {
    this.record.platform = platform;
    return this;
  }

  withOutcome(outcome: Outcome, closedAt: number): this {
    this.record.outcome = outcome;
    this.record.closedAt = closedAt;
    return this;
  }

  build(): ApplicationRecord {
    return Object.freeze({ ...this.record });
  }
}

export function applicationRecord(): ApplicationRecordBuilder {
  return new ApplicationRecordBuilder();
}
