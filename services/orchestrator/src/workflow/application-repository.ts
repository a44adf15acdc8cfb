/**
 * ApplicationRecord persistence.
 *
 * Every write is a compare-and-set on the record version: the write lands
 * only if the stored version still equals the version the caller read, and
 * the stored record then carries version + 1.
 */

import { createHash } from 'crypto';
import { ConflictError } from '@pipeline/core';
import type { ApplicationRecord } from '@pipeline/types';

export interface ApplicationRepository {
  get(id: string): Promise<ApplicationRecord | undefined>;
  list(): Promise<ApplicationRecord[]>;
  listByUser(userId: string): Promise<ApplicationRecord[]>;
  /**
   * Insert a new record at version 1.
   * @throws ConflictError when the id already exists
   */
  create(record: ApplicationRecord): Promise<ApplicationRecord>;
  /**
   * Write `next` as version `expectedVersion + 1`.
   * @throws ConflictError when the stored version differs
   */
  compareAndSet(next: ApplicationRecord, expectedVersion: number): Promise<ApplicationRecord>;
}

/** One application per (user, opportunity) */
export function applicationIdFor(userId: string, opportunityId: string): string {
  const digest = createHash('sha256').update(`${userId}:${opportunityId}`).digest('hex');
  return `app_${digest.slice(0, 24)}`;
}

export class InMemoryApplicationRepository implements ApplicationRepository {
  private readonly records = new Map<string, ApplicationRecord>();

  async get(id: string): Promise<ApplicationRecord | undefined> {
    return this.records.get(id);
  }

  async list(): Promise<ApplicationRecord[]> {
    return [...this.records.values()];
  }

  async listByUser(userId: string): Promise<ApplicationRecord[]> {
    return [...this.records.values()].filter(record => record.userId === userId);
  }

  async create(record: ApplicationRecord): Promise<ApplicationRecord> {
    return this.compareAndSet(record, 0);
  }

  async compareAndSet(next: ApplicationRecord, expectedVersion: number): Promise<ApplicationRecord> {
    // No await between the check and the write
    const stored = this.records.get(next.id);
    const actual = stored?.version ?? 0;
    if (actual !== expectedVersion) {
      throw new ConflictError('ApplicationRecord', next.id, expectedVersion, stored?.version);
    }
    const written: ApplicationRecord = Object.freeze({ ...next, version: expectedVersion + 1 });
    this.records.set(next.id, written);
    return written;
  }
}
