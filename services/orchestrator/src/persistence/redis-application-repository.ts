/**
 * Redis-backed ApplicationRecord repository.
 *
 * Each record is a hash `pipeline:application:{id}` with `version` and `data`
 * (the JSON record). Writes go through one Lua script that compares the
 * stored version and, on a match, writes the record and indexes it, so the
 * compare-and-set is atomic on the server.
 */

import { ConflictError } from '@pipeline/core';
import type { ILogger, RedisCommands } from '@pipeline/core';
import type { ApplicationRecord } from '@pipeline/types';
import { parsePayload } from '../validation';
import type { ApplicationRepository } from '../workflow/application-repository';
import { StoredApplicationRecordSchema } from './record-schema';

export const APPLICATION_KEY_PREFIX = 'pipeline:application:';
export const ALL_APPLICATIONS_KEY = 'pipeline:applications';

export function applicationKey(id: string): string {
  return `${APPLICATION_KEY_PREFIX}${id}`;
}

export function userApplicationsKey(userId: string): string {
  return `pipeline:user:${userId}:applications`;
}

/**
 * KEYS: record hash, user index, global index
 * ARGV: expected version, new version, record JSON, record id
 * Returns 1 on write, 0 on version mismatch.
 */
export const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('HGET', KEYS[1], 'version')
if current == false then current = '0' end
if current ~= ARGV[1] then return 0 end
redis.call('HSET', KEYS[1], 'version', ARGV[2], 'data', ARGV[3])
redis.call('SADD', KEYS[2], ARGV[4])
redis.call('SADD', KEYS[3], ARGV[4])
return 1
`;

export class RedisApplicationRepository implements ApplicationRepository {
  constructor(private readonly redis: RedisCommands, private readonly logger: ILogger) {}

  async get(id: string): Promise<ApplicationRecord | undefined> {
    const data = await this.redis.hget(applicationKey(id), 'data');
    return data === null ? undefined : this.decode(data);
  }

  async list(): Promise<ApplicationRecord[]> {
    return this.loadAll(await this.redis.smembers(ALL_APPLICATIONS_KEY));
  }

  async listByUser(userId: string): Promise<ApplicationRecord[]> {
    return this.loadAll(await this.redis.smembers(userApplicationsKey(userId)));
  }

  async create(record: ApplicationRecord): Promise<ApplicationRecord> {
    return this.compareAndSet(record, 0);
  }

  async compareAndSet(next: ApplicationRecord, expectedVersion: number): Promise<ApplicationRecord> {
    const written: ApplicationRecord = { ...next, version: expectedVersion + 1 };
    const result = await this.redis.eval(
      COMPARE_AND_SET_SCRIPT,
      [applicationKey(next.id), userApplicationsKey(next.userId), ALL_APPLICATIONS_KEY],
      [expectedVersion.toString(), written.version.toString(), JSON.stringify(written), next.id]
    );

    if (result !== 1) {
      const stored = await this.get(next.id);
      this.logger.debug('Application write lost compare-and-set', {
        applicationId: next.id,
        expectedVersion,
        actualVersion: stored?.version,
      });
      throw new ConflictError('ApplicationRecord', next.id, expectedVersion, stored?.version);
    }
    return Object.freeze(written);
  }

  private async loadAll(ids: string[]): Promise<ApplicationRecord[]> {
    const records = await Promise.all(ids.map(id => this.get(id)));
    return records.filter((record): record is ApplicationRecord => record !== undefined);
  }

  private decode(data: string): ApplicationRecord {
    const parsed: unknown = JSON.parse(data);
    return Object.freeze(parsePayload(StoredApplicationRecordSchema, parsed, 'stored application record'));
  }
}
