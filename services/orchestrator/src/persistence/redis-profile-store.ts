import { UserProfileSchema } from '@pipeline/config';
import type { RedisCommands } from '@pipeline/core';
import type { UserProfile } from '@pipeline/types';
import type { ProfileStore } from '../workflow/profile-store';
import { parsePayload } from '../validation';

export const PROFILES_KEY = 'pipeline:profiles';

export class RedisProfileStore implements ProfileStore {
  constructor(private readonly redis: RedisCommands) {}

  async get(userId: string): Promise<UserProfile | undefined> {
    const data = await this.redis.hget(PROFILES_KEY, userId);
    if (data === null) return undefined;
    const parsed: unknown = JSON.parse(data);
    return parsePayload(UserProfileSchema, parsed, 'stored user profile');
  }

  async save(profile: UserProfile): Promise<void> {
    await this.redis.hset(PROFILES_KEY, { [profile.userId]: JSON.stringify(profile) });
  }
}
