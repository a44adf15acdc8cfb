import type { UserProfile } from '@pipeline/types';

/** Latest profile seen per user; discover() refreshes it on every call. */
export interface ProfileStore {
  get(userId: string): Promise<UserProfile | undefined>;
  save(profile: UserProfile): Promise<void>;
}

export class InMemoryProfileStore implements ProfileStore {
  private readonly profiles = new Map<string, UserProfile>();

  async get(userId: string): Promise<UserProfile | undefined> {
    return this.profiles.get(userId);
  }

  async save(profile: UserProfile): Promise<void> {
    this.profiles.set(profile.userId, profile);
  }
}
