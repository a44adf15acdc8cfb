import { systemClock } from '@pipeline/core';
import type { Clock } from '@pipeline/core';

/**
 * Per-user daily admission quota. Days are UTC calendar days; counters for
 * past days are dropped when a new day is first seen.
 */
export class DailyQuota {
  private readonly used = new Map<string, number>();
  private day: string;

  constructor(private readonly limit: number, private readonly clock: Clock = systemClock) {
    this.day = this.currentDay();
  }

  /** @returns false when the user has no admissions left today */
  tryConsume(userId: string): boolean {
    this.rollover();
    const count = this.used.get(userId) ?? 0;
    if (count >= this.limit) return false;
    this.used.set(userId, count + 1);
    return true;
  }

  release(userId: string): void {
    this.rollover();
    const count = this.used.get(userId) ?? 0;
    if (count > 0) this.used.set(userId, count - 1);
  }

  remaining(userId: string): number {
    this.rollover();
    return Math.max(0, this.limit - (this.used.get(userId) ?? 0));
  }

  private rollover(): void {
    const today = this.currentDay();
    if (today !== this.day) {
      this.day = today;
      this.used.clear();
    }
  }

  private currentDay(): string {
    return new Date(this.clock.now()).toISOString().slice(0, 10);
  }
}
