/**
 * Status Tracker
 *
 * Append-only timeline per application, follow-up scheduling and the
 * no-response clock for applications in Tracking. Also derives the per-user
 * conversion funnel from the transitions it records.
 *
 * The sweep runs on an unref'd interval so it never keeps the process alive.
 */

import { randomUUID } from 'crypto';
import { ApplicationState } from '@pipeline/types';
import type {
  ApplicationMetrics,
  FollowUpKind,
  FollowUpNotifier,
  FollowUpTask,
  FunnelCounts,
  TimelineEvent,
  TransitionEvent,
} from '@pipeline/types';
import { NotFoundError, getErrorMessage, systemClock } from '@pipeline/core';
import type { Clock, ILogger } from '@pipeline/core';
import { DEFAULT_FOLLOW_UP_RULES } from './follow-up-rules';
import type { FollowUpRule } from './follow-up-rules';

// =============================================================================
// Types
// =============================================================================

export interface StatusTrackerConfig {
  noResponseWindowMs: number;
  followUpRules?: ReadonlyArray<FollowUpRule>;
}

export interface StatusTrackerDeps {
  logger: ILogger;
  notifier?: FollowUpNotifier;
  clock?: Clock;
}

/** Called for each application whose no-response window has elapsed */
export type NoResponseHandler = (applicationId: string, userId: string) => Promise<void>;

export interface SweepResult {
  notified: number;
  noResponse: number;
}

type FunnelStage = 'admitted' | 'submitted' | 'closed' | 'accepted';

interface ApplicationTrail {
  userId: string;
  lastStateChangeAt: number;
  reached: Set<FunnelStage>;
}

interface TrackingEntry {
  userId: string;
  since: number;
}

const STAGE_BY_STATE: Partial<Record<ApplicationState, FunnelStage>> = {
  [ApplicationState.Admitted]: 'admitted',
  [ApplicationState.Submitted]: 'submitted',
  [ApplicationState.Closed]: 'closed',
};

// =============================================================================
// Tracker
// =============================================================================

export class StatusTracker {
  private readonly timelines = new Map<string, TimelineEvent[]>();
  private readonly trails = new Map<string, ApplicationTrail>();
  private readonly followUps = new Map<string, FollowUpTask>();
  private readonly tracking = new Map<string, TrackingEntry>();
  private readonly logger: ILogger;
  private readonly notifier?: FollowUpNotifier;
  private readonly clock: Clock;
  private readonly rules: ReadonlyArray<FollowUpRule>;
  private noResponseHandler?: NoResponseHandler;
  private sweepTimer?: NodeJS.Timeout;
  private sweepInFlight?: Promise<SweepResult>;
  private seq = 0;

  constructor(private readonly config: StatusTrackerConfig, deps: StatusTrackerDeps) {
    this.logger = deps.logger;
    this.notifier = deps.notifier;
    this.clock = deps.clock ?? systemClock;
    this.rules = config.followUpRules ?? DEFAULT_FOLLOW_UP_RULES;
  }

  // ===========================================================================
  // Timeline
  // ===========================================================================

  recordEvent(applicationId: string, kind: string, payload: Record<string, unknown> = {}, at = this.clock.now()): TimelineEvent {
    const event: TimelineEvent = Object.freeze({
      seq: ++this.seq,
      applicationId,
      kind,
      payload: Object.freeze({ ...payload }),
      at,
    });

    let timeline = this.timelines.get(applicationId);
    if (!timeline) {
      timeline = [];
      this.timelines.set(applicationId, timeline);
    }
    timeline.push(event);

    if (kind === 'outcome' && payload.outcome === 'Accepted') {
      this.trails.get(applicationId)?.reached.add('accepted');
    }
    return event;
  }

  /** First event of an application; counts it as discovered for its user. */
  recordCreated(applicationId: string, userId: string, at = this.clock.now()): void {
    if (!this.trails.has(applicationId)) {
      this.trails.set(applicationId, { userId, lastStateChangeAt: at, reached: new Set() });
    }
    this.recordEvent(applicationId, 'created', { userId, state: ApplicationState.Discovered }, at);
  }

  recordTransition(event: TransitionEvent): void {
    this.recordEvent(
      event.applicationId,
      'transition',
      { from: event.from, to: event.to, version: event.version },
      event.at
    );

    let trail = this.trails.get(event.applicationId);
    if (!trail) {
      trail = { userId: event.userId, lastStateChangeAt: event.at, reached: new Set() };
      this.trails.set(event.applicationId, trail);
    }
    trail.lastStateChangeAt = event.at;

    const stage = STAGE_BY_STATE[event.to];
    if (stage) trail.reached.add(stage);
  }

  getTimeline(applicationId: string): TimelineEvent[] {
    return [...(this.timelines.get(applicationId) ?? [])];
  }

  // ===========================================================================
  // Follow-ups
  // ===========================================================================

  scheduleFollowUp(applicationId: string, dueAt: number, kind: FollowUpKind): FollowUpTask {
    const task: FollowUpTask = Object.freeze({
      id: `fu_${randomUUID()}`,
      applicationId,
      dueAt,
      kind,
      completed: false,
    });
    this.followUps.set(task.id, task);
    this.recordEvent(applicationId, 'follow_up_scheduled', { taskId: task.id, kind, dueAt });
    return task;
  }

  /**
   * @throws NotFoundError for an unknown task id
   */
  completeFollowUp(taskId: string): FollowUpTask {
    const task = this.followUps.get(taskId);
    if (!task) {
      throw new NotFoundError('FollowUpTask', taskId);
    }
    if (task.completed) return task;

    const completed: FollowUpTask = Object.freeze({ ...task, completed: true, completedAt: this.clock.now() });
    this.followUps.set(taskId, completed);
    this.recordEvent(task.applicationId, 'follow_up_completed', { taskId, kind: task.kind });
    return completed;
  }

  /** Open follow-ups, earliest due first */
  pendingFollowUps(applicationId?: string): FollowUpTask[] {
    return [...this.followUps.values()]
      .filter(task => !task.completed && (applicationId === undefined || task.applicationId === applicationId))
      .sort((a, b) => a.dueAt - b.dueAt);
  }

  // ===========================================================================
  // No-response clock
  // ===========================================================================

  onNoResponse(handler: NoResponseHandler): void {
    this.noResponseHandler = handler;
  }

  beginTracking(applicationId: string, userId: string, since: number): FollowUpTask[] {
    this.tracking.set(applicationId, { userId, since });
    const tasks = this.rules.map(rule => this.scheduleFollowUp(applicationId, since + rule.offsetMs, rule.kind));
    this.logger.debug('Tracking started', { applicationId, followUps: tasks.length });
    return tasks;
  }

  /**
   * Stop the no-response clock and drop open follow-ups.
   *
   * @returns Number of follow-ups dropped
   */
  endTracking(applicationId: string): number {
    this.tracking.delete(applicationId);
    let dropped = 0;
    for (const [id, task] of this.followUps) {
      if (task.applicationId === applicationId && !task.completed) {
        this.followUps.delete(id);
        dropped++;
      }
    }
    return dropped;
  }

  isTracking(applicationId: string): boolean {
    return this.tracking.has(applicationId);
  }

  /**
   * Notify due follow-ups and report applications past the no-response
   * window. Overlapping calls share one run.
   */
  sweep(now = this.clock.now()): Promise<SweepResult> {
    if (!this.sweepInFlight) {
      this.sweepInFlight = this.runSweep(now).finally(() => {
        this.sweepInFlight = undefined;
      });
    }
    return this.sweepInFlight;
  }

  start(intervalMs: number): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error('Status sweep failed', { error: getErrorMessage(error) });
      });
    }, intervalMs);
    this.sweepTimer.unref();
    this.logger.info('Status tracker sweep started', { intervalMs });
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  private async runSweep(now: number): Promise<SweepResult> {
    let notified = 0;
    const due = [...this.followUps.values()]
      .filter(task => !task.completed && task.notifiedAt === undefined && task.dueAt <= now)
      .sort((a, b) => a.dueAt - b.dueAt);

    for (const task of due) {
      try {
        if (this.notifier) {
          await this.notifier.notify(task);
        } else {
          this.logger.info('Follow-up due', { taskId: task.id, applicationId: task.applicationId, kind: task.kind });
        }
      } catch (error) {
        this.logger.warn('Follow-up notification failed, will retry next sweep', {
          taskId: task.id,
          applicationId: task.applicationId,
          error: getErrorMessage(error),
        });
        continue;
      }

      // Completed or dropped while the notifier was running
      const current = this.followUps.get(task.id);
      if (current && !current.completed) {
        this.followUps.set(task.id, Object.freeze({ ...current, notifiedAt: now }));
      }
      notified++;
    }

    let noResponse = 0;
    const handler = this.noResponseHandler;
    if (handler) {
      const expired = [...this.tracking].filter(([, entry]) => now - entry.since >= this.config.noResponseWindowMs);
      for (const [applicationId, entry] of expired) {
        this.tracking.delete(applicationId);
        try {
          await handler(applicationId, entry.userId);
          noResponse++;
        } catch (error) {
          this.tracking.set(applicationId, entry);
          this.logger.error('No-response handler failed', { applicationId, error: getErrorMessage(error) });
        }
      }
    }

    if (notified > 0 || noResponse > 0) {
      this.logger.info('Status sweep completed', { notified, noResponse });
    }
    return { notified, noResponse };
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  getFunnel(userId: string): FunnelCounts {
    let discovered = 0;
    const counts: Record<FunnelStage, number> = { admitted: 0, submitted: 0, closed: 0, accepted: 0 };

    for (const trail of this.trails.values()) {
      if (trail.userId !== userId) continue;
      discovered++;
      for (const stage of trail.reached) counts[stage]++;
    }

    return {
      userId,
      discovered,
      admitted: counts.admitted,
      submitted: counts.submitted,
      closed: counts.closed,
      accepted: counts.accepted,
      discoveredToSubmitted: discovered === 0 ? 0 : counts.submitted / discovered,
      submittedToClosed: counts.submitted === 0 ? 0 : counts.closed / counts.submitted,
    };
  }

  /**
   * @throws NotFoundError when nothing was recorded for the application
   */
  getApplicationMetrics(applicationId: string, now = this.clock.now()): ApplicationMetrics {
    const timeline = this.timelines.get(applicationId);
    const first = timeline?.[0];
    if (!timeline || !first) {
      throw new NotFoundError('Timeline', applicationId);
    }
    const lastStateChangeAt = this.trails.get(applicationId)?.lastStateChangeAt ?? first.at;

    return {
      applicationId,
      eventCount: timeline.length,
      timeInCurrentStateMs: Math.max(0, now - lastStateChangeAt),
      totalElapsedMs: Math.max(0, now - first.at),
    };
  }
}
