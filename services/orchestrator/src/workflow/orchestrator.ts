/**
 * Workflow Orchestrator
 *
 * Drives each application through its state machine:
 *
 *   Discovered → Scored → Admitted → GenerationRequested → Generated
 *     → (AutoApproved | PendingApproval) → Approved → Submitting
 *     → Submitted → Tracking → Closed
 *
 * with the terminal exits Skipped, Rejected, SubmissionFailed and Abandoned.
 *
 * Steps run as keyed tasks on a bounded priority pool (key = application id,
 * higher tier first), so steps for one application never overlap. Every
 * write is a version compare-and-set; a conflict re-reads and re-plans.
 *
 * Slow collaborators never hold a pool slot: generation runs in the
 * background and re-enters through a continuation task, submission is handed
 * to the SubmissionEngine and comes back through its result listener, and
 * approval is an inbound event.
 *
 * Drafts are screened by the content guard before the approval gate; a
 * flagged draft always waits for a reviewer. After a restart, recover()
 * resumes every record that was mid-flight from its persisted state.
 */

import { EventEmitter } from 'events';
import { UserProfileSchema } from '@pipeline/config';
import {
  ConflictError,
  KeyedTaskPool,
  NotFoundError,
  RetryPolicy,
  getErrorMessage,
  systemClock,
} from '@pipeline/core';
import type { Clock, ILogger, TaskPoolStats } from '@pipeline/core';
import { ApplicationState } from '@pipeline/types';
import type {
  ApplicationRecord,
  ApprovalDecisionEvent,
  AutomationLevel,
  GeneratedDraft,
  Generator,
  Opportunity,
  OutcomeEvent,
  SubmissionResult,
  TransitionEvent,
  UserProfile,
} from '@pipeline/types';
import type { OpportunityStore } from '../opportunities';
import type { OpportunityScorer, WeightsRegistry } from '../scoring';
import type { SubmissionEngine } from '../submission';
import type { StatusTracker } from '../tracking';
import type { OutcomeFeedbackAdapter } from '../feedback';
import { parsePayload } from '../validation';
import { applicationIdFor } from './application-repository';
import type { ApplicationRepository } from './application-repository';
import { InMemoryContentStore } from './content-store';
import type { ContentStore } from './content-store';
import { checkDraftContent, hostOf } from './content-guard';
import { InMemoryProfileStore } from './profile-store';
import type { ProfileStore } from './profile-store';
import type { DailyQuota } from './quota';
import { canTransition, isTerminal } from './state-machine';

// =============================================================================
// Types
// =============================================================================

export interface OrchestratorConfig {
  automationLevel: AutomationLevel;
  /** Drafts must score strictly above this to be auto-approved */
  autoApproveQualityThreshold: number;
  quotaExhaustedPolicy: 'skip' | 'defer';
  defaultPlatform: string;
  workerPoolSize: number;
  generation: {
    timeoutMs: number;
    maxAttempts: number;
    retryDelayMs: number;
  };
  /** Maintenance cadence when started */
  sweepIntervalMs: number;
}

export interface OrchestratorDeps {
  store: OpportunityStore;
  scorer: OpportunityScorer;
  weights: WeightsRegistry;
  applications: ApplicationRepository;
  submissions: SubmissionEngine;
  tracker: StatusTracker;
  feedback: OutcomeFeedbackAdapter;
  generator: Generator;
  quota: DailyQuota;
  logger: ILogger;
  contentStore?: ContentStore;
  profiles?: ProfileStore;
  clock?: Clock;
  /** Replaces the wait between generation retries */
  sleep?: (ms: number) => Promise<void>;
}

export interface ApplicationFilter {
  userId?: string;
  state?: ApplicationState;
}

export interface MaintenanceResult {
  readmitted: number;
  archived: number;
}

export interface RecoveryResult {
  /** Records re-planned from their persisted state */
  resumed: number;
  /** Tracked records whose no-response clock was restarted */
  tracking: number;
}

/** What a delivery needs besides the record; either may have gone missing */
interface SubmissionInputs {
  opportunity?: Opportunity;
  draft?: GeneratedDraft;
}

type RecordPatch = Partial<
  Omit<ApplicationRecord, 'id' | 'opportunityId' | 'userId' | 'state' | 'version' | 'createdAt' | 'updatedAt'>
>;

/** Target state and fields to write, or null to leave the record alone */
type TransitionPlan = { to: ApplicationState; patch?: RecordPatch } | null;

const MAX_CAS_ATTEMPTS = 5;
const CANCEL_PRIORITY = 4;

function priorityOf(record: ApplicationRecord): number {
  return record.tier === undefined ? 2 : 4 - record.tier;
}

// =============================================================================
// Orchestrator
// =============================================================================

export class WorkflowOrchestrator extends EventEmitter {
  private readonly pool: KeyedTaskPool;
  private readonly generationPolicy: RetryPolicy;
  private readonly contentStore: ContentStore;
  private readonly profiles: ProfileStore;
  private readonly clock: Clock;
  private readonly logger: ILogger;
  private readonly deferred = new Set<string>();
  private readonly background = new Set<Promise<void>>();
  private maintenanceTimer?: NodeJS.Timeout;

  constructor(private readonly config: OrchestratorConfig, private readonly deps: OrchestratorDeps) {
    super();
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.contentStore = deps.contentStore ?? new InMemoryContentStore();
    this.profiles = deps.profiles ?? new InMemoryProfileStore();
    this.pool = new KeyedTaskPool({ size: config.workerPoolSize, name: 'workflow' }, deps.logger);
    this.generationPolicy = new RetryPolicy(
      {
        maxAttempts: config.generation.maxAttempts,
        initialDelayMs: config.generation.retryDelayMs,
        backoffMultiplier: 2,
        maxDelayMs: Math.max(config.generation.retryDelayMs * 4, config.generation.retryDelayMs),
        jitter: false,
        attemptTimeoutMs: config.generation.timeoutMs,
      },
      { logger: deps.logger, sleep: deps.sleep }
    );

    deps.submissions.onResult(result => this.onSubmissionResult(result));
    deps.tracker.onNoResponse(async applicationId => {
      await this.handleOutcome({ applicationId, outcome: 'NoResponse', observedAt: this.clock.now() });
    });
  }

  // ===========================================================================
  // Inbound operations
  // ===========================================================================

  /**
   * Ingest a listing for a user. Returns the existing record when the user
   * already has an application for the deduplicated opportunity.
   *
   * @throws ValidationError for a malformed listing or profile
   */
  async discover(rawInput: unknown, profileInput: unknown): Promise<ApplicationRecord> {
    const profile: UserProfile = parsePayload(UserProfileSchema, profileInput, 'user profile');
    const { opportunity } = await this.deps.store.ingest(rawInput);
    await this.profiles.save(profile);

    const id = applicationIdFor(profile.userId, opportunity.id);
    const existing = await this.deps.applications.get(id);
    if (existing) {
      this.logger.debug('Application already exists', { applicationId: id, state: existing.state });
      return existing;
    }

    const now = this.clock.now();
    let created: ApplicationRecord;
    try {
      created = await this.deps.applications.create({
        id,
        opportunityId: opportunity.id,
        userId: profile.userId,
        state: ApplicationState.Discovered,
        version: 1,
        createdAt: now,
        updatedAt: now,
        generationAttempts: 0,
      });
    } catch (error) {
      // Lost a race with a concurrent discover for the same pair
      const winner = error instanceof ConflictError ? await this.deps.applications.get(id) : undefined;
      if (winner) return winner;
      throw error;
    }

    this.deps.tracker.recordCreated(id, profile.userId, now);
    this.logger.info('Application discovered', {
      applicationId: id,
      userId: profile.userId,
      opportunityId: opportunity.id,
    });

    this.pool.schedule(id, priorityOf(created), () => this.scoreStep(id));
    return created;
  }

  /**
   * Apply a reviewer's decision to a record in PendingApproval.
   *
   * @returns false when the record is not awaiting approval
   * @throws NotFoundError for an unknown application
   */
  async handleApprovalDecision(event: ApprovalDecisionEvent): Promise<boolean> {
    const record = await this.require(event.applicationId);
    if (record.state !== ApplicationState.PendingApproval) {
      this.logger.info('Approval decision ignored', {
        applicationId: record.id,
        state: record.state,
        decision: event.decision,
      });
      return false;
    }

    return this.pool.submit(record.id, priorityOf(record), async () => {
      const decision = { decision: event.decision, reviewer: event.reviewer, decidedAt: this.clock.now() };

      if (event.decision === 'Rejected') {
        const rejected = await this.transition(record.id, current =>
          current.state === ApplicationState.PendingApproval
            ? { to: ApplicationState.Rejected, patch: { approvalDecision: decision, reason: 'rejected_by_reviewer' } }
            : null
        );
        return rejected !== null;
      }

      const inputs = await this.loadSubmissionInputs(record);
      const approved = await this.transition(record.id, current =>
        current.state === ApplicationState.PendingApproval
          ? { to: ApplicationState.Approved, patch: { approvalDecision: decision } }
          : null
      );
      if (!approved) return false;

      await this.startSubmission(approved, inputs);
      return true;
    });
  }

  /**
   * Close a tracked application with its outcome and feed it back to
   * learning.
   *
   * @returns false when the record is not in Tracking
   * @throws NotFoundError for an unknown application
   */
  async handleOutcome(event: OutcomeEvent): Promise<boolean> {
    const record = await this.require(event.applicationId);
    if (record.state !== ApplicationState.Tracking) {
      this.logger.info('Outcome ignored', { applicationId: record.id, state: record.state, outcome: event.outcome });
      return false;
    }

    return this.pool.submit(record.id, priorityOf(record), async () => {
      const closed = await this.transition(record.id, current =>
        current.state === ApplicationState.Tracking
          ? { to: ApplicationState.Closed, patch: { outcome: event.outcome, closedAt: event.observedAt } }
          : null
      );
      if (!closed) return false;

      this.deps.tracker.endTracking(closed.id);
      this.deps.tracker.recordEvent(closed.id, 'outcome', { outcome: event.outcome }, event.observedAt);
      this.track(
        this.deps.feedback.recordOutcome(closed, event.outcome, event.observedAt).then(() => undefined),
        closed.id
      );
      return true;
    });
  }

  /**
   * Move a non-terminal application to Abandoned. A queued submission is
   * withdrawn; a generation in flight is discarded when it returns.
   *
   * @returns The abandoned record, or null when it was already terminal
   * @throws NotFoundError for an unknown application
   */
  async cancel(applicationId: string, reason: string): Promise<ApplicationRecord | null> {
    const record = await this.require(applicationId);
    if (isTerminal(record.state)) return null;

    return this.pool.submit(applicationId, CANCEL_PRIORITY, async () => {
      const seen: { previous?: ApplicationRecord } = {};
      const abandoned = await this.transition(applicationId, current => {
        seen.previous = current;
        return isTerminal(current.state) ? null : { to: ApplicationState.Abandoned, patch: { reason } };
      });
      const previous = seen.previous;
      if (!abandoned || !previous) return null;

      this.deferred.delete(applicationId);
      if (previous.state === ApplicationState.Submitting && previous.submissionAttemptId) {
        this.deps.submissions.cancel(previous.submissionAttemptId);
      }
      if (previous.state === ApplicationState.Tracking) {
        this.deps.tracker.endTracking(applicationId);
      }
      this.logger.info('Application cancelled', { applicationId, from: previous.state, reason });
      return abandoned;
    });
  }

  /**
   * Re-admit deferred records and archive stale opportunities.
   */
  async runMaintenance(now = this.clock.now()): Promise<MaintenanceResult> {
    const readmit = [...this.deferred];
    this.deferred.clear();

    for (const id of readmit) {
      this.pool.schedule(id, 2, async () => {
        const record = await this.deps.applications.get(id);
        if (record?.state !== ApplicationState.Scored) return;
        await this.admit(record);
      });
    }

    const archived = await this.deps.store.archiveStale(now);
    if (readmit.length > 0 || archived > 0) {
      this.logger.info('Maintenance completed', { readmitted: readmit.length, archived });
    }
    return { readmitted: readmit.length, archived };
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  getApplication(id: string): Promise<ApplicationRecord | undefined> {
    return this.deps.applications.get(id);
  }

  async listApplications(filter: ApplicationFilter = {}): Promise<ApplicationRecord[]> {
    const records = filter.userId === undefined
      ? await this.deps.applications.list()
      : await this.deps.applications.listByUser(filter.userId);
    return records
      .filter(record => filter.state === undefined || record.state === filter.state)
      .sort((a, b) => a.createdAt - b.createdAt || a.id.localeCompare(b.id));
  }

  getProfile(userId: string): Promise<UserProfile | undefined> {
    return this.profiles.get(userId);
  }

  getPoolStats(): TaskPoolStats {
    return this.pool.getStats();
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Resume records left mid-flight by a previous process. Tracked records get
   * their no-response clock back from the time they entered Tracking; a
   * record awaiting approval keeps waiting; every other non-terminal record
   * is re-planned from its state. Deliveries are resubmitted under the same
   * idempotency key, so a platform that already has one drops the repeat.
   */
  async recover(): Promise<RecoveryResult> {
    const result: RecoveryResult = { resumed: 0, tracking: 0 };
    for (const record of await this.deps.applications.list()) {
      if (isTerminal(record.state) || record.state === ApplicationState.PendingApproval) continue;

      if (record.state === ApplicationState.Tracking) {
        this.deps.tracker.beginTracking(record.id, record.userId, record.updatedAt);
        result.tracking++;
        continue;
      }

      this.pool.schedule(record.id, priorityOf(record), () => this.resume(record.id));
      result.resumed++;
    }

    if (result.resumed > 0 || result.tracking > 0) {
      this.logger.info('Recovered in-flight applications', { ...result });
    }
    return result;
  }

  start(): void {
    if (this.maintenanceTimer) return;
    this.deps.tracker.start(this.config.sweepIntervalMs);
    this.maintenanceTimer = setInterval(() => {
      this.runMaintenance().catch((error: unknown) => {
        this.logger.error('Maintenance failed', { error: getErrorMessage(error) });
      });
    }, this.config.sweepIntervalMs);
    this.maintenanceTimer.unref();
    this.logger.info('Workflow orchestrator started', {
      workerPoolSize: this.config.workerPoolSize,
      automationLevel: this.config.automationLevel,
    });
  }

  async stop(): Promise<void> {
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer);
      this.maintenanceTimer = undefined;
    }
    this.deps.tracker.stop();
    this.deps.submissions.stop();
    this.pool.stop();
    await Promise.allSettled([...this.background]);
    this.logger.info('Workflow orchestrator stopped');
  }

  /**
   * Resolves once no step is queued or running and no generation is in
   * flight. Deliveries owned by the SubmissionEngine are not awaited.
   */
  async onIdle(): Promise<void> {
    for (;;) {
      await this.pool.onIdle();
      if (this.background.size === 0) return;
      await Promise.allSettled([...this.background]);
    }
  }

  // ===========================================================================
  // Steps
  // ===========================================================================

  private async scoreStep(id: string): Promise<void> {
    const record = await this.deps.applications.get(id);
    if (record?.state !== ApplicationState.Discovered) return;

    const profile = await this.profiles.get(record.userId);
    if (!profile) {
      this.logger.warn('No profile for user, cannot score', { applicationId: id, userId: record.userId });
      return;
    }

    const opportunity = await this.deps.store.require(record.opportunityId);
    const weights = this.deps.weights.current();
    const result = this.deps.scorer.score(profile, opportunity, weights);
    await this.deps.store.recordScore(opportunity.id, result.score, result.tier);

    const scored = await this.transition(id, current =>
      current.state === ApplicationState.Discovered
        ? {
            to: ApplicationState.Scored,
            patch: {
              score: result.score,
              tier: result.tier,
              weightsVersion: result.weightsVersion,
              featureVector: result.features,
            },
          }
        : null
    );
    if (scored) await this.admit(scored, opportunity);
  }

  private async admit(record: ApplicationRecord, known?: Opportunity): Promise<void> {
    if (record.tier === 3 || record.tier === undefined) {
      await this.skip(record.id, ApplicationState.Scored, { reason: 'low_tier' });
      return;
    }

    if (!this.deps.quota.tryConsume(record.userId)) {
      if (this.config.quotaExhaustedPolicy === 'defer') {
        this.deferred.add(record.id);
        this.logger.info('Daily quota exhausted, admission deferred', {
          applicationId: record.id,
          userId: record.userId,
        });
        return;
      }
      await this.skip(record.id, ApplicationState.Scored, { reason: 'quota_exhausted' });
      return;
    }

    const opportunity = known ?? (await this.deps.store.require(record.opportunityId));
    const platform = opportunity.rawFields.platform ?? this.config.defaultPlatform;
    const admitted = await this.transition(record.id, current =>
      current.state === ApplicationState.Scored ? { to: ApplicationState.Admitted, patch: { platform } } : null
    );
    if (!admitted) {
      this.deps.quota.release(record.userId);
      return;
    }

    const requested = await this.transition(record.id, current =>
      current.state === ApplicationState.Admitted ? { to: ApplicationState.GenerationRequested } : null
    );
    if (requested) {
      this.track(this.generate(requested, opportunity), requested.id);
    }
  }

  /** Runs outside the pool; re-enters through a continuation task. */
  private async generate(record: ApplicationRecord, known?: Opportunity): Promise<void> {
    const profile = await this.profiles.get(record.userId);
    const opportunity = known ?? (await this.deps.store.get(record.opportunityId));
    const priority = priorityOf(record);
    if (!profile || !opportunity) {
      const missing = profile
        ? new NotFoundError('Opportunity', record.opportunityId)
        : new NotFoundError('UserProfile', record.userId);
      this.pool.schedule(record.id, priority, () => this.onGenerationFailed(record.id, missing, 0));
      return;
    }

    let attempts = 0;
    try {
      const draft = await this.generationPolicy.run(attempt => {
        attempts = attempt;
        return this.deps.generator.generate(profile, opportunity, { applicationId: record.id, attempt });
      }, 'generate');
      this.pool.schedule(record.id, priority, () => this.onGenerated(record.id, draft, attempts));
    } catch (error) {
      this.pool.schedule(record.id, priority, () => this.onGenerationFailed(record.id, error, attempts));
    }
  }

  private async onGenerated(id: string, draft: GeneratedDraft, attempts: number): Promise<void> {
    const ref = await this.contentStore.put(id, draft);
    const generated = await this.transition(id, current =>
      current.state === ApplicationState.GenerationRequested
        ? {
            to: ApplicationState.Generated,
            patch: { generatedContentRef: ref, qualityScore: draft.qualityScore, generationAttempts: attempts },
          }
        : null
    );
    if (!generated) {
      await this.contentStore.delete(ref);
      this.logger.info('Generation result discarded', { applicationId: id });
      return;
    }

    await this.approvalGate(generated, draft);
  }

  private async onGenerationFailed(id: string, error: unknown, attempts: number): Promise<void> {
    const message = getErrorMessage(error);
    this.logger.warn('Generation failed', { applicationId: id, attempts, error: message });
    await this.skip(id, ApplicationState.GenerationRequested, {
      reason: 'generation_failed',
      lastError: message,
      generationAttempts: attempts,
    });
  }

  /**
   * Generated → AutoApproved → Approved → Submitting when automation allows
   * and the draft is clean, otherwise Generated → PendingApproval.
   */
  private async approvalGate(record: ApplicationRecord, draft: GeneratedDraft | undefined): Promise<void> {
    const opportunity = await this.deps.store.get(record.opportunityId);
    const hold = this.holdReason(record.id, draft, opportunity);
    const quality = record.qualityScore ?? 0;
    const autoApprove =
      hold === undefined &&
      this.config.automationLevel === 'full-auto' &&
      quality > this.config.autoApproveQualityThreshold;

    if (!autoApprove) {
      await this.transition(record.id, current =>
        current.state === ApplicationState.Generated
          ? { to: ApplicationState.PendingApproval, patch: hold === undefined ? undefined : { reason: hold } }
          : null
      );
      return;
    }

    const decision = { decision: 'AutoApproved' as const, reviewer: 'system', decidedAt: this.clock.now() };
    const auto = await this.transition(record.id, current =>
      current.state === ApplicationState.Generated
        ? { to: ApplicationState.AutoApproved, patch: { approvalDecision: decision } }
        : null
    );
    if (!auto) return;

    const approved = await this.transition(record.id, current =>
      current.state === ApplicationState.AutoApproved ? { to: ApplicationState.Approved } : null
    );
    if (approved) await this.startSubmission(approved, { opportunity, draft });
  }

  /** Why a draft must wait for a reviewer regardless of automation level */
  private holdReason(
    applicationId: string,
    draft: GeneratedDraft | undefined,
    opportunity: Opportunity | undefined
  ): string | undefined {
    if (!draft) return 'draft_missing';
    const host = hostOf(opportunity?.rawFields.url);
    const check = checkDraftContent(draft.content, host === undefined ? [] : [host]);
    if (check.flags.length === 0) return undefined;

    this.logger.warn('Draft held for review by content guard', {
      applicationId,
      flags: check.flags,
      externalHosts: check.externalHosts,
    });
    return `content_flagged:${check.flags.join(',')}`;
  }

  private async loadSubmissionInputs(record: ApplicationRecord): Promise<SubmissionInputs> {
    const draft = record.generatedContentRef === undefined
      ? undefined
      : await this.contentStore.get(record.generatedContentRef);
    const opportunity = await this.deps.store.get(record.opportunityId);
    return { opportunity, draft };
  }

  private async startSubmission(record: ApplicationRecord, inputs: SubmissionInputs): Promise<void> {
    const platform = record.platform ?? this.config.defaultPlatform;
    const submitting = await this.transition(record.id, current =>
      current.state === ApplicationState.Approved ? { to: ApplicationState.Submitting, patch: { platform } } : null
    );
    if (submitting) await this.dispatchSubmission(submitting, inputs);
  }

  /** Hand a Submitting record to the engine; missing inputs fail it. */
  private async dispatchSubmission(record: ApplicationRecord, inputs: SubmissionInputs): Promise<void> {
    const platform = record.platform ?? this.config.defaultPlatform;
    const { draft, opportunity } = inputs;
    if (!draft) {
      await this.failSubmission(record.id, 'Generated content missing', 'content_missing');
      return;
    }
    if (!opportunity) {
      await this.failSubmission(record.id, `Opportunity not found: ${record.opportunityId}`, 'opportunity_missing');
      return;
    }

    let attemptId: string;
    try {
      attemptId = this.deps.submissions.submit(
        {
          applicationId: record.id,
          tier: record.tier ?? 3,
          deadline: opportunity.rawFields.deadline,
          package: {
            applicationId: record.id,
            userId: record.userId,
            opportunityId: opportunity.id,
            title: opportunity.rawFields.title,
            organization: opportunity.rawFields.organization,
            url: opportunity.rawFields.url,
            content: draft.content,
          },
        },
        platform
      );
    } catch (error) {
      await this.failSubmission(record.id, getErrorMessage(error));
      return;
    }

    // Same-state write: record the attempt id without a transition event
    await this.transition(record.id, current =>
      current.state === ApplicationState.Submitting
        ? { to: ApplicationState.Submitting, patch: { submissionAttemptId: attemptId } }
        : null
    );
  }

  /** Continue a recovered record from the state it was persisted in. */
  private async resume(id: string): Promise<void> {
    const record = await this.deps.applications.get(id);
    if (!record) return;

    switch (record.state) {
      case ApplicationState.Discovered:
        await this.scoreStep(id);
        return;
      case ApplicationState.Scored:
        await this.admit(record);
        return;
      case ApplicationState.Admitted: {
        const requested = await this.transition(id, current =>
          current.state === ApplicationState.Admitted ? { to: ApplicationState.GenerationRequested } : null
        );
        if (requested) this.track(this.generate(requested), id);
        return;
      }
      case ApplicationState.GenerationRequested:
        this.track(this.generate(record), id);
        return;
      case ApplicationState.Generated: {
        const draft = record.generatedContentRef === undefined
          ? undefined
          : await this.contentStore.get(record.generatedContentRef);
        await this.approvalGate(record, draft);
        return;
      }
      case ApplicationState.AutoApproved: {
        const approved = await this.transition(id, current =>
          current.state === ApplicationState.AutoApproved ? { to: ApplicationState.Approved } : null
        );
        if (approved) await this.startSubmission(approved, await this.loadSubmissionInputs(approved));
        return;
      }
      case ApplicationState.Approved:
        await this.startSubmission(record, await this.loadSubmissionInputs(record));
        return;
      case ApplicationState.Submitting:
        await this.dispatchSubmission(record, await this.loadSubmissionInputs(record));
        return;
      default:
        return;
    }
  }

  private onSubmissionResult(result: SubmissionResult): void {
    this.pool.schedule(result.applicationId, 3, async () => {
      const record = await this.deps.applications.get(result.applicationId);
      if (record?.state !== ApplicationState.Submitting) {
        this.logger.debug('Submission result ignored', {
          applicationId: result.applicationId,
          attemptId: result.attemptId,
          state: record?.state,
        });
        return;
      }

      if (result.status !== 'Delivered') {
        await this.failSubmission(
          record.id,
          result.lastError ?? `Submission ${result.status.toLowerCase()}`,
          result.status === 'Expired' ? 'deadline_expired' : 'delivery_failed'
        );
        return;
      }

      const submitted = await this.transition(record.id, current =>
        current.state === ApplicationState.Submitting
          ? { to: ApplicationState.Submitted, patch: { submissionAttemptId: result.attemptId } }
          : null
      );
      if (!submitted) return;

      const tracking = await this.transition(record.id, current =>
        current.state === ApplicationState.Submitted ? { to: ApplicationState.Tracking } : null
      );
      if (tracking) {
        this.deps.tracker.beginTracking(tracking.id, tracking.userId, tracking.updatedAt);
      }
    });
  }

  private async failSubmission(id: string, lastError: string, reason = 'delivery_failed'): Promise<void> {
    await this.transition(id, current =>
      current.state === ApplicationState.Submitting
        ? { to: ApplicationState.SubmissionFailed, patch: { lastError, reason } }
        : null
    );
  }

  private skip(id: string, from: ApplicationState, patch: RecordPatch): Promise<ApplicationRecord | null> {
    return this.transition(id, current =>
      current.state === from ? { to: ApplicationState.Skipped, patch } : null
    );
  }

  // ===========================================================================
  // Transitions
  // ===========================================================================

  /**
   * Read, plan and compare-and-set, re-planning on a version conflict.
   * A plan whose target equals the current state writes the patch without a
   * transition event.
   *
   * @returns The written record, or null when the plan declined, the edge is
   *   not in the state machine, or conflicts persisted
   */
  private async transition(
    id: string,
    plan: (current: ApplicationRecord) => TransitionPlan
  ): Promise<ApplicationRecord | null> {
    for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
      const current = await this.require(id);
      const step = plan(current);
      if (!step) return null;

      const changesState = step.to !== current.state;
      if (changesState && !canTransition(current.state, step.to)) {
        this.logger.warn('Illegal transition refused', { applicationId: id, from: current.state, to: step.to });
        return null;
      }

      const now = this.clock.now();
      const next: ApplicationRecord = {
        ...current,
        ...step.patch,
        state: step.to,
        updatedAt: now,
        ...(changesState && isTerminal(step.to) ? { archivedAt: now } : {}),
      };

      let saved: ApplicationRecord;
      try {
        saved = await this.deps.applications.compareAndSet(next, current.version);
      } catch (error) {
        if (error instanceof ConflictError) {
          this.logger.debug('Version conflict, retrying transition', { applicationId: id, attempt, to: step.to });
          continue;
        }
        throw error;
      }

      if (changesState) {
        const event: TransitionEvent = {
          applicationId: id,
          userId: saved.userId,
          from: current.state,
          to: saved.state,
          version: saved.version,
          at: now,
        };
        this.deps.tracker.recordTransition(event);
        this.logger.info('Application transitioned', {
          applicationId: id,
          from: event.from,
          to: event.to,
          version: event.version,
          reason: saved.reason,
        });
        this.emit('transition', event);
      }
      return saved;
    }

    this.logger.error('Transition abandoned after repeated version conflicts', {
      applicationId: id,
      attempts: MAX_CAS_ATTEMPTS,
    });
    return null;
  }

  private async require(id: string): Promise<ApplicationRecord> {
    const record = await this.deps.applications.get(id);
    if (!record) {
      throw new NotFoundError('ApplicationRecord', id);
    }
    return record;
  }

  private track(task: Promise<void>, applicationId: string): void {
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        this.logger.error('Background step failed', { applicationId, error: getErrorMessage(error) });
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }
}
