// src/services/syncOrchestrator.ts
import type { Logger } from '../lib/logger.js';
import {
  ApprovalInProgressError,
  InvalidWindowError,
  NoPendingApprovalError,
  describeError,
} from '../lib/errors.js';
import { normalizeAll, redactForPortal, DEFAULT_REDACTION_LABEL } from '../utils/eventNormalizer.js';
import { compareEvents, resolve } from '../utils/overlapResolver.js';
import type { ApprovalWorkflow } from '../utils/approvalWorkflow.js';
import {
  PortalMutationDriver,
  type PortalMutationDriverOptions,
  type PortalSession,
} from '../utils/portalMutationDriver.js';
import type { CalendarSource, NormalizedEvent, TimeWindow } from '../types/calendar.js';
import type {
  ApprovalRequest,
  CandidateChange,
  ChangeApplier,
  RunReport,
  SyncOutcome,
  SyncTarget,
} from '../types/sync.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_TARGETS: readonly SyncTarget[] = ['portal'];

/**
 * Counters fed by the orchestrator (implemented by the metrics plugin)
 */
export interface SyncMetrics {
  recordOutcome(outcome: SyncOutcome): void;
  recordApproval(status: 'requested' | 'resolved' | 'abandoned' | 'up_to_date'): void;
}

export interface PortalTargetConfig {
  /** Opens a fresh session; called at most once per applied run */
  openSession: () => Promise<PortalSession>;
  driver: Omit<PortalMutationDriverOptions, 'logger'>;
}

export interface SyncOrchestratorOptions {
  google: CalendarSource;
  outlook: CalendarSource;
  workflow: ApprovalWorkflow;
  portal?: PortalTargetConfig;
  /** Writes approved Outlook events into Google Calendar */
  secondaryWriter?: ChangeApplier;
  defaultHorizonDays?: number;
  redactionLabel?: string;
  now?: () => Date;
  logger?: Logger;
  metrics?: SyncMetrics;
}

export interface RunSyncOptions {
  horizonDays?: number;
  targets?: readonly SyncTarget[];
}

export type SyncPass =
  | { status: 'up_to_date'; report: RunReport }
  | { status: 'awaiting_approval'; request: ApprovalRequest; window: TimeWindow };

interface PendingRun {
  requestId: string;
  window: TimeWindow;
  targets: SyncTarget[];
  startedAt: Date;
}

function emptyCounts(): RunReport['counts'] {
  return { blocked: 0, alreadyPresent: 0, failed: 0 };
}

/**
 * Drives one reconciliation pass: fetch, normalize, resolve, ask, apply.
 *
 * The pass is split in two calls around the human decision: runSync()
 * stops at the approval request, submitDecision() applies what was chosen.
 * Only one pass is active at a time.
 */
export class SyncOrchestrator {
  private readonly options: SyncOrchestratorOptions;
  private readonly workflow: ApprovalWorkflow;
  private readonly now: () => Date;
  private readonly logger: Logger | undefined;
  private passInFlight = false;
  private pendingRun: PendingRun | null = null;

  constructor(options: SyncOrchestratorOptions) {
    this.options = options;
    this.workflow = options.workflow;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  /**
   * Fetch both calendars and propose changes for the targets.
   *
   * @throws InvalidWindowError for a non-positive horizon
   * @throws ApprovalInProgressError while another pass is open
   * @throws SourceUnavailableError | AuthExpiredError from either source
   * @throws MalformedEventError when a record cannot be normalized
   */
  async runSync(options: RunSyncOptions = {}): Promise<SyncPass> {
    const horizonDays = options.horizonDays ?? this.options.defaultHorizonDays ?? 7;
    if (!Number.isFinite(horizonDays) || horizonDays <= 0) {
      throw new InvalidWindowError(horizonDays);
    }
    this.assertIdle();

    const targets = [...new Set(options.targets ?? DEFAULT_TARGETS)];
    this.assertTargetsConfigured(targets);

    this.passInFlight = true;
    try {
      const startedAt = this.now();
      const window: TimeWindow = {
        start: startedAt,
        end: new Date(startedAt.getTime() + horizonDays * DAY_MS),
      };
      this.logger?.info({ window, targets }, 'Starting reconciliation pass');

      const [googleRaw, outlookRaw] = await Promise.all([
        this.options.google.listEvents(window),
        this.options.outlook.listEvents(window),
      ]);
      const googleEvents = normalizeAll(googleRaw);
      const outlookEvents = normalizeAll(outlookRaw);

      const candidates = targets.flatMap((target) =>
        this.candidatesFor(target, googleEvents, outlookEvents)
      );
      this.logger?.info(
        { google: googleEvents.length, outlook: outlookEvents.length, candidates: candidates.length },
        'Resolved candidate changes'
      );

      if (candidates.length === 0) {
        this.options.metrics?.recordApproval('up_to_date');
        return {
          status: 'up_to_date',
          report: {
            window,
            targets,
            selected: 0,
            counts: emptyCounts(),
            outcomes: [],
            startedAt,
            finishedAt: this.now(),
          },
        };
      }

      const request = this.workflow.requestApproval(candidates);
      this.pendingRun = { requestId: request.id, window, targets, startedAt };
      this.options.metrics?.recordApproval('requested');
      return { status: 'awaiting_approval', request, window };
    } finally {
      this.passInFlight = false;
    }
  }

  /**
   * Request waiting for a human decision, if any
   */
  pendingApproval(): ApprovalRequest | null {
    this.expireStaleRequest();
    return this.workflow.pending;
  }

  /**
   * Apply the human decision to the pending request.
   *
   * Approved candidates are applied once each, in candidate order; a
   * failure is recorded in the report and the rest still run.
   *
   * @throws NoPendingApprovalError when nothing is waiting
   * @throws InvalidSelectionError when the selector cannot be parsed (the request stays pending)
   */
  async submitDecision(selector: string): Promise<RunReport> {
    if (this.passInFlight) {
      throw new ApprovalInProgressError();
    }
    this.expireStaleRequest();
    const request = this.workflow.pending;
    const run = this.pendingRun;
    if (!request || !run || run.requestId !== request.id) {
      throw new NoPendingApprovalError();
    }

    const selectedEvents = this.workflow.submitSelection(selector);
    this.options.metrics?.recordApproval('resolved');
    const chosen = request.candidates.filter((c) => selectedEvents.includes(c.event));

    this.passInFlight = true;
    let portal: { driver: PortalMutationDriver; session: PortalSession } | null = null;
    let portalFailure: string | null = null;
    const outcomes: SyncOutcome[] = [];

    try {
      for (const candidate of chosen) {
        let outcome: SyncOutcome;
        if (candidate.action === 'block_in_portal') {
          if (!portal && !portalFailure) {
            try {
              portal = await this.openPortal();
            } catch (error) {
              portalFailure = `authenticate failed: ${describeError(error)}`;
              this.logger?.error({ err: error }, 'Could not open portal session');
            }
          }
          outcome = portal
            ? await portal.driver.apply(candidate.event)
            : {
                eventRef: candidate.event.sourceId,
                target: 'portal',
                result: 'failed',
                errorDetail: portalFailure ?? 'portal unavailable',
              };
        } else {
          outcome = await this.applySecondary(candidate.event);
        }
        outcomes.push(outcome);
        this.options.metrics?.recordOutcome(outcome);
      }
    } finally {
      if (portal) {
        await this.closeSession(portal.session);
      }
      this.workflow.acknowledge();
      this.pendingRun = null;
      this.passInFlight = false;
    }

    const report: RunReport = {
      window: run.window,
      targets: run.targets,
      selected: chosen.length,
      counts: tally(outcomes),
      outcomes,
      startedAt: run.startedAt,
      finishedAt: this.now(),
    };
    this.logger?.info({ requestId: request.id, counts: report.counts }, 'Reconciliation pass applied');
    return report;
  }

  /**
   * Drop the pending request; nothing is applied
   */
  abandon(reason: string): ApprovalRequest {
    if (this.passInFlight) {
      throw new ApprovalInProgressError();
    }
    this.expireStaleRequest();
    const abandoned = this.workflow.abandon(reason);
    this.pendingRun = null;
    this.options.metrics?.recordApproval('abandoned');
    return abandoned;
  }

  private assertIdle(): void {
    if (this.passInFlight) {
      throw new ApprovalInProgressError();
    }
    this.expireStaleRequest();
    const pending = this.workflow.pending;
    if (pending) {
      throw new ApprovalInProgressError(pending.id);
    }
  }

  /**
   * Abandon a request whose deadline has passed, counting it like any other abandon
   */
  private expireStaleRequest(): void {
    if (this.workflow.expireIfStale()) {
      this.pendingRun = null;
      this.options.metrics?.recordApproval('abandoned');
    }
  }

  private assertTargetsConfigured(targets: readonly SyncTarget[]): void {
    if (targets.includes('portal') && !this.options.portal) {
      throw new Error('Portal target is not configured');
    }
    if (targets.includes('google') && !this.options.secondaryWriter) {
      throw new Error('Google Calendar writer is not configured');
    }
  }

  private candidatesFor(
    target: SyncTarget,
    googleEvents: NormalizedEvent[],
    outlookEvents: NormalizedEvent[]
  ): CandidateChange[] {
    switch (target) {
      case 'portal': {
        // Presence in the portal is re-checked by the driver right before each write.
        // Outlook is resolved against Google so cross-calendar overlaps are flagged.
        const label = this.options.redactionLabel ?? DEFAULT_REDACTION_LABEL;
        const google = googleEvents.map((e) => redactForPortal(e, label));
        const outlook = outlookEvents.map((e) => redactForPortal(e, label));
        return [
          ...resolve([], google, 'block_in_portal'),
          ...resolve(google, outlook, 'block_in_portal'),
        ].sort((a, b) => compareEvents(a.event, b.event));
      }
      case 'google':
        return resolve(googleEvents, outlookEvents, 'create_in_secondary');
    }
  }

  private async openPortal(): Promise<{ driver: PortalMutationDriver; session: PortalSession }> {
    const config = this.options.portal;
    if (!config) {
      throw new Error('Portal target is not configured');
    }
    const session = await config.openSession();
    const driver = new PortalMutationDriver(session, { ...config.driver, logger: this.logger });
    return { driver, session };
  }

  private async applySecondary(event: NormalizedEvent): Promise<SyncOutcome> {
    const writer = this.options.secondaryWriter;
    if (!writer) {
      return {
        eventRef: event.sourceId,
        target: 'google',
        result: 'failed',
        errorDetail: 'Google Calendar writer is not configured',
      };
    }
    return writer.apply(event);
  }

  private async closeSession(session: PortalSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.logger?.warn({ err: error }, 'Failed to close portal session');
    }
  }
}

function tally(outcomes: readonly SyncOutcome[]): RunReport['counts'] {
  const counts = emptyCounts();
  for (const outcome of outcomes) {
    switch (outcome.result) {
      case 'blocked':
        counts.blocked++;
        break;
      case 'already_present':
        counts.alreadyPresent++;
        break;
      case 'failed':
        counts.failed++;
        break;
    }
  }
  return counts;
}
