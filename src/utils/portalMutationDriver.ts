// src/utils/portalMutationDriver.ts
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from '../lib/logger.js';
import {
  PortalStepError,
  PortalStepTimeoutError,
  describeError,
  type PortalStep,
} from '../lib/errors.js';
import { normalize, DEFAULT_REDACTION_LABEL } from './eventNormalizer.js';
import { isSameOccurrence } from './overlapResolver.js';
import type { NormalizedEvent, PortalRawBlock, TimeWindow } from '../types/calendar.js';
import type { ChangeApplier, SyncOutcome } from '../types/sync.js';

/**
 * Block to create through the portal's availability form
 */
export interface PortalBlockRequest {
  start: Date;
  end: Date;
  label: string;
  timeZone: string;
}

/**
 * UI-level operations on the scheduling portal. One session per run;
 * implementations drive a real browser, tests use an in-memory fake.
 *
 * Calls must eventually settle: a call that overruns its step timeout is
 * still awaited before the next one starts.
 */
export interface PortalSession {
  isAuthenticated(): Promise<boolean>;
  authenticate(): Promise<void>;
  /** Bring the availability editor into view */
  openAvailability(): Promise<void>;
  /** Blocks shown by the portal on the days covering `window` */
  listBlocks(window: TimeWindow): Promise<PortalRawBlock[]>;
  submitBlock(block: PortalBlockRequest): Promise<void>;
  close(): Promise<void>;
}

export interface PortalMutationDriverOptions {
  stepTimeoutMs: number;
  retryDelayMs: number;
  /** Zone the portal shows wall-clock times in */
  timeZone: string;
  blockLabel?: string;
  logger?: Logger;
}

type ResumePoint = Extract<PortalStep, 'navigate' | 'check_presence'>;

/**
 * Applies approved events to the portal as busy blocks.
 *
 * Every write is preceded by a presence check, so re-applying an event
 * that already landed yields `already_present` instead of a second block.
 * A failing event is reported and the next one is attempted. Portal
 * calls never overlap, including after a step timeout.
 */
export class PortalMutationDriver implements ChangeApplier {
  private readonly session: PortalSession;
  private readonly options: Required<Omit<PortalMutationDriverOptions, 'logger'>>;
  private readonly logger: Logger | undefined;
  private authAttempted = false;
  private loginFailure: string | null = null;
  /** UI action that outlived its step timeout and may still be driving the page */
  private straggler: Promise<unknown> | null = null;

  constructor(session: PortalSession, options: PortalMutationDriverOptions) {
    this.session = session;
    this.options = {
      stepTimeoutMs: options.stepTimeoutMs,
      retryDelayMs: options.retryDelayMs,
      timeZone: options.timeZone,
      blockLabel: options.blockLabel ?? DEFAULT_REDACTION_LABEL,
    };
    this.logger = options.logger;
  }

  async apply(event: NormalizedEvent): Promise<SyncOutcome> {
    const eventRef = event.sourceId;

    const loginFailure = await this.ensureAuthenticated();
    if (loginFailure) {
      return this.failed(eventRef, loginFailure);
    }

    let resumeAt: ResumePoint = 'navigate';
    for (let attempt = 0; ; attempt++) {
      try {
        const result = await this.attempt(event, resumeAt);
        this.logger?.info({ eventRef, result, attempt }, 'Portal event applied');
        return { eventRef, target: 'portal', result };
      } catch (error) {
        const step = error instanceof PortalStepError ? error.step : 'submit_block';
        const detail = `${step} failed: ${describeError(error)}`;
        if (attempt >= 1) {
          await this.settleStraggler();
          return this.failed(eventRef, detail);
        }
        this.logger?.warn({ eventRef, step, err: error }, 'Portal step failed, retrying once');
        // A retried submit re-checks presence in case the first write landed
        resumeAt = step === 'navigate' ? 'navigate' : 'check_presence';
        await delay(this.options.retryDelayMs);
      }
    }
  }

  /**
   * Log in once per run. Returns the cached failure detail, if any.
   */
  private async ensureAuthenticated(): Promise<string | null> {
    if (this.authAttempted) {
      return this.loginFailure;
    }
    this.authAttempted = true;

    try {
      await this.step('authenticate', async () => {
        if (!(await this.session.isAuthenticated())) {
          await this.session.authenticate();
        }
      });
    } catch (error) {
      this.loginFailure = `authenticate failed: ${describeError(error)}`;
      this.logger?.error({ err: error }, 'Portal login failed');
    }
    return this.loginFailure;
  }

  private async attempt(
    event: NormalizedEvent,
    resumeAt: ResumePoint
  ): Promise<'blocked' | 'already_present'> {
    if (resumeAt === 'navigate') {
      await this.step('navigate', () => this.session.openAvailability());
    }

    const present = await this.step('check_presence', () => this.isPresent(event));
    if (present) {
      return 'already_present';
    }

    await this.step('submit_block', () =>
      this.session.submitBlock({
        start: event.start,
        end: event.end,
        label: this.options.blockLabel,
        timeZone: this.options.timeZone,
      })
    );
    return 'blocked';
  }

  private async isPresent(event: NormalizedEvent): Promise<boolean> {
    const blocks = await this.session.listBlocks({ start: event.start, end: event.end });
    for (const block of blocks) {
      const existing = normalize({ origin: 'portal', payload: block });
      if (isSameOccurrence(existing, event)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Run one UI step under the configured time limit
   */
  private async step<T>(name: PortalStep, action: () => Promise<T>): Promise<T> {
    await this.settleStraggler();

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new PortalStepTimeoutError(name, this.options.stepTimeoutMs)),
        this.options.stepTimeoutMs
      );
    });

    const running = action();
    try {
      return await Promise.race([running, timeout]);
    } catch (error) {
      if (error instanceof PortalStepTimeoutError) {
        // The page is still busy; nothing else may touch it until this settles
        this.straggler = running;
      }
      if (error instanceof PortalStepError) {
        throw error;
      }
      throw new PortalStepError(name, describeError(error), { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Wait for a timed-out action to finish before the page is used again.
   * Its own outcome is already reported as the step failure.
   */
  private async settleStraggler(): Promise<void> {
    const straggler = this.straggler;
    if (!straggler) return;
    this.straggler = null;
    try {
      await straggler;
      this.logger?.debug('Timed-out portal action finished late');
    } catch (error) {
      this.logger?.debug({ err: error }, 'Timed-out portal action failed late');
    }
  }

  private failed(eventRef: string, errorDetail: string): SyncOutcome {
    this.logger?.error({ eventRef, errorDetail }, 'Portal event failed');
    return { eventRef, target: 'portal', result: 'failed', errorDetail };
  }
}
