// src/services/secondaryCalendarWriter.ts
import type { Logger } from '../lib/logger.js';
import { describeError } from '../lib/errors.js';
import { normalizeAll } from '../utils/eventNormalizer.js';
import { isSameOccurrence } from '../utils/overlapResolver.js';
import type { NormalizedEvent } from '../types/calendar.js';
import type { ChangeApplier, SyncOutcome } from '../types/sync.js';
import type { GoogleCalendarSource } from './googleCalendarSource.js';

export const SYNCED_DESCRIPTION = 'Synced from Outlook';

export type GoogleCalendarWriter = Pick<GoogleCalendarSource, 'listEvents' | 'insertEvent'>;

/**
 * Copies approved Outlook events into Google Calendar.
 * Re-checks the calendar right before each insert, so an event that
 * appeared since the fetch is reported as already present.
 */
export class SecondaryCalendarWriter implements ChangeApplier {
  private readonly calendar: GoogleCalendarWriter;
  private readonly logger: Logger | undefined;

  constructor(calendar: GoogleCalendarWriter, logger?: Logger) {
    this.calendar = calendar;
    this.logger = logger;
  }

  async apply(event: NormalizedEvent): Promise<SyncOutcome> {
    const eventRef = event.sourceId;

    let present: boolean;
    try {
      const existing = normalizeAll(
        await this.calendar.listEvents({ start: event.start, end: event.end })
      );
      present = existing.some((e) => !e.allDay && isSameOccurrence(e, event));
    } catch (error) {
      return this.failed(eventRef, `check_presence failed: ${describeError(error)}`);
    }

    if (present) {
      this.logger?.info({ eventRef }, 'Event already in Google Calendar');
      return { eventRef, target: 'google', result: 'already_present' };
    }

    try {
      const createdId = await this.calendar.insertEvent(event, SYNCED_DESCRIPTION);
      this.logger?.info({ eventRef, createdId }, 'Event copied to Google Calendar');
      return { eventRef, target: 'google', result: 'blocked' };
    } catch (error) {
      return this.failed(eventRef, `insert failed: ${describeError(error)}`);
    }
  }

  private failed(eventRef: string, errorDetail: string): SyncOutcome {
    this.logger?.error({ eventRef, errorDetail }, 'Google Calendar copy failed');
    return { eventRef, target: 'google', result: 'failed', errorDetail };
  }
}
