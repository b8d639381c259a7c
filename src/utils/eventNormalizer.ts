// src/utils/eventNormalizer.ts
import { isValid, parseISO } from 'date-fns';
import { fromZonedTime } from 'date-fns-tz';
import type { calendar_v3 } from 'googleapis';
import { MalformedEventError } from '../lib/errors.js';
import type {
  EventOrigin,
  NormalizedEvent,
  OutlookRawEvent,
  PortalRawBlock,
  RawEvent,
} from '../types/calendar.js';

export const DEFAULT_REDACTION_LABEL = 'Busy';
const UNTITLED = '(No title)';

const OFFSET_SUFFIX = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const WALL_CLOCK = /^\d{2}:\d{2}$/;

export interface NormalizeOptions {
  /** System the event is about to be written to */
  destination?: EventOrigin;
  /** Title the portal receives instead of the original */
  redactionLabel?: string;
}

interface Interval {
  start: Date;
  end: Date;
  allDay: boolean;
}

/**
 * Convert a provider record into a NormalizedEvent.
 *
 * Records without a distinguishable end, with unparsable times, or with
 * start >= end are rejected with MalformedEventError; nothing is clamped
 * or defaulted. All-day is taken from the provider's date-only flag.
 *
 * @param raw - Provider record tagged with its origin
 * @param options - Destination and redaction settings
 * @returns Canonical event
 */
export function normalize(raw: RawEvent, options: NormalizeOptions = {}): NormalizedEvent {
  const { sourceId, originalTitle, timeZone, interval } = readRecord(raw);

  if (interval.start.getTime() >= interval.end.getTime()) {
    throw new MalformedEventError(
      raw.origin,
      sourceId,
      `start ${interval.start.toISOString()} is not before end ${interval.end.toISOString()}`
    );
  }

  const displayTitle = originalTitle?.trim() ? originalTitle.trim() : UNTITLED;
  const title =
    options.destination === 'portal'
      ? options.redactionLabel ?? DEFAULT_REDACTION_LABEL
      : displayTitle;

  return {
    sourceId,
    origin: raw.origin,
    title,
    displayTitle,
    start: interval.start,
    end: interval.end,
    allDay: interval.allDay,
    ...(timeZone ? { timeZone } : {}),
  };
}

/**
 * Normalize a batch; the first malformed record aborts the batch
 */
export function normalizeAll(raws: RawEvent[], options: NormalizeOptions = {}): NormalizedEvent[] {
  return raws.map((raw) => normalize(raw, options));
}

/**
 * Copy of an event with its title replaced by the portal label
 */
export function redactForPortal(
  event: NormalizedEvent,
  label: string = DEFAULT_REDACTION_LABEL
): NormalizedEvent {
  return { ...event, title: label };
}

function readRecord(raw: RawEvent): {
  sourceId: string;
  originalTitle: string | null | undefined;
  timeZone: string | undefined;
  interval: Interval;
} {
  switch (raw.origin) {
    case 'google': {
      const sourceId = requireId('google', raw.payload.id);
      return {
        sourceId,
        originalTitle: raw.payload.summary,
        timeZone: raw.payload.start?.timeZone ?? undefined,
        interval: googleInterval(sourceId, raw.payload),
      };
    }
    case 'outlook': {
      const sourceId = requireId('outlook', raw.payload.id);
      return {
        sourceId,
        originalTitle: raw.payload.subject,
        timeZone: raw.payload.start?.timeZone ?? undefined,
        interval: outlookInterval(sourceId, raw.payload),
      };
    }
    case 'portal': {
      const block = raw.payload;
      const sourceId = block.id ?? `${block.date}T${block.startTime}-${block.endTime}`;
      return {
        sourceId,
        originalTitle: block.label,
        timeZone: block.timeZone,
        interval: portalInterval(sourceId, block),
      };
    }
  }
}

function requireId(origin: EventOrigin, id: string | null | undefined): string {
  if (!id) {
    throw new MalformedEventError(origin, undefined, 'missing event id');
  }
  return id;
}

function googleInterval(sourceId: string, payload: calendar_v3.Schema$Event): Interval {
  const { start, end } = payload;
  if (!start) {
    throw new MalformedEventError('google', sourceId, 'missing start');
  }
  if (payload.endTimeUnspecified) {
    throw new MalformedEventError('google', sourceId, 'end time unspecified');
  }
  if (!end || (!end.date && !end.dateTime)) {
    throw new MalformedEventError('google', sourceId, 'missing end');
  }

  // Date-only start means the provider flagged a full-day entry
  if (start.date && !start.dateTime) {
    if (!end.date || end.dateTime) {
      throw new MalformedEventError('google', sourceId, 'all-day start with timed end');
    }
    const zone = start.timeZone ?? 'UTC';
    return {
      start: parseDate('google', sourceId, start.date, zone),
      end: parseDate('google', sourceId, end.date, end.timeZone ?? zone),
      allDay: true,
    };
  }

  if (!start.dateTime) {
    throw new MalformedEventError('google', sourceId, 'start has neither date nor dateTime');
  }
  if (!end.dateTime) {
    throw new MalformedEventError('google', sourceId, 'timed start with date-only end');
  }

  return {
    start: parseDateTime('google', sourceId, start.dateTime, start.timeZone ?? undefined),
    end: parseDateTime('google', sourceId, end.dateTime, end.timeZone ?? start.timeZone ?? undefined),
    allDay: false,
  };
}

function outlookInterval(sourceId: string, payload: OutlookRawEvent): Interval {
  const start = payload.start;
  const end = payload.end;
  if (!start?.dateTime) {
    throw new MalformedEventError('outlook', sourceId, 'missing start');
  }
  if (!end?.dateTime) {
    throw new MalformedEventError('outlook', sourceId, 'missing end');
  }
  if (!start.timeZone || !end.timeZone) {
    throw new MalformedEventError('outlook', sourceId, 'missing timeZone');
  }

  if (payload.isAllDay === true) {
    return {
      start: parseDate('outlook', sourceId, start.dateTime.substring(0, 10), start.timeZone),
      end: parseDate('outlook', sourceId, end.dateTime.substring(0, 10), end.timeZone),
      allDay: true,
    };
  }

  return {
    start: parseDateTime('outlook', sourceId, trimFraction(start.dateTime), start.timeZone),
    end: parseDateTime('outlook', sourceId, trimFraction(end.dateTime), end.timeZone),
    allDay: false,
  };
}

function portalInterval(sourceId: string, block: PortalRawBlock): Interval {
  if (!DATE_ONLY.test(block.date)) {
    throw new MalformedEventError('portal', sourceId, `invalid date "${block.date}"`);
  }
  if (!WALL_CLOCK.test(block.startTime) || !WALL_CLOCK.test(block.endTime)) {
    throw new MalformedEventError(
      'portal',
      sourceId,
      `invalid time range "${block.startTime}-${block.endTime}"`
    );
  }
  return {
    start: parseDateTime('portal', sourceId, `${block.date}T${block.startTime}:00`, block.timeZone),
    end: parseDateTime('portal', sourceId, `${block.date}T${block.endTime}:00`, block.timeZone),
    allDay: false,
  };
}

/**
 * Graph returns seven fractional digits (e.g. 09:00:00.0000000); keep milliseconds only
 */
function trimFraction(value: string): string {
  return value.replace(/(\.\d{3})\d+$/, '$1');
}

function parseDateTime(
  origin: EventOrigin,
  sourceId: string,
  value: string,
  timeZone: string | undefined
): Date {
  let parsed: Date;
  if (OFFSET_SUFFIX.test(value)) {
    parsed = parseISO(value);
  } else if (timeZone) {
    parsed = fromZonedTime(value, timeZone);
  } else {
    throw new MalformedEventError(origin, sourceId, `"${value}" has no offset and no time zone`);
  }

  if (!isValid(parsed)) {
    throw new MalformedEventError(
      origin,
      sourceId,
      `cannot parse "${value}"${timeZone ? ` in time zone "${timeZone}"` : ''}`
    );
  }
  return parsed;
}

function parseDate(origin: EventOrigin, sourceId: string, value: string, timeZone: string): Date {
  if (!DATE_ONLY.test(value)) {
    throw new MalformedEventError(origin, sourceId, `invalid date "${value}"`);
  }
  return parseDateTime(origin, sourceId, `${value}T00:00:00`, timeZone);
}
