// src/types/calendar.ts
import type { calendar_v3 } from 'googleapis';

/**
 * System that produced an event
 */
export type EventOrigin = 'outlook' | 'google' | 'portal';

/**
 * Half-open time range [start, end)
 */
export interface TimeWindow {
  start: Date;
  end: Date;
}

/**
 * Canonical representation of one calendar occurrence.
 * Built only by the normalizer; start < end always holds.
 */
export interface NormalizedEvent {
  readonly sourceId: string; // Unique within origin, stable across fetches
  readonly origin: EventOrigin;
  readonly title: string; // What the destination receives (redacted for the portal)
  readonly displayTitle: string; // Original title, shown to the human only
  readonly start: Date;
  readonly end: Date;
  readonly allDay: boolean;
  readonly timeZone?: string; // IANA zone reported by the provider, if any
}

/**
 * Subset of a Microsoft Graph event that we consume
 */
export interface OutlookRawEvent {
  id?: string;
  subject?: string | null;
  start?: { dateTime?: string; timeZone?: string } | null;
  end?: { dateTime?: string; timeZone?: string } | null;
  isAllDay?: boolean;
  isCancelled?: boolean;
}

/**
 * A busy block as shown by the scheduling portal UI.
 * Times are wall-clock values in the portal's time zone.
 */
export interface PortalRawBlock {
  id?: string;
  date: string; // yyyy-MM-dd
  startTime: string; // HH:mm
  endTime: string; // HH:mm
  label: string;
  timeZone: string;
}

/**
 * Provider record tagged with the system it came from
 */
export type RawEvent =
  | { origin: 'google'; payload: calendar_v3.Schema$Event }
  | { origin: 'outlook'; payload: OutlookRawEvent }
  | { origin: 'portal'; payload: PortalRawBlock };

/**
 * Read access to one calendar service
 */
export interface CalendarSource {
  readonly origin: Exclude<EventOrigin, 'portal'>;
  listEvents(window: TimeWindow): Promise<RawEvent[]>;
}
