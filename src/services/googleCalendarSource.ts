// src/services/googleCalendarSource.ts
import { google, type Auth, type calendar_v3 } from 'googleapis';
import type { Logger } from '../lib/logger.js';
import { AuthExpiredError, SourceUnavailableError, describeError } from '../lib/errors.js';
import type { CalendarSource, NormalizedEvent, RawEvent, TimeWindow } from '../types/calendar.js';

const PAGE_SIZE = 250;

export interface GoogleCalendarSourceOptions {
  calendarId?: string;
  logger?: Logger;
}

/**
 * Build an OAuth2 client from a refresh token obtained out of band
 */
export function createGoogleAuth(
  clientId: string,
  clientSecret: string,
  refreshToken: string
): Auth.OAuth2Client {
  const auth = new google.auth.OAuth2(clientId, clientSecret);
  auth.setCredentials({ refresh_token: refreshToken });
  return auth;
}

function httpStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') return response.status;
  }
  return undefined;
}

/**
 * Map a googleapis failure onto the sync error taxonomy
 */
export function toGoogleSourceError(error: unknown): AuthExpiredError | SourceUnavailableError {
  const message = describeError(error);
  if (httpStatus(error) === 401 || message.includes('invalid_grant')) {
    return new AuthExpiredError('google', message);
  }
  return new SourceUnavailableError('google', message, { cause: error });
}

/**
 * Google Calendar read/write access for one calendar
 */
export class GoogleCalendarSource implements CalendarSource {
  readonly origin = 'google' as const;
  private readonly calendar: calendar_v3.Calendar;
  private readonly calendarId: string;
  private readonly logger: Logger | undefined;

  constructor(auth: Auth.OAuth2Client, options: GoogleCalendarSourceOptions = {}) {
    this.calendar = google.calendar({ version: 'v3', auth });
    this.calendarId = options.calendarId ?? 'primary';
    this.logger = options.logger;
  }

  /**
   * Expanded (single) events overlapping the window, ordered by start.
   * Cancelled instances are skipped.
   *
   * @throws AuthExpiredError when Google rejects the credentials
   * @throws SourceUnavailableError on any other failure
   */
  async listEvents(window: TimeWindow): Promise<RawEvent[]> {
    const events: RawEvent[] = [];
    let pageToken: string | undefined;

    try {
      do {
        const response = await this.calendar.events.list({
          calendarId: this.calendarId,
          timeMin: window.start.toISOString(),
          timeMax: window.end.toISOString(),
          singleEvents: true,
          orderBy: 'startTime',
          maxResults: PAGE_SIZE,
          pageToken,
        });

        for (const item of response.data.items ?? []) {
          if (item.status === 'cancelled') continue;
          events.push({ origin: 'google', payload: item });
        }
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);
    } catch (error) {
      throw toGoogleSourceError(error);
    }

    this.logger?.debug(
      { calendarId: this.calendarId, count: events.length },
      'Fetched Google Calendar events'
    );
    return events;
  }

  /**
   * Create a timed event carrying the original title
   *
   * @returns Id of the created event
   */
  async insertEvent(event: NormalizedEvent, description: string): Promise<string> {
    try {
      const response = await this.calendar.events.insert({
        calendarId: this.calendarId,
        requestBody: {
          summary: event.displayTitle,
          description,
          start: { dateTime: event.start.toISOString(), timeZone: event.timeZone ?? 'UTC' },
          end: { dateTime: event.end.toISOString(), timeZone: event.timeZone ?? 'UTC' },
        },
      });
      return response.data.id ?? '';
    } catch (error) {
      throw toGoogleSourceError(error);
    }
  }
}
