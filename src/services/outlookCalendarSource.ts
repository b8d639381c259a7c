// src/services/outlookCalendarSource.ts
import { z } from 'zod';
import type { Logger } from '../lib/logger.js';
import { AuthExpiredError, SourceUnavailableError, describeError } from '../lib/errors.js';
import type { CalendarSource, RawEvent, TimeWindow } from '../types/calendar.js';

export const GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0';
const PAGE_SIZE = 100;

/**
 * Injectable fetch so tests never touch the network
 */
export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

const graphDateTimeSchema = z.object({
  dateTime: z.string().optional(),
  timeZone: z.string().optional(),
});

const graphEventSchema = z.object({
  id: z.string().optional(),
  subject: z.string().nullish(),
  start: graphDateTimeSchema.nullish(),
  end: graphDateTimeSchema.nullish(),
  isAllDay: z.boolean().optional(),
  isCancelled: z.boolean().optional(),
});

const calendarViewPageSchema = z.object({
  value: z.array(graphEventSchema),
  '@odata.nextLink': z.string().optional(),
});

const graphErrorSchema = z.object({
  error: z.object({ message: z.string() }),
});

export interface OutlookCalendarSourceOptions {
  fetchFn?: FetchFn;
  baseUrl?: string;
  logger?: Logger;
}

/**
 * Pull the human-readable message out of a Graph error body (falls back to the raw text)
 */
function extractErrorMessage(rawText: string): string {
  try {
    const parsed = graphErrorSchema.safeParse(JSON.parse(rawText));
    return parsed.success ? parsed.data.error.message : rawText;
  } catch {
    // Gateways answer with HTML or plain text
    return rawText;
  }
}

/**
 * Outlook calendar read access through Microsoft Graph.
 *
 * Times are requested in UTC (`Prefer: outlook.timezone="UTC"`) so every
 * record carries an explicit zone for the normalizer.
 */
export class OutlookCalendarSource implements CalendarSource {
  readonly origin = 'outlook' as const;
  private readonly accessToken: string;
  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;
  private readonly logger: Logger | undefined;

  constructor(accessToken: string, options: OutlookCalendarSourceOptions = {}) {
    this.accessToken = accessToken;
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.baseUrl = options.baseUrl ?? GRAPH_BASE_URL;
    this.logger = options.logger;
  }

  /**
   * Event occurrences in the window, following @odata.nextLink.
   * Cancelled occurrences are skipped.
   *
   * @throws AuthExpiredError on 401
   * @throws SourceUnavailableError on network errors, other HTTP failures or an unexpected body
   */
  async listEvents(window: TimeWindow): Promise<RawEvent[]> {
    const first = new URL(`${this.baseUrl}/me/calendarView`);
    first.searchParams.set('startDateTime', window.start.toISOString());
    first.searchParams.set('endDateTime', window.end.toISOString());
    first.searchParams.set('$select', 'id,subject,start,end,isAllDay,isCancelled');
    first.searchParams.set('$orderby', 'start/dateTime');
    first.searchParams.set('$top', String(PAGE_SIZE));

    const events: RawEvent[] = [];
    let next: string | undefined = first.toString();
    let pages = 0;

    while (next) {
      const page = await this.requestPage(next);
      pages++;
      for (const item of page.value) {
        if (item.isCancelled) continue;
        events.push({ origin: 'outlook', payload: item });
      }
      next = page['@odata.nextLink'];
    }

    this.logger?.debug({ count: events.length, pages }, 'Fetched Outlook events');
    return events;
  }

  private async requestPage(url: string): Promise<z.infer<typeof calendarViewPageSchema>> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          Prefer: 'outlook.timezone="UTC"',
          Accept: 'application/json',
        },
      });
    } catch (error) {
      throw new SourceUnavailableError('outlook', describeError(error), { cause: error });
    }

    if (!response.ok) {
      const message = extractErrorMessage(await response.text());
      if (response.status === 401) {
        throw new AuthExpiredError('outlook', message);
      }
      throw new SourceUnavailableError('outlook', `HTTP ${response.status}: ${message}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SourceUnavailableError('outlook', 'response is not JSON', { cause: error });
    }

    const parsed = calendarViewPageSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailableError('outlook', `unexpected response shape: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
