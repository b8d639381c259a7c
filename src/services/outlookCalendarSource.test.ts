// src/services/outlookCalendarSource.test.ts
import { describe, it, expect, vi } from 'vitest';
import { OutlookCalendarSource, type FetchFn } from './outlookCalendarSource.js';
import { AuthExpiredError, SourceUnavailableError } from '../lib/errors.js';

const window = {
  start: new Date('2026-10-19T00:00:00Z'),
  end: new Date('2026-10-26T00:00:00Z'),
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function graphEvent(id: string, extra: Record<string, unknown> = {}) {
  return {
    id,
    subject: `Meeting ${id}`,
    start: { dateTime: '2026-10-20T14:00:00.0000000', timeZone: 'UTC' },
    end: { dateTime: '2026-10-20T15:00:00.0000000', timeZone: 'UTC' },
    isAllDay: false,
    isCancelled: false,
    ...extra,
  };
}

describe('OutlookCalendarSource', () => {
  it('should request the calendar view in UTC with a bearer token', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ value: [] }));
    const source = new OutlookCalendarSource('test-token', { fetchFn });

    await source.listEvents(window);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [input, init] = fetchFn.mock.calls[0] ?? [];
    const url = new URL(String(input));
    expect(url.origin + url.pathname).toBe('https://graph.microsoft.com/v1.0/me/calendarView');
    expect(url.searchParams.get('startDateTime')).toBe('2026-10-19T00:00:00.000Z');
    expect(url.searchParams.get('endDateTime')).toBe('2026-10-26T00:00:00.000Z');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-token',
      Prefer: 'outlook.timezone="UTC"',
      Accept: 'application/json',
    });
  });

  it('should follow nextLink pages and skip cancelled occurrences', async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockResolvedValueOnce(
        jsonResponse({
          value: [graphEvent('o1'), graphEvent('o2', { isCancelled: true })],
          '@odata.nextLink': 'https://graph.microsoft.com/v1.0/me/calendarView?$skip=2',
        })
      )
      .mockResolvedValueOnce(jsonResponse({ value: [graphEvent('o3')] }));
    const source = new OutlookCalendarSource('test-token', { fetchFn });

    const events = await source.listEvents(window);

    expect(events.map((e) => e.payload.id)).toEqual(['o1', 'o3']);
    expect(events.every((e) => e.origin === 'outlook')).toBe(true);
    expect(fetchFn.mock.calls[1]?.[0]).toBe('https://graph.microsoft.com/v1.0/me/calendarView?$skip=2');
  });

  it('should map 401 to AuthExpiredError with the Graph message', async () => {
    const fetchFn = vi.fn<FetchFn>(async () =>
      jsonResponse({ error: { code: 'InvalidAuthenticationToken', message: 'Token expired' } }, 401)
    );
    const source = new OutlookCalendarSource('test-token', { fetchFn });

    const error = await source.listEvents(window).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthExpiredError);
    expect(error).toHaveProperty('message', 'outlook authorization failed: Token expired');
  });

  it('should map server errors to SourceUnavailableError', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('<html>Bad Gateway</html>', { status: 502 }));
    const source = new OutlookCalendarSource('test-token', { fetchFn });

    await expect(source.listEvents(window)).rejects.toThrow(
      'outlook calendar unavailable: HTTP 502: <html>Bad Gateway</html>'
    );
  });

  it('should map network failures to SourceUnavailableError', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new TypeError('fetch failed');
    });
    const source = new OutlookCalendarSource('test-token', { fetchFn });

    await expect(source.listEvents(window)).rejects.toThrow(SourceUnavailableError);
  });

  it('should reject a body that is not a calendar view page', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ items: [] }));
    const source = new OutlookCalendarSource('test-token', { fetchFn });

    await expect(source.listEvents(window)).rejects.toThrow(SourceUnavailableError);
  });
});
