// src/lib/syncContext.test.ts
import { describe, it, expect, vi } from 'vitest';
import { createSyncContext } from './syncContext.js';
import { loadConfig } from '../config/env.js';

const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

const CREDENTIALS = {
  GOOGLE_CLIENT_ID: 'test-client-id',
  GOOGLE_CLIENT_SECRET: 'test-secret',
  GOOGLE_REFRESH_TOKEN: 'test-refresh-token',
  OUTLOOK_ACCESS_TOKEN: 'test-token',
};

describe('createSyncContext', () => {
  it('should wire both sources and the configured display zone', () => {
    const cfg = loadConfig({ ...CREDENTIALS, DISPLAY_TIMEZONE: 'Europe/Berlin', SYNC_HORIZON_DAYS: '10' });

    const context = createSyncContext(cfg, { logger });

    expect(context.sources.google.origin).toBe('google');
    expect(context.sources.outlook.origin).toBe('outlook');
    expect(context.displayTimeZone).toBe('Europe/Berlin');
    expect(context.defaultHorizonDays).toBe(10);
    expect(context.orchestrator.pendingApproval()).toBeNull();
  });

  it('should name the first missing Google credential', () => {
    const cfg = loadConfig({ ...CREDENTIALS, GOOGLE_REFRESH_TOKEN: '' });

    expect(() => createSyncContext(cfg, { logger })).toThrow(
      'GOOGLE_REFRESH_TOKEN is required for Google Calendar access'
    );
  });

  it('should require the Outlook token', () => {
    const cfg = loadConfig({ ...CREDENTIALS, OUTLOOK_ACCESS_TOKEN: undefined });

    expect(() => createSyncContext(cfg, { logger })).toThrow(
      'OUTLOOK_ACCESS_TOKEN is required for Outlook calendar access'
    );
  });

  it('should start without portal credentials', () => {
    const cfg = loadConfig(CREDENTIALS);

    expect(cfg.PORTAL_URL).toBeUndefined();
    expect(() => createSyncContext(cfg, { logger })).not.toThrow();
  });
});
