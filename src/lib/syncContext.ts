// src/lib/syncContext.ts
import type { Logger } from './logger.js';
import { requireConfig, type EnvConfig } from '../config/env.js';
import { GoogleCalendarSource, createGoogleAuth } from '../services/googleCalendarSource.js';
import { OutlookCalendarSource } from '../services/outlookCalendarSource.js';
import { PlaywrightPortalSession } from '../services/portalSession.js';
import { SecondaryCalendarWriter } from '../services/secondaryCalendarWriter.js';
import { SyncOrchestrator, type SyncMetrics } from '../services/syncOrchestrator.js';
import { ApprovalWorkflow } from '../utils/approvalWorkflow.js';
import type { CalendarSource } from '../types/calendar.js';

/**
 * Everything the HTTP routes and the terminal session need for one process
 */
export interface SyncContext {
  orchestrator: SyncOrchestrator;
  sources: Record<CalendarSource['origin'], CalendarSource>;
  displayTimeZone: string;
  defaultHorizonDays: number;
}

export interface SyncContextDeps {
  logger: Logger;
  metrics?: SyncMetrics;
}

/**
 * Wire sources, workflow and orchestrator from configuration.
 *
 * Google and Outlook credentials are required here; portal credentials
 * are read when the first portal session is opened.
 *
 * @throws Error naming the first missing credential
 */
export function createSyncContext(cfg: EnvConfig, deps: SyncContextDeps): SyncContext {
  const { logger, metrics } = deps;

  const googleAuth = createGoogleAuth(
    requireConfig(cfg, 'GOOGLE_CLIENT_ID', 'Google Calendar access'),
    requireConfig(cfg, 'GOOGLE_CLIENT_SECRET', 'Google Calendar access'),
    requireConfig(cfg, 'GOOGLE_REFRESH_TOKEN', 'Google Calendar access')
  );
  const google = new GoogleCalendarSource(googleAuth, {
    calendarId: cfg.GOOGLE_CALENDAR_ID,
    logger,
  });
  const outlook = new OutlookCalendarSource(
    requireConfig(cfg, 'OUTLOOK_ACCESS_TOKEN', 'Outlook calendar access'),
    { logger }
  );

  const workflow = new ApprovalWorkflow({
    timeoutMs: cfg.APPROVAL_TIMEOUT_MINUTES > 0 ? cfg.APPROVAL_TIMEOUT_MINUTES * 60 * 1000 : null,
    logger,
  });

  const orchestrator = new SyncOrchestrator({
    google,
    outlook,
    workflow,
    portal: {
      openSession: async () => {
        const portalUrl = requireConfig(cfg, 'PORTAL_URL', 'portal login');
        return PlaywrightPortalSession.launch({
          loginUrl: new URL('/login', portalUrl).toString(),
          scheduleUrl: cfg.PORTAL_SCHEDULE_URL ?? new URL('/n/schedule', portalUrl).toString(),
          email: requireConfig(cfg, 'PORTAL_EMAIL', 'portal login'),
          password: requireConfig(cfg, 'PORTAL_PASSWORD', 'portal login'),
          timeZone: cfg.PORTAL_TIMEZONE,
          headless: cfg.PORTAL_HEADLESS,
          executablePath: cfg.PORTAL_BROWSER_PATH,
          actionTimeoutMs: cfg.PORTAL_STEP_TIMEOUT_MS,
          logger,
        });
      },
      driver: {
        stepTimeoutMs: cfg.PORTAL_STEP_TIMEOUT_MS,
        retryDelayMs: cfg.PORTAL_RETRY_DELAY_MS,
        timeZone: cfg.PORTAL_TIMEZONE,
        blockLabel: cfg.PORTAL_BLOCK_LABEL,
      },
    },
    secondaryWriter: new SecondaryCalendarWriter(google, logger),
    defaultHorizonDays: cfg.SYNC_HORIZON_DAYS,
    redactionLabel: cfg.PORTAL_BLOCK_LABEL,
    logger,
    metrics,
  });

  return {
    orchestrator,
    sources: { google, outlook },
    displayTimeZone: cfg.DISPLAY_TIMEZONE,
    defaultHorizonDays: cfg.SYNC_HORIZON_DAYS,
  };
}
