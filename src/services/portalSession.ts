// src/services/portalSession.ts
import { chromium, type Browser, type Page } from 'playwright-core';
import { parse, isValid, format, eachDayOfInterval } from 'date-fns';
import { formatInTimeZone, toZonedTime } from 'date-fns-tz';
import type { Logger } from '../lib/logger.js';
import { LoginFailedError, describeError } from '../lib/errors.js';
import type { PortalBlockRequest, PortalSession } from '../utils/portalMutationDriver.js';
import type { PortalRawBlock, TimeWindow } from '../types/calendar.js';

/**
 * CSS/text selectors for the portal UI. Overridable per deployment.
 */
export interface PortalSelectors {
  username: string;
  password: string;
  loginSubmit: string;
  editAvailability: string;
  closeDialog: string;
  outOfOffice: string;
  confirmOutOfOffice: string;
  dateInput: string;
  datepickerHeader: string;
  datepickerNext: string;
  datepickerPrev: string;
  datepickerDay: string;
  startTime: string;
  endTime: string;
  eventName: string;
  blockSubmit: string;
  /** Rendered busy blocks on the schedule page */
  block: string;
}

export const DEFAULT_PORTAL_SELECTORS: PortalSelectors = {
  username: '#user_username',
  password: '#user_password',
  loginSubmit: 'button[type="submit"]',
  editAvailability: 'text=Edit Availability',
  closeDialog: 'Close dialog',
  outOfOffice: 'button:has-text("Out Of Office")',
  confirmOutOfOffice: `button:has-text("Let's do that")`,
  dateInput: '#event_date',
  datepickerHeader: 'th.datepicker-switch',
  datepickerNext: 'th.next',
  datepickerPrev: 'th.prev',
  datepickerDay: 'td.day:not(.old):not(.new)',
  startTime: '#event_starttime',
  endTime: '#event_endtime',
  eventName: '#calendar_event_name',
  blockSubmit: 'button[type="submit"].btn-action',
  block: '.fc-event',
};

const MAX_MONTH_STEPS = 24;
const TIME_RANGE = /(\d{1,2}:\d{2})\s*[-–]\s*(\d{1,2}:\d{2})/;

export interface PlaywrightPortalSessionOptions {
  loginUrl: string;
  scheduleUrl: string;
  email: string;
  password: string;
  /** Zone the portal shows wall-clock times in */
  timeZone: string;
  headless?: boolean;
  executablePath?: string;
  /** Upper bound for each Playwright action and navigation */
  actionTimeoutMs?: number;
  selectors?: Partial<PortalSelectors>;
  logger?: Logger;
}

/**
 * Read the datepicker header ("October 2026")
 *
 * @returns Calendar year and 1-based month, or null when the text is not a month header
 */
export function parseDatepickerHeader(text: string | null): { year: number; month: number } | null {
  if (!text) return null;
  const parsed = parse(text.trim().replace(/\s+/g, ' '), 'MMMM yyyy', new Date(2000, 0, 1));
  if (!isValid(parsed)) return null;
  return { year: parsed.getFullYear(), month: parsed.getMonth() + 1 };
}

/**
 * Read the time range and label out of a rendered block ("09:00 - 10:00 Busy")
 */
export function parseBlockText(
  text: string | null
): { startTime: string; endTime: string; label: string } | null {
  if (!text) return null;
  const match = TIME_RANGE.exec(text);
  if (!match?.[1] || !match[2]) return null;
  return {
    startTime: match[1].padStart(5, '0'),
    endTime: match[2].padStart(5, '0'),
    label: text.replace(TIME_RANGE, '').trim(),
  };
}

/**
 * Month steps needed to go from the shown month to the target (negative = backwards)
 */
export function monthDistance(
  shown: { year: number; month: number },
  target: { year: number; month: number }
): number {
  return (target.year - shown.year) * 12 + (target.month - shown.month);
}

/**
 * PortalSession backed by a Chromium page driven through playwright-core
 */
export class PlaywrightPortalSession implements PortalSession {
  private readonly browser: Browser;
  private readonly page: Page;
  private readonly options: PlaywrightPortalSessionOptions;
  private readonly selectors: PortalSelectors;
  private readonly logger: Logger | undefined;

  private constructor(browser: Browser, page: Page, options: PlaywrightPortalSessionOptions) {
    this.browser = browser;
    this.page = page;
    this.options = options;
    this.selectors = { ...DEFAULT_PORTAL_SELECTORS, ...options.selectors };
    this.logger = options.logger;
  }

  /**
   * Start a browser and open a blank page; nothing is loaded until authenticate()
   */
  static async launch(options: PlaywrightPortalSessionOptions): Promise<PlaywrightPortalSession> {
    const browser = await chromium.launch({
      headless: options.headless ?? true,
      ...(options.executablePath ? { executablePath: options.executablePath } : {}),
    });
    const context = await browser.newContext({ viewport: { width: 1280, height: 720 } });
    const page = await context.newPage();
    if (options.actionTimeoutMs) {
      page.setDefaultTimeout(options.actionTimeoutMs);
      page.setDefaultNavigationTimeout(options.actionTimeoutMs);
    }
    return new PlaywrightPortalSession(browser, page, options);
  }

  async isAuthenticated(): Promise<boolean> {
    if (this.page.url() === 'about:blank') {
      return false;
    }
    return (await this.page.locator(this.selectors.username).count()) === 0;
  }

  async authenticate(): Promise<void> {
    const { loginUrl, email, password } = this.options;
    this.logger?.info({ loginUrl }, 'Logging in to portal');
    try {
      await this.page.goto(loginUrl, { waitUntil: 'networkidle' });
      await this.page.fill(this.selectors.username, email);
      await this.page.fill(this.selectors.password, password);
      await this.page.click(this.selectors.loginSubmit);
      await this.page.waitForLoadState('networkidle');
    } catch (error) {
      throw new LoginFailedError(`Portal login failed: ${describeError(error)}`, { cause: error });
    }

    if (!(await this.isAuthenticated())) {
      throw new LoginFailedError('Portal login failed: still on the sign-in page');
    }
  }

  async openAvailability(): Promise<void> {
    await this.page.goto(this.options.scheduleUrl, { waitUntil: 'domcontentloaded' });
    await this.page.waitForLoadState('networkidle');
  }

  /**
   * Blocks rendered on the schedule page for the days the window touches.
   * Days come from the nearest ancestor carrying a data-date attribute.
   */
  async listBlocks(window: TimeWindow): Promise<PortalRawBlock[]> {
    const { timeZone } = this.options;
    const days = new Set(
      eachDayOfInterval({
        start: toZonedTime(window.start, timeZone),
        end: toZonedTime(new Date(window.end.getTime() - 1), timeZone),
      }).map((day) => format(day, 'yyyy-MM-dd'))
    );

    const items = this.page.locator(this.selectors.block);
    const count = await items.count();
    const blocks: PortalRawBlock[] = [];

    for (let i = 0; i < count; i++) {
      const item = items.nth(i);
      const date = await item.locator('xpath=ancestor::*[@data-date][1]').getAttribute('data-date');
      const parsed = parseBlockText(await item.textContent());
      if (!date || !days.has(date.substring(0, 10)) || !parsed) continue;
      blocks.push({ date: date.substring(0, 10), ...parsed, timeZone });
    }

    this.logger?.debug({ days: [...days], found: blocks.length }, 'Read portal blocks');
    return blocks;
  }

  async submitBlock(block: PortalBlockRequest): Promise<void> {
    const { page, selectors } = this;

    await page.click(selectors.editAvailability);
    const closeDialog = page.getByRole('button', { name: selectors.closeDialog });
    if (await closeDialog.isVisible()) {
      await closeDialog.click();
    }

    await page.click(selectors.outOfOffice);
    await page.click(selectors.confirmOutOfOffice);

    await page.click(selectors.dateInput);
    await this.showMonth(block.start, block.timeZone);
    const day = formatInTimeZone(block.start, block.timeZone, 'd');
    await page
      .locator(selectors.datepickerDay)
      .filter({ hasText: new RegExp(`^\\s*${day}\\s*$`) })
      .first()
      .click();

    await page.fill(selectors.startTime, formatInTimeZone(block.start, block.timeZone, 'HH:mm'));
    await page.fill(selectors.endTime, formatInTimeZone(block.end, block.timeZone, 'HH:mm'));
    await page.fill(selectors.eventName, block.label);

    await page.click(selectors.blockSubmit);
    await page.waitForLoadState('networkidle');
  }

  async close(): Promise<void> {
    await this.browser.close();
  }

  /**
   * Step the datepicker until it shows the month containing `date`
   */
  private async showMonth(date: Date, timeZone: string): Promise<void> {
    const target = {
      year: Number(formatInTimeZone(date, timeZone, 'yyyy')),
      month: Number(formatInTimeZone(date, timeZone, 'M')),
    };

    for (let step = 0; step < MAX_MONTH_STEPS; step++) {
      const shown = parseDatepickerHeader(await this.page.textContent(this.selectors.datepickerHeader));
      if (!shown) {
        throw new Error('datepicker header not readable');
      }
      const distance = monthDistance(shown, target);
      if (distance === 0) return;
      await this.page.click(distance > 0 ? this.selectors.datepickerNext : this.selectors.datepickerPrev);
    }
    throw new Error(`datepicker did not reach ${target.year}-${String(target.month).padStart(2, '0')}`);
  }
}
