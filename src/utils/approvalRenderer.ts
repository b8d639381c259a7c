// src/utils/approvalRenderer.ts
import { formatInTimeZone } from 'date-fns-tz';
import type { NormalizedEvent } from '../types/calendar.js';
import type { ApprovalRequest, RunReport } from '../types/sync.js';

const DAY_FORMAT = 'EEE MMM d, yyyy HH:mm';
const TIME_FORMAT = 'HH:mm';

function formatSpan(event: NormalizedEvent, timeZone: string): string {
  return `${formatInTimeZone(event.start, timeZone, DAY_FORMAT)}-${formatInTimeZone(event.end, timeZone, TIME_FORMAT)}`;
}

/**
 * Text shown to the human for a pending request. Uses the original
 * titles; redaction only applies to what the portal receives.
 *
 * @param request - Pending approval request
 * @param timeZone - IANA zone to display times in
 * @returns Multi-line prompt
 */
export function renderApprovalPrompt(request: ApprovalRequest, timeZone: string): string {
  const lines: string[] = [];
  const count = request.candidates.length;
  lines.push(`Found ${count} event${count === 1 ? '' : 's'} to sync:`);
  lines.push('');

  request.candidates.forEach((candidate, i) => {
    const { event, duplicateOf } = candidate;
    lines.push(`${i + 1}. ${formatSpan(event, timeZone)}  ${event.displayTitle} [${event.origin}]`);
    if (duplicateOf) {
      lines.push(
        `   overlaps "${duplicateOf.displayTitle}" (${formatInTimeZone(duplicateOf.start, timeZone, TIME_FORMAT)}-${formatInTimeZone(duplicateOf.end, timeZone, TIME_FORMAT)})`
      );
    }
  });

  lines.push('');
  lines.push('Reply with the numbers to approve (e.g. "1,3"), "all", "none", or "cancel".');
  return lines.join('\n');
}

/**
 * One-paragraph summary of an applied selection
 */
export function renderRunReport(report: RunReport): string {
  const { blocked, alreadyPresent, failed } = report.counts;
  const lines = [
    `Sync to ${report.targets.join(', ')}: ${report.selected} selected, ` +
      `${blocked} written, ${alreadyPresent} already present, ${failed} failed`,
  ];
  for (const outcome of report.outcomes) {
    if (outcome.result === 'failed') {
      lines.push(`  - ${outcome.eventRef} (${outcome.target}): ${outcome.errorDetail}`);
    }
  }
  return lines.join('\n');
}
