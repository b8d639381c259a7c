// src/utils/approvalRenderer.test.ts
import { describe, it, expect } from 'vitest';
import { renderApprovalPrompt, renderRunReport } from './approvalRenderer.js';
import type { NormalizedEvent } from '../types/calendar.js';
import type { ApprovalRequest, RunReport } from '../types/sync.js';

function makeEvent(sourceId: string, title: string, start: string, end: string): NormalizedEvent {
  return {
    sourceId,
    origin: 'outlook',
    title: 'Busy',
    displayTitle: title,
    start: new Date(start),
    end: new Date(end),
    allDay: false,
  };
}

describe('approvalRenderer', () => {
  describe('renderApprovalPrompt', () => {
    const request: ApprovalRequest = {
      id: 'req-1',
      status: 'awaiting_response',
      createdAt: new Date('2026-10-19T12:00:00Z'),
      expiresAt: null,
      candidates: [
        {
          action: 'create_in_secondary',
          event: makeEvent('o1', 'Board review', '2026-10-20T13:30:00Z', '2026-10-20T14:30:00Z'),
          duplicateOf: {
            ...makeEvent('g1', 'Standup', '2026-10-20T13:00:00Z', '2026-10-20T14:00:00Z'),
            origin: 'google',
          },
        },
        {
          action: 'create_in_secondary',
          event: makeEvent('o2', 'Lunch', '2026-10-21T16:00:00Z', '2026-10-21T17:00:00Z'),
        },
      ],
    };

    it('should list candidates with 1-based numbers in the display zone', () => {
      const text = renderApprovalPrompt(request, 'America/New_York');

      expect(text.split('\n')).toEqual([
        'Found 2 events to sync:',
        '',
        '1. Tue Oct 20, 2026 09:30-10:30  Board review [outlook]',
        '   overlaps "Standup" (09:00-10:00)',
        '2. Wed Oct 21, 2026 12:00-13:00  Lunch [outlook]',
        '',
        'Reply with the numbers to approve (e.g. "1,3"), "all", "none", or "cancel".',
      ]);
    });

    it('should use the singular for one candidate', () => {
      const single: ApprovalRequest = { ...request, candidates: request.candidates.slice(1) };
      expect(renderApprovalPrompt(single, 'UTC').split('\n')[0]).toBe('Found 1 event to sync:');
    });
  });

  describe('renderRunReport', () => {
    it('should summarize counts and list failures', () => {
      const report: RunReport = {
        window: { start: new Date('2026-10-19T00:00:00Z'), end: new Date('2026-10-26T00:00:00Z') },
        targets: ['portal'],
        selected: 3,
        counts: { blocked: 1, alreadyPresent: 1, failed: 1 },
        outcomes: [
          { eventRef: 'o1', target: 'portal', result: 'blocked' },
          { eventRef: 'o2', target: 'portal', result: 'already_present' },
          {
            eventRef: 'o3',
            target: 'portal',
            result: 'failed',
            errorDetail: 'submit_block failed: timed out after 100ms',
          },
        ],
        startedAt: new Date('2026-10-19T12:00:00Z'),
        finishedAt: new Date('2026-10-19T12:01:00Z'),
      };

      expect(renderRunReport(report)).toBe(
        'Sync to portal: 3 selected, 1 written, 1 already present, 1 failed\n' +
          '  - o3 (portal): submit_block failed: timed out after 100ms'
      );
    });
  });
});
