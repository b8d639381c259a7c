// src/utils/approvalWorkflow.test.ts
import { describe, it, expect, beforeEach } from 'vitest';
import { ApprovalWorkflow, parseSelection } from './approvalWorkflow.js';
import {
  ApprovalInProgressError,
  InvalidSelectionError,
  NoPendingApprovalError,
} from '../lib/errors.js';
import type { CandidateChange } from '../types/sync.js';

function makeCandidate(sourceId: string, hour: number): CandidateChange {
  const start = new Date(Date.UTC(2026, 9, 20, hour));
  return {
    action: 'block_in_portal',
    event: {
      sourceId,
      origin: 'outlook',
      title: 'Busy',
      displayTitle: sourceId,
      start,
      end: new Date(start.getTime() + 60 * 60 * 1000),
      allDay: false,
    },
  };
}

describe('parseSelection', () => {
  it('should select everything for "all"', () => {
    expect(parseSelection('all', 3)).toEqual([0, 1, 2]);
    expect(parseSelection('  ALL ', 2)).toEqual([0, 1]);
  });

  it('should select nothing for empty, "none" and "skip"', () => {
    expect(parseSelection('', 3)).toEqual([]);
    expect(parseSelection('none', 3)).toEqual([]);
    expect(parseSelection('skip', 3)).toEqual([]);
  });

  it('should accept commas and whitespace as separators', () => {
    expect(parseSelection('3, 1', 3)).toEqual([0, 2]);
    expect(parseSelection('1 2', 3)).toEqual([0, 1]);
  });

  it('should apply duplicate indices once', () => {
    expect(parseSelection('2,2,2', 3)).toEqual([1]);
  });

  it('should reject out-of-range indices', () => {
    expect(() => parseSelection('2,5', 3)).toThrow('Invalid selection "2,5": 5 is outside 1-3');
    expect(() => parseSelection('0', 3)).toThrow(InvalidSelectionError);
  });

  it('should reject non-numeric tokens', () => {
    expect(() => parseSelection('1,two', 3)).toThrow('Invalid selection "1,two": "two" is not a number');
  });
});

describe('ApprovalWorkflow', () => {
  let workflow: ApprovalWorkflow;
  const candidates = [makeCandidate('a', 9), makeCandidate('b', 11), makeCandidate('c', 13)];

  beforeEach(() => {
    workflow = new ApprovalWorkflow();
  });

  it('should start idle with nothing pending', () => {
    expect(workflow.status).toBe('idle');
    expect(workflow.pending).toBeNull();
  });

  it('should suspend on a request without blocking', () => {
    const request = workflow.requestApproval(candidates);

    expect(request.status).toBe('awaiting_response');
    expect(request.candidates).toHaveLength(3);
    expect(request.expiresAt).toBeNull();
    expect(workflow.status).toBe('awaiting_response');
    expect(workflow.pending?.id).toBe(request.id);
  });

  it('should refuse a second request while one is open', () => {
    const request = workflow.requestApproval(candidates);

    expect(() => workflow.requestApproval(candidates)).toThrow(ApprovalInProgressError);
    expect(workflow.pending?.id).toBe(request.id);
  });

  it('should return the selected events in candidate order', () => {
    workflow.requestApproval(candidates);

    const selected = workflow.submitSelection('3,1');

    expect(selected.map((e) => e.sourceId)).toEqual(['a', 'c']);
    expect(workflow.status).toBe('resolved');
  });

  it('should keep the request pending after an invalid selection', () => {
    workflow.requestApproval(candidates);

    expect(() => workflow.submitSelection('2,5')).toThrow(InvalidSelectionError);
    expect(workflow.status).toBe('awaiting_response');

    expect(workflow.submitSelection('2').map((e) => e.sourceId)).toEqual(['b']);
  });

  it('should resolve to nothing for an empty selection', () => {
    workflow.requestApproval(candidates);

    expect(workflow.submitSelection('')).toEqual([]);
    expect(workflow.status).toBe('resolved');
  });

  it('should return to idle after acknowledge', () => {
    workflow.requestApproval(candidates);
    workflow.submitSelection('all');

    workflow.acknowledge();

    expect(workflow.status).toBe('idle');
    expect(() => workflow.requestApproval(candidates)).not.toThrow();
  });

  it('should reject a selection when nothing is pending', () => {
    expect(() => workflow.submitSelection('1')).toThrow(NoPendingApprovalError);
  });

  it('should discard candidates on abandon', () => {
    const request = workflow.requestApproval(candidates);

    const abandoned = workflow.abandon('cancelled by user');

    expect(abandoned.id).toBe(request.id);
    expect(abandoned.status).toBe('abandoned');
    expect(abandoned.abandonReason).toBe('cancelled by user');
    expect(workflow.status).toBe('idle');
    expect(() => workflow.submitSelection('1')).toThrow(NoPendingApprovalError);
  });

  it('should reject abandon when nothing is pending', () => {
    expect(() => workflow.abandon('cancelled by user')).toThrow(NoPendingApprovalError);
  });

  describe('timeout', () => {
    let clock: Date;

    beforeEach(() => {
      clock = new Date('2026-10-20T08:00:00Z');
      workflow = new ApprovalWorkflow({ timeoutMs: 30 * 60 * 1000, now: () => clock });
    });

    it('should stamp an expiry on new requests', () => {
      const request = workflow.requestApproval(candidates);
      expect(request.expiresAt?.toISOString()).toBe('2026-10-20T08:30:00.000Z');
    });

    it('should keep the request open before the deadline', () => {
      workflow.requestApproval(candidates);
      clock = new Date('2026-10-20T08:29:59Z');

      expect(workflow.expireIfStale()).toBe(false);
      expect(workflow.status).toBe('awaiting_response');
    });

    it('should abandon the request once the deadline passes', () => {
      workflow.requestApproval(candidates);
      clock = new Date('2026-10-20T08:30:00Z');

      expect(workflow.pending).toBeNull();
      expect(workflow.status).toBe('idle');
      expect(() => workflow.submitSelection('all')).toThrow(NoPendingApprovalError);
    });
  });
});
