// src/utils/approvalWorkflow.ts
import { randomUUID } from 'node:crypto';
import type { Logger } from '../lib/logger.js';
import {
  ApprovalInProgressError,
  InvalidSelectionError,
  NoPendingApprovalError,
} from '../lib/errors.js';
import type { NormalizedEvent } from '../types/calendar.js';
import type { ApprovalRequest, ApprovalStatus, CandidateChange } from '../types/sync.js';

export interface ApprovalWorkflowOptions {
  /** Pending requests older than this are abandoned; null disables expiry */
  timeoutMs?: number | null;
  now?: () => Date;
  logger?: Logger;
}

const SELECT_ALL = 'all';
const SELECT_NONE = new Set(['', 'none', 'skip']);

/**
 * Turn a human selector into 0-based candidate indices.
 *
 * Accepts "all", "" / "none" / "skip", or 1-based indices separated by
 * commas and/or whitespace ("2,5", "1 3", "1, 2"). Indices come back sorted
 * and de-duplicated.
 *
 * @param selector - Raw reply from the human
 * @param count - Number of candidates on offer
 * @returns Selected indices in candidate order
 * @throws InvalidSelectionError on non-numeric tokens or out-of-range indices
 */
export function parseSelection(selector: string, count: number): number[] {
  const normalized = selector.trim().toLowerCase();

  if (normalized === SELECT_ALL) {
    return Array.from({ length: count }, (_, i) => i);
  }
  if (SELECT_NONE.has(normalized)) {
    return [];
  }

  const tokens = normalized.split(/[\s,]+/).filter((token) => token.length > 0);
  const picked = new Set<number>();

  for (const token of tokens) {
    if (!/^\d+$/.test(token)) {
      throw new InvalidSelectionError(selector, `"${token}" is not a number`);
    }
    const index = Number.parseInt(token, 10);
    if (index < 1 || index > count) {
      throw new InvalidSelectionError(selector, `${index} is outside 1-${count}`);
    }
    picked.add(index - 1);
  }

  return [...picked].sort((a, b) => a - b);
}

/**
 * Human-in-the-loop gate between the resolver and any write.
 *
 * idle -> awaiting_response -> resolved | abandoned -> idle
 *
 * At most one request is pending at a time. Nothing here blocks: the
 * caller gets the request back and the decision arrives later through
 * submitSelection() or abandon().
 */
export class ApprovalWorkflow {
  private current: ApprovalRequest | null = null;
  private readonly timeoutMs: number | null;
  private readonly now: () => Date;
  private readonly logger: Logger | undefined;

  constructor(options: ApprovalWorkflowOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? null;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  get status(): ApprovalStatus {
    this.expireIfStale();
    return this.current?.status ?? 'idle';
  }

  /**
   * Request awaiting a decision, if any
   */
  get pending(): ApprovalRequest | null {
    this.expireIfStale();
    return this.current?.status === 'awaiting_response' ? this.current : null;
  }

  /**
   * Suspend on a set of candidates until a human decides.
   *
   * @throws ApprovalInProgressError when a request is already open
   */
  requestApproval(candidates: readonly CandidateChange[]): ApprovalRequest {
    this.expireIfStale();
    if (this.current) {
      throw new ApprovalInProgressError(this.current.id);
    }

    const createdAt = this.now();
    const request: ApprovalRequest = {
      id: randomUUID(),
      candidates: Object.freeze([...candidates]),
      status: 'awaiting_response',
      createdAt,
      expiresAt: this.timeoutMs === null ? null : new Date(createdAt.getTime() + this.timeoutMs),
    };
    this.current = request;

    this.logger?.info(
      { requestId: request.id, candidates: candidates.length },
      'Approval requested'
    );
    return request;
  }

  /**
   * Record the human decision.
   *
   * An invalid selector leaves the request pending so the human can answer again.
   *
   * @returns Approved events in candidate order
   * @throws NoPendingApprovalError when nothing is awaiting a response
   * @throws InvalidSelectionError when the selector cannot be parsed
   */
  submitSelection(selector: string): NormalizedEvent[] {
    const request = this.pending;
    if (!request) {
      throw new NoPendingApprovalError();
    }

    const indices = parseSelection(selector, request.candidates.length);
    const selected: NormalizedEvent[] = [];
    for (const index of indices) {
      const candidate = request.candidates[index];
      if (candidate) {
        selected.push(candidate.event);
      }
    }

    this.current = { ...request, status: 'resolved' };
    this.logger?.info(
      { requestId: request.id, selected: selected.length, offered: request.candidates.length },
      'Approval resolved'
    );
    return selected;
  }

  /**
   * Return to idle once the caller has applied (or dropped) the resolved selection
   */
  acknowledge(): void {
    if (this.current?.status === 'resolved') {
      this.current = null;
    }
  }

  /**
   * Discard the pending request without applying anything.
   *
   * @returns The abandoned request
   * @throws NoPendingApprovalError when nothing is awaiting a response
   */
  abandon(reason: string): ApprovalRequest {
    const request = this.current;
    if (request?.status !== 'awaiting_response') {
      throw new NoPendingApprovalError();
    }
    return this.close(request, reason);
  }

  /**
   * Abandon the pending request if its deadline has passed.
   *
   * @returns true when a request was expired by this call
   */
  expireIfStale(): boolean {
    const request = this.current;
    if (
      request?.status !== 'awaiting_response' ||
      request.expiresAt === null ||
      this.now().getTime() < request.expiresAt.getTime()
    ) {
      return false;
    }
    this.close(request, 'timeout');
    return true;
  }

  private close(request: ApprovalRequest, reason: string): ApprovalRequest {
    const abandoned: ApprovalRequest = { ...request, status: 'abandoned', abandonReason: reason };
    this.current = null;
    this.logger?.info({ requestId: request.id, reason }, 'Approval abandoned');
    return abandoned;
  }
}
