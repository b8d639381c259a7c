// src/types/sync.ts
import type { NormalizedEvent, TimeWindow } from './calendar.js';

/**
 * Where an approved change gets written
 */
export type SyncTarget = 'portal' | 'google';

export type ChangeAction = 'create_in_secondary' | 'block_in_portal';

/**
 * One unit of work proposed to the human. Never mutated after creation.
 */
export interface CandidateChange {
  readonly event: NormalizedEvent;
  readonly action: ChangeAction;
  readonly duplicateOf?: NormalizedEvent; // Existing event this one overlaps
}

export type ApprovalStatus = 'idle' | 'awaiting_response' | 'resolved' | 'abandoned';

export interface ApprovalRequest {
  readonly id: string;
  readonly candidates: readonly CandidateChange[]; // 1-indexed for humans
  readonly status: Exclude<ApprovalStatus, 'idle'>;
  readonly createdAt: Date;
  readonly expiresAt: Date | null;
  readonly abandonReason?: string;
}

export type SyncResult = 'blocked' | 'already_present' | 'failed';

export type SyncOutcome =
  | {
      eventRef: string;
      target: SyncTarget;
      result: Exclude<SyncResult, 'failed'>;
    }
  | {
      eventRef: string;
      target: SyncTarget;
      result: Extract<SyncResult, 'failed'>;
      errorDetail: string;
    };

export interface RunReport {
  window: TimeWindow;
  targets: SyncTarget[];
  selected: number;
  counts: {
    blocked: number;
    alreadyPresent: number;
    failed: number;
  };
  outcomes: SyncOutcome[];
  startedAt: Date;
  finishedAt: Date;
}

/**
 * Applies one approved event to a destination
 */
export interface ChangeApplier {
  apply(event: NormalizedEvent): Promise<SyncOutcome>;
}
