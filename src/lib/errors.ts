// src/lib/errors.ts
import type { EventOrigin } from '../types/calendar.js';

export type SyncErrorCode =
  | 'MalformedEvent'
  | 'ApprovalInProgress'
  | 'NoPendingApproval'
  | 'InvalidSelection'
  | 'LoginFailed'
  | 'PortalStepFailed'
  | 'SourceUnavailable'
  | 'AuthExpired'
  | 'InvalidWindow';

/** Base class for every error the sync engine raises on purpose. */
export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
    this.code = code;
  }
}

/** Provider record that cannot be turned into a canonical event. */
export class MalformedEventError extends SyncError {
  readonly origin: EventOrigin;
  readonly sourceId: string | undefined;

  constructor(origin: EventOrigin, sourceId: string | undefined, reason: string) {
    super('MalformedEvent', `Malformed ${origin} event ${sourceId ?? '(no id)'}: ${reason}`);
    this.name = 'MalformedEventError';
    this.origin = origin;
    this.sourceId = sourceId;
  }
}

export class ApprovalInProgressError extends SyncError {
  readonly requestId: string | undefined;

  constructor(requestId?: string) {
    super(
      'ApprovalInProgress',
      requestId
        ? `Approval request ${requestId} is still waiting for a decision`
        : 'A reconciliation pass is already running'
    );
    this.name = 'ApprovalInProgressError';
    this.requestId = requestId;
  }
}

export class NoPendingApprovalError extends SyncError {
  constructor() {
    super('NoPendingApproval', 'There is no approval request waiting for a decision');
    this.name = 'NoPendingApprovalError';
  }
}

export class InvalidSelectionError extends SyncError {
  readonly selector: string;

  constructor(selector: string, reason: string) {
    super('InvalidSelection', `Invalid selection "${selector}": ${reason}`);
    this.name = 'InvalidSelectionError';
    this.selector = selector;
  }
}

export class LoginFailedError extends SyncError {
  constructor(message = 'Portal login failed', options?: { cause?: unknown }) {
    super('LoginFailed', message, options);
    this.name = 'LoginFailedError';
  }
}

export type PortalStep = 'authenticate' | 'navigate' | 'check_presence' | 'submit_block';

/** One step of the portal UI interaction failed. */
export class PortalStepError extends SyncError {
  readonly step: PortalStep;

  constructor(step: PortalStep, message: string, options?: { cause?: unknown }) {
    super('PortalStepFailed', message, options);
    this.name = 'PortalStepError';
    this.step = step;
  }
}

export class PortalStepTimeoutError extends PortalStepError {
  readonly timeoutMs: number;

  constructor(step: PortalStep, timeoutMs: number) {
    super(step, `timed out after ${timeoutMs}ms`);
    this.name = 'PortalStepTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Transient fetch failure; the whole run may be retried. */
export class SourceUnavailableError extends SyncError {
  readonly origin: EventOrigin;

  constructor(origin: EventOrigin, message: string, options?: { cause?: unknown }) {
    super('SourceUnavailable', `${origin} calendar unavailable: ${message}`, options);
    this.name = 'SourceUnavailableError';
    this.origin = origin;
  }
}

/** Credentials rejected; re-authenticate out of band before retrying. */
export class AuthExpiredError extends SyncError {
  readonly origin: EventOrigin;

  constructor(origin: EventOrigin, message = 'credentials expired or revoked') {
    super('AuthExpired', `${origin} authorization failed: ${message}`);
    this.name = 'AuthExpiredError';
    this.origin = origin;
  }
}

export class InvalidWindowError extends SyncError {
  constructor(horizonDays: number) {
    super('InvalidWindow', `Sync horizon must be a positive number of days (got ${horizonDays})`);
    this.name = 'InvalidWindowError';
  }
}

/**
 * Human-readable message for any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
