import { describe, it, expect } from 'vitest';
import {
  SyncError,
  MalformedEventError,
  ApprovalInProgressError,
  InvalidSelectionError,
  PortalStepError,
  PortalStepTimeoutError,
  SourceUnavailableError,
  AuthExpiredError,
  InvalidWindowError,
  describeError,
} from '../../src/lib/errors.js';

describe('Sync errors', () => {
  describe('codes and messages', () => {
    it('should name the origin and id of a malformed record', () => {
      const error = new MalformedEventError('google', 'g1', 'end is before start');

      expect(error).toBeInstanceOf(SyncError);
      expect(error.code).toBe('MalformedEvent');
      expect(error.message).toBe('Malformed google event g1: end is before start');
    });

    it('should say "(no id)" when the record has none', () => {
      const error = new MalformedEventError('outlook', undefined, 'missing id');

      expect(error.message).toBe('Malformed outlook event (no id): missing id');
    });

    it('should distinguish a pending request from a running pass', () => {
      expect(new ApprovalInProgressError('req-1').message).toBe(
        'Approval request req-1 is still waiting for a decision'
      );
      expect(new ApprovalInProgressError().message).toBe('A reconciliation pass is already running');
    });

    it('should quote the rejected selector', () => {
      const error = new InvalidSelectionError('1,x', '"x" is not a number');

      expect(error.code).toBe('InvalidSelection');
      expect(error.selector).toBe('1,x');
      expect(error.message).toBe('Invalid selection "1,x": "x" is not a number');
    });

    it('should carry the failing portal step', () => {
      const timeout = new PortalStepTimeoutError('submit_block', 250);

      expect(timeout).toBeInstanceOf(PortalStepError);
      expect(timeout.step).toBe('submit_block');
      expect(timeout.code).toBe('PortalStepFailed');
      expect(timeout.message).toBe('timed out after 250ms');
    });

    it('should prefix source failures with the calendar', () => {
      const cause = new Error('socket hang up');
      const error = new SourceUnavailableError('outlook', 'socket hang up', { cause });

      expect(error.message).toBe('outlook calendar unavailable: socket hang up');
      expect(error.cause).toBe(cause);
      expect(new AuthExpiredError('google').message).toBe(
        'google authorization failed: credentials expired or revoked'
      );
    });

    it('should report the rejected horizon', () => {
      expect(new InvalidWindowError(-2).message).toBe(
        'Sync horizon must be a positive number of days (got -2)'
      );
    });
  });

  describe('describeError()', () => {
    it('should use the message of an Error', () => {
      expect(describeError(new TypeError('bad input'))).toBe('bad input');
    });

    it('should stringify anything else', () => {
      expect(describeError('plain')).toBe('plain');
      expect(describeError(42)).toBe('42');
    });
  });
});
