import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import {
  canPerform,
  isOpen,
  nextContributionStatus,
  versionStatusAfter,
} from '../../../src/modules/contributions/policies/contribution-state.policy';

function errorOf(fn: () => unknown): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected an AppError');
}

describe('nextContributionStatus', () => {
  it('accept moves SENT to IN_PROGRESS', () => {
    expect(nextContributionStatus('accept', 'SENT')).toBe('IN_PROGRESS');
  });

  it('the first draft save starts work, later saves keep the status', () => {
    expect(nextContributionStatus('save_draft', 'SENT')).toBe('IN_PROGRESS');
    expect(nextContributionStatus('save_draft', 'IN_PROGRESS')).toBe('IN_PROGRESS');
    expect(nextContributionStatus('save_draft', 'CHANGES_REQUESTED')).toBe('CHANGES_REQUESTED');
  });

  it('submit is allowed from every editable status', () => {
    for (const status of ['SENT', 'IN_PROGRESS', 'CHANGES_REQUESTED'] as const) {
      expect(nextContributionStatus('submit', status)).toBe('SUBMITTED');
    }
  });

  it('review outcomes', () => {
    expect(nextContributionStatus('approve', 'SUBMITTED')).toBe('COMPLETED');
    expect(nextContributionStatus('reject', 'SUBMITTED')).toBe('CHANGES_REQUESTED');
  });

  it('editing a submitted request is LOCKED (423)', () => {
    const err = errorOf(() => nextContributionStatus('save_draft', 'SUBMITTED'));
    expect(err.status).toBe(423);
    expect(err.code).toBe('LOCKED');
    expect(err.message).toBe('This request is SUBMITTED and can no longer be edited.');
  });

  it('submitting a completed request is LOCKED', () => {
    expect(errorOf(() => nextContributionStatus('submit', 'COMPLETED')).code).toBe('LOCKED');
  });

  it('reviewing a request that is not SUBMITTED is INVALID_STATE', () => {
    const err = errorOf(() => nextContributionStatus('approve', 'IN_PROGRESS'));
    expect(err.status).toBe(409);
    expect(err.code).toBe('INVALID_STATE');
    expect(err.message).toBe('Cannot approve a request that is IN_PROGRESS.');
  });

  it('decline is only possible before work starts', () => {
    expect(nextContributionStatus('decline', 'SENT')).toBe('DECLINED');
    expect(errorOf(() => nextContributionStatus('decline', 'IN_PROGRESS')).message).toBe(
      'Cannot decline a request that is IN_PROGRESS.',
    );
  });

  it('cancel is refused once submitted', () => {
    expect(nextContributionStatus('cancel', 'CHANGES_REQUESTED')).toBe('CANCELLED');
    expect(canPerform('cancel', 'SUBMITTED')).toBe(false);
  });
});

describe('versionStatusAfter', () => {
  it('maps request outcomes onto the version', () => {
    expect(versionStatusAfter('submit')).toBe('SUBMITTED');
    expect(versionStatusAfter('approve')).toBe('APPROVED');
    expect(versionStatusAfter('reject')).toBe('REVISION_REQUIRED');
    expect(versionStatusAfter('decline')).toBe('REJECTED');
    expect(versionStatusAfter('cancel')).toBe('CANCELLED');
  });

  it('leaves the version alone for accept and draft saves', () => {
    expect(versionStatusAfter('accept')).toBeNull();
    expect(versionStatusAfter('save_draft')).toBeNull();
  });
});

describe('isOpen', () => {
  it('is true until a terminal status', () => {
    expect(isOpen('SENT')).toBe(true);
    expect(isOpen('SUBMITTED')).toBe(true);
    expect(isOpen('COMPLETED')).toBe(false);
    expect(isOpen('DECLINED')).toBe(false);
    expect(isOpen('CANCELLED')).toBe(false);
  });
});
