/**
 * backend/src/modules/contributions/policies/contribution-state.policy.ts
 *
 * WHY:
 * - One transition table for DataContributionRequest, and the version status each
 *   transition implies. Every status change goes through nextContributionStatus().
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 *   SENT                                -- accept     --> IN_PROGRESS
 *   SENT                                -- decline    --> DECLINED           (version REJECTED)
 *   SENT | IN_PROGRESS | CHANGES_REQ.   -- save_draft --> same (SENT -> IN_PROGRESS)
 *   SENT | IN_PROGRESS | CHANGES_REQ.   -- submit     --> SUBMITTED          (version SUBMITTED)
 *   SUBMITTED                           -- approve    --> COMPLETED          (version APPROVED)
 *   SUBMITTED                           -- reject     --> CHANGES_REQUESTED  (version REVISION_REQUIRED)
 *   SENT | IN_PROGRESS | CHANGES_REQ.   -- cancel     --> CANCELLED          (version CANCELLED)
 * - Supplier edits outside the editable states are LOCKED (423); every other illegal
 *   move is INVALID_STATE (409).
 */

import type { VersionStatus } from '../../products/product.types';
import { ContributionErrors } from '../contribution.errors';
import type { ContributionStatus } from '../contribution.types';

export type ContributionAction =
  | 'accept'
  | 'decline'
  | 'save_draft'
  | 'submit'
  | 'approve'
  | 'reject'
  | 'cancel';

export const EDITABLE_STATUSES: readonly ContributionStatus[] = [
  'SENT',
  'IN_PROGRESS',
  'CHANGES_REQUESTED',
];

type Transition = {
  from: readonly ContributionStatus[];
  to: ContributionStatus | ((current: ContributionStatus) => ContributionStatus);
  /** Status the request's current version takes, when the action changes it. */
  version?: VersionStatus;
  lockedWhenDenied?: boolean;
};

const TRANSITIONS: Readonly<Record<ContributionAction, Transition>> = {
  accept: { from: ['SENT'], to: 'IN_PROGRESS' },
  decline: { from: ['SENT'], to: 'DECLINED', version: 'REJECTED' },
  save_draft: {
    from: EDITABLE_STATUSES,
    to: (current) => (current === 'SENT' ? 'IN_PROGRESS' : current),
    lockedWhenDenied: true,
  },
  submit: {
    from: EDITABLE_STATUSES,
    to: 'SUBMITTED',
    version: 'SUBMITTED',
    lockedWhenDenied: true,
  },
  approve: { from: ['SUBMITTED'], to: 'COMPLETED', version: 'APPROVED' },
  reject: { from: ['SUBMITTED'], to: 'CHANGES_REQUESTED', version: 'REVISION_REQUIRED' },
  cancel: { from: EDITABLE_STATUSES, to: 'CANCELLED', version: 'CANCELLED' },
};

export function canPerform(action: ContributionAction, current: ContributionStatus): boolean {
  return TRANSITIONS[action].from.includes(current);
}

/** Returns the status after `action`, or throws LOCKED / INVALID_STATE. */
export function nextContributionStatus(
  action: ContributionAction,
  current: ContributionStatus,
): ContributionStatus {
  const transition = TRANSITIONS[action];

  if (!transition.from.includes(current)) {
    if (transition.lockedWhenDenied) throw ContributionErrors.requestLocked(current, { action });
    throw ContributionErrors.transitionNotAllowed(action.replace('_', ' '), current);
  }

  return typeof transition.to === 'function' ? transition.to(current) : transition.to;
}

/** Version status implied by `action`, or null when the version keeps its status. */
export function versionStatusAfter(action: ContributionAction): VersionStatus | null {
  return TRANSITIONS[action].version ?? null;
}

export function isOpen(status: ContributionStatus): boolean {
  return status === 'SUBMITTED' || EDITABLE_STATUSES.includes(status);
}
