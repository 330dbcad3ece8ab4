import { ModerationAction, Review, ReviewStatus } from './types';
import { InvalidStateTransitionError, Result, fail, ok } from './errors';
import { logger } from '../observability/logger';

/** Allowed moderation moves. Approved and rejected are terminal. */
export const MODERATION_TRANSITIONS: Record<ReviewStatus, readonly ReviewStatus[]> = {
  pending: ['approved', 'rejected'],
  approved: [],
  rejected: [],
};

const TARGET_STATUS: Record<ModerationAction, ReviewStatus> = {
  approve: 'approved',
  reject: 'rejected',
};

export class ModerationStateMachine {
  private readonly log = logger.child({ component: 'moderation-state-machine' });

  canTransition(from: ReviewStatus, to: ReviewStatus): boolean {
    return MODERATION_TRANSITIONS[from].includes(to);
  }

  approve(review: Review): Result<Review> {
    return this.apply(review, 'approve');
  }

  reject(review: Review): Result<Review> {
    return this.apply(review, 'reject');
  }

  /**
   * Returns a copy of the review in its new status. The input is left
   * untouched so nothing changes until the caller commits the copy.
   */
  apply(review: Review, action: ModerationAction): Result<Review> {
    const target = TARGET_STATUS[action];

    if (!this.canTransition(review.status, target)) {
      this.log.warn(
        { reviewId: review.id, from: review.status, to: target },
        'Invalid moderation transition attempted',
      );
      return fail(new InvalidStateTransitionError(
        `Only pending reviews can be ${target}; review ${review.id} is ${review.status}`,
        { reviewId: review.id, from: review.status, to: target },
      ));
    }

    return ok({ ...review, status: target });
  }
}
