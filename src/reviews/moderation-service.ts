/**
 * Moderation Service
 *
 * Applies approve/reject and rebuilds the product summary as one unit:
 *   1. lock the product
 *   2. reload the review and run the state machine
 *   3. (approve) read the approved-set version and the approved reviews, recompute
 *   4. commit status, indexes, version and summary in one repository call
 *
 * Nothing is written before step 4, so an abort or a storage failure
 * earlier leaves the previous state fully intact.
 */

import { ModerationAction, Review, ReviewRepository, ReviewSummary } from './types';
import {
  NotFoundError,
  RequestAbortedError,
  Result,
  capture,
  fail,
  ok,
} from './errors';
import { ModerationStateMachine } from './state-machine';
import { SummaryAggregator } from './summary-aggregator';
import { ProductLock } from './product-lock';
import { logger } from '../observability/logger';
import { moderationTransitions, summaryRecomputeDuration } from '../observability/metrics';

export interface ModerationOptions {
  signal?: AbortSignal;
}

export interface ModerationOutcome {
  review: Review;
  /** Present when the approved set changed */
  summary?: ReviewSummary;
}

export class ModerationService {
  private readonly log = logger.child({ component: 'moderation-service' });

  constructor(
    private readonly store: ReviewRepository,
    private readonly lock: ProductLock,
    private readonly stateMachine: ModerationStateMachine = new ModerationStateMachine(),
    private readonly aggregator: SummaryAggregator = new SummaryAggregator(),
  ) {}

  approve(reviewId: string, options?: ModerationOptions): Promise<Result<ModerationOutcome>> {
    return this.transition(reviewId, 'approve', options);
  }

  reject(reviewId: string, options?: ModerationOptions): Promise<Result<ModerationOutcome>> {
    return this.transition(reviewId, 'reject', options);
  }

  async transition(
    reviewId: string,
    action: ModerationAction,
    options: ModerationOptions = {},
  ): Promise<Result<ModerationOutcome>> {
    const result = await capture<ModerationOutcome>(async () => {
      // productId never changes, so it is safe to read before locking
      const initial = await this.store.getReview(reviewId);
      if (!initial) return fail<ModerationOutcome>(this.notFound(reviewId));

      return this.lock.withLock<Result<ModerationOutcome>>(initial.productId, async () => {
        const review = await this.store.getReview(reviewId);
        if (!review) return fail<ModerationOutcome>(this.notFound(reviewId));

        const moved = this.stateMachine.apply(review, action);
        if (!moved.ok) return moved;
        const next = moved.value;

        let summary: ReviewSummary | undefined;
        let expectedVersion: number | undefined;
        if (next.status === 'approved') {
          expectedVersion = await this.store.getProductVersion(next.productId);
          summary = await this.recomputeWith(next.productId, next);
        }

        const aborted = this.checkAborted(options.signal, reviewId);
        if (aborted) return fail<ModerationOutcome>(aborted);

        await this.store.commitTransition({ review: next, expectedStatus: review.status, expectedVersion, summary });
        return ok<ModerationOutcome>({ review: next, summary });
      });
    });

    moderationTransitions.inc({ action, outcome: result.ok ? 'ok' : result.error.code });
    if (result.ok) {
      this.log.info({
        reviewId,
        productId: result.value.review.productId,
        status: result.value.review.status,
        totalReviews: result.value.summary?.totalReviews,
        averageRating: result.value.summary?.averageRating,
      }, 'Review moderated');
    } else {
      this.log.warn({ reviewId, action, code: result.error.code, err: result.error }, 'Moderation failed');
    }
    return result;
  }

  /**
   * Delete a review with its responses. When it was approved the summary
   * is rebuilt from the remaining approved reviews in the same commit.
   */
  async removeReview(reviewId: string, options: ModerationOptions = {}): Promise<Result<ModerationOutcome>> {
    const result = await capture<ModerationOutcome>(async () => {
      const initial = await this.store.getReview(reviewId);
      if (!initial) return fail<ModerationOutcome>(this.notFound(reviewId));

      return this.lock.withLock<Result<ModerationOutcome>>(initial.productId, async () => {
        const review = await this.store.getReview(reviewId);
        if (!review) return fail<ModerationOutcome>(this.notFound(reviewId));

        let summary: ReviewSummary | undefined;
        let expectedVersion: number | undefined;
        if (review.status === 'approved') {
          expectedVersion = await this.store.getProductVersion(review.productId);
          summary = await this.recomputeWithout(review.productId, review.id);
        }

        const aborted = this.checkAborted(options.signal, reviewId);
        if (aborted) return fail<ModerationOutcome>(aborted);

        await this.store.commitRemoval({ review, expectedVersion, summary });
        return ok<ModerationOutcome>({ review, summary });
      });
    });

    if (result.ok) {
      this.log.info({ reviewId, productId: result.value.review.productId }, 'Review removed');
    } else {
      this.log.warn({ reviewId, code: result.error.code, err: result.error }, 'Review removal failed');
    }
    return result;
  }

  /** Fresh approved set plus the review about to be approved */
  private async recomputeWith(productId: string, approved: Review): Promise<ReviewSummary> {
    const end = summaryRecomputeDuration.startTimer();
    try {
      const current = await this.store.listApprovedReviews(productId);
      const contributing = [...current.filter((r) => r.id !== approved.id), approved];
      return this.aggregator.recompute(productId, contributing);
    } finally {
      end();
    }
  }

  private async recomputeWithout(productId: string, removedId: string): Promise<ReviewSummary> {
    const end = summaryRecomputeDuration.startTimer();
    try {
      const current = await this.store.listApprovedReviews(productId);
      return this.aggregator.recompute(productId, current.filter((r) => r.id !== removedId));
    } finally {
      end();
    }
  }

  private checkAborted(signal: AbortSignal | undefined, reviewId: string): RequestAbortedError | null {
    if (!signal?.aborted) return null;
    return new RequestAbortedError(`Request for review ${reviewId} was aborted before commit`, { reviewId });
  }

  private notFound(reviewId: string): NotFoundError {
    return new NotFoundError(`Review ${reviewId} not found`, { reviewId });
  }
}
