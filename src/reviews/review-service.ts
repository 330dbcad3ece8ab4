/**
 * Product Review Service
 *
 * Creation and read paths around the moderation core: submit, query by
 * product/user, moderation queue, summary lookup.
 */

import { v4 as uuid } from 'uuid';
import {
  Review,
  ReviewPage,
  ReviewRepository,
  ReviewStatus,
  ReviewSummary,
  StatusFilter,
  isRating,
} from './types';
import { NotFoundError, Result, ValidationError, capture, fail, ok } from './errors';
import { parseCreateReview } from './schemas';
import { sortResponses } from './response-ledger';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'review-service' });

export interface PaginationConfig {
  defaultPerPage: number;
  maxPerPage: number;
}

export interface ListReviewsOptions {
  status?: StatusFilter<ReviewStatus>;
  page?: number;
  perPage?: number;
}

const DEFAULT_PAGINATION: PaginationConfig = { defaultPerPage: 10, maxPerPage: 100 };

function newestFirst(a: Review, b: Review): number {
  const byDate = b.reviewDate.localeCompare(a.reviewDate);
  return byDate !== 0 ? byDate : a.id.localeCompare(b.id);
}

function oldestFirst(a: Review, b: Review): number {
  return -newestFirst(a, b);
}

export class ReviewService {
  constructor(
    private readonly store: ReviewRepository,
    private readonly pagination: PaginationConfig = DEFAULT_PAGINATION,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** Submit a product review; it waits in `pending` until moderated */
  async createReview(body: unknown): Promise<Result<Review>> {
    const input = parseCreateReview(body);
    if (input instanceof ValidationError) return fail(input);
    if (!isRating(input.rating)) {
      return fail(new ValidationError('Rating must be between 1 and 5', { rating: input.rating }));
    }

    const review: Review = {
      id: input.id ?? uuid(),
      productId: input.productId,
      userId: input.userId,
      title: input.title,
      comment: input.comment,
      rating: input.rating,
      reviewDate: this.clock().toISOString(),
      photos: input.photos,
      helpfulness: { likes: 0, dislikes: 0 },
      status: 'pending',
      verifiedPurchase: input.verifiedPurchase ?? false,
      attributes: input.attributes,
    };

    return capture<Review>(async () => {
      const created = await this.store.saveReview(review);
      if (!created) {
        return fail(new ValidationError(`Review ${review.id} already exists`, { reviewId: review.id }));
      }

      log.info({
        reviewId: review.id,
        productId: review.productId,
        rating: review.rating,
        verified: review.verifiedPurchase,
      }, 'Product review submitted');
      return ok(review);
    });
  }

  async getReview(reviewId: string): Promise<Result<Review>> {
    return capture<Review>(async () => {
      const review = await this.store.getReview(reviewId);
      return review ? ok(review) : fail(new NotFoundError(`Review ${reviewId} not found`, { reviewId }));
    });
  }

  /** Reviews for a product, newest first, each with its active responses */
  async listReviewsForProduct(productId: string, options: ListReviewsOptions = {}): Promise<Result<ReviewPage>> {
    const status = options.status ?? 'approved';
    const page = options.page ?? 1;
    const perPage = Math.min(options.perPage ?? this.pagination.defaultPerPage, this.pagination.maxPerPage);
    if (!Number.isInteger(page) || page < 1) {
      return fail(new ValidationError('page must be a positive integer', { page }));
    }
    if (!Number.isInteger(perPage) || perPage < 1) {
      return fail(new ValidationError('perPage must be a positive integer', { perPage }));
    }

    return capture<ReviewPage>(async () => {
      const reviews = (await this.store.listProductReviews(productId, status)).sort(newestFirst);
      const slice = reviews.slice((page - 1) * perPage, page * perPage);

      const withResponses = await Promise.all(slice.map(async (review) => ({
        ...review,
        responses: sortResponses(await this.store.listResponses(review.id, 'active'), 'asc'),
      })));

      return ok({
        reviews: withResponses,
        total: reviews.length,
        pages: Math.ceil(reviews.length / perPage),
        currentPage: page,
      });
    });
  }

  /** Every review a user wrote, any status, newest first */
  async listReviewsByUser(userId: string): Promise<Result<Review[]>> {
    return capture<Review[]>(async () => ok((await this.store.listUserReviews(userId)).sort(newestFirst)));
  }

  /** Moderation queue, oldest first */
  async listPendingReviews(): Promise<Result<Review[]>> {
    return capture<Review[]>(async () => ok((await this.store.listPendingReviews()).sort(oldestFirst)));
  }

  async getSummary(productId: string): Promise<Result<ReviewSummary>> {
    return capture<ReviewSummary>(async () => {
      const summary = await this.store.getSummary(productId);
      return summary
        ? ok(summary)
        : fail(new NotFoundError(`No review summary for product ${productId}`, { productId }));
    });
  }
}
