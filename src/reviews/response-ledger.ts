/**
 * Review Response Ledger
 *
 * Seller and customer replies attached to a review. Responses have their
 * own active/inactive status and never feed the rating summary.
 */

import { v4 as uuid } from 'uuid';
import { ResponseStatus, ReviewRepository, ReviewResponse, StatusFilter } from './types';
import { NotFoundError, Result, ValidationError, capture, fail, ok } from './errors';
import { parseCreateResponse } from './schemas';
import { logger } from '../observability/logger';

export type ResponseOrder = 'asc' | 'desc';

export interface ListResponsesOptions {
  status?: StatusFilter<ResponseStatus>;
  order?: ResponseOrder;
}

export function sortResponses(responses: ReviewResponse[], order: ResponseOrder): ReviewResponse[] {
  const direction = order === 'asc' ? 1 : -1;
  return [...responses].sort((a, b) => {
    const byDate = a.responseDate.localeCompare(b.responseDate);
    return direction * (byDate !== 0 ? byDate : a.id.localeCompare(b.id));
  });
}

export class ReviewResponseLedger {
  private readonly log = logger.child({ component: 'response-ledger' });

  constructor(
    private readonly store: ReviewRepository,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async addResponse(reviewId: string, body: unknown): Promise<Result<ReviewResponse>> {
    const input = parseCreateResponse(body);
    if (input instanceof ValidationError) return fail(input);

    const response: ReviewResponse = {
      id: input.id ?? uuid(),
      reviewId,
      userId: input.userId,
      comment: input.comment.trim(),
      responseDate: this.clock().toISOString(),
      isSeller: input.isSeller ?? false,
      status: 'active',
    };

    return capture<ReviewResponse>(async () => {
      const outcome = await this.store.addResponse(response);
      if (outcome === 'review_missing') {
        return fail(new NotFoundError(`Review ${reviewId} not found`, { reviewId }));
      }
      if (outcome === 'duplicate') {
        return fail(new ValidationError(`Response ${response.id} already exists`, { responseId: response.id }));
      }

      this.log.info({ reviewId, responseId: response.id, isSeller: response.isSeller }, 'Review response added');
      return ok(response);
    });
  }

  async listResponses(reviewId: string, options: ListResponsesOptions = {}): Promise<Result<ReviewResponse[]>> {
    const { status = 'active', order = 'asc' } = options;
    return capture<ReviewResponse[]>(async () => {
      const review = await this.store.getReview(reviewId);
      if (!review) return fail(new NotFoundError(`Review ${reviewId} not found`, { reviewId }));

      const responses = await this.store.listResponses(reviewId, status);
      return ok(sortResponses(responses, order));
    });
  }

  /** Activate or hide a response; it must belong to the given review */
  async setResponseStatus(reviewId: string, responseId: string, status: ResponseStatus): Promise<Result<ReviewResponse>> {
    return capture<ReviewResponse>(async () => {
      const existing = await this.store.getResponse(responseId);
      if (!existing || existing.reviewId !== reviewId) {
        return fail(new NotFoundError(`Response ${responseId} not found on review ${reviewId}`, { reviewId, responseId }));
      }

      const updated = await this.store.setResponseStatus(responseId, status);
      if (!updated) {
        return fail(new NotFoundError(`Response ${responseId} not found on review ${reviewId}`, { reviewId, responseId }));
      }

      this.log.info({ reviewId, responseId, status }, 'Review response status changed');
      return ok(updated);
    });
  }
}
