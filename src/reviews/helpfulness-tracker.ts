import { Helpfulness, ReviewRepository } from './types';
import { NotFoundError, Result, ValidationError, capture, fail, ok } from './errors';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'helpfulness-tracker' });

function isCounter(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Like/dislike counters. Values are assigned, not incremented, so two
 * concurrent writers race and the last one wins.
 */
export class HelpfulnessTracker {
  constructor(private readonly store: ReviewRepository) {}

  setLikes(reviewId: string, likes: number): Promise<Result<Helpfulness>> {
    return this.set(reviewId, { likes });
  }

  setDislikes(reviewId: string, dislikes: number): Promise<Result<Helpfulness>> {
    return this.set(reviewId, { dislikes });
  }

  async set(reviewId: string, patch: { likes?: unknown; dislikes?: unknown }): Promise<Result<Helpfulness>> {
    if (patch.likes === undefined && patch.dislikes === undefined) {
      return fail(new ValidationError('Provide likes, dislikes or both'));
    }

    let likes: number | undefined;
    if (patch.likes !== undefined) {
      if (!isCounter(patch.likes)) {
        return fail(new ValidationError('likes must be a non-negative integer', { likes: patch.likes }));
      }
      likes = patch.likes;
    }

    let dislikes: number | undefined;
    if (patch.dislikes !== undefined) {
      if (!isCounter(patch.dislikes)) {
        return fail(new ValidationError('dislikes must be a non-negative integer', { dislikes: patch.dislikes }));
      }
      dislikes = patch.dislikes;
    }

    return capture<Helpfulness>(async () => {
      const updated = await this.store.setHelpfulness(reviewId, { likes, dislikes });
      if (!updated) return fail<Helpfulness>(new NotFoundError(`Review ${reviewId} not found`, { reviewId }));

      log.debug({ reviewId, ...updated }, 'Helpfulness updated');
      return ok(updated);
    });
  }
}
