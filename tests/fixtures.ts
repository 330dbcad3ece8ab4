import { Review } from '../src/reviews/types';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export function fixedClock(): Date {
  return FIXED_NOW;
}

/** Clock that moves forward one minute per call */
export function tickingClock(start = '2026-03-01T10:00:00.000Z'): () => Date {
  let t = Date.parse(start);
  return () => {
    const now = new Date(t);
    t += 60_000;
    return now;
  };
}

export function makeReview(overrides: Partial<Review> = {}): Review {
  return {
    id: 'r1',
    productId: 'p1',
    userId: 'u1',
    title: 'Solid kettle',
    rating: 5,
    reviewDate: '2026-02-01T09:00:00.000Z',
    helpfulness: { likes: 0, dislikes: 0 },
    status: 'pending',
    verifiedPurchase: false,
    ...overrides,
  };
}
