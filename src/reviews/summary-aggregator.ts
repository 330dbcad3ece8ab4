/**
 * Summary Aggregator
 *
 * Rebuilds a product's rating summary from its approved reviews. Always a
 * full recompute: the previous summary is never read or patched.
 */

import { RATINGS, Rating, RatingDistribution, Review, ReviewSummary } from './types';

export type Clock = () => Date;

export function emptyDistribution(): RatingDistribution {
  return { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
}

/**
 * Round a non-negative float to two decimals, half to even, judged on the
 * exact decimal value of the float (4.125 -> 4.12, 4.025 -> 4.02 because
 * the stored double is 4.02499...).
 */
export function roundTo2(value: number): number {
  // toFixed(60) is exact for doubles in the rating range
  const [whole, fraction] = value.toFixed(60).split('.');
  const cents = parseInt(whole + fraction.slice(0, 2), 10);
  const rest = fraction.slice(2);

  let roundUp: boolean;
  if (rest[0] > '5') roundUp = true;
  else if (rest[0] < '5') roundUp = false;
  else if (/[1-9]/.test(rest.slice(1))) roundUp = true;
  else roundUp = cents % 2 === 1;

  return (roundUp ? cents + 1 : cents) / 100;
}

/** Sum in ascending order so the float result does not depend on input order */
function stableSum(values: number[]): number {
  return [...values].sort((a, b) => a - b).reduce((acc, v) => acc + v, 0);
}

export class SummaryAggregator {
  constructor(private readonly clock: Clock = () => new Date()) {}

  recompute(productId: string, approvedReviews: readonly Review[]): ReviewSummary {
    const distribution = emptyDistribution();
    const attributeValues = new Map<string, number[]>();

    for (const review of approvedReviews) {
      if (review.status !== 'approved') continue;

      distribution[review.rating] += 1;

      if (!review.attributes) continue;
      for (const [name, value] of Object.entries(review.attributes)) {
        if (typeof value !== 'number' || !Number.isFinite(value)) continue;
        const bucket = attributeValues.get(name);
        if (bucket) bucket.push(value);
        else attributeValues.set(name, [value]);
      }
    }

    const totalReviews = RATINGS.reduce((acc, r) => acc + distribution[r], 0);
    const ratingSum = RATINGS.reduce((acc, r: Rating) => acc + r * distribution[r], 0);

    const attributeAverages: Record<string, number> = Object.fromEntries(
      [...attributeValues.keys()].sort().map((name): [string, number] => {
        const values = attributeValues.get(name) ?? [];
        return [name, stableSum(values) / values.length];
      }),
    );

    return {
      productId,
      averageRating: totalReviews > 0 ? roundTo2(ratingSum / totalReviews) : 0,
      totalReviews,
      distribution,
      attributeAverages,
      lastUpdated: this.clock().toISOString(),
    };
  }
}
