/**
 * Review Types
 *
 * Records persisted by the review repository and the shapes the
 * moderation core passes around.
 */

export type Rating = 1 | 2 | 3 | 4 | 5;

export const RATINGS: readonly Rating[] = [1, 2, 3, 4, 5];

export type ReviewStatus = 'pending' | 'approved' | 'rejected';

export type ResponseStatus = 'active' | 'inactive';

export type ModerationAction = 'approve' | 'reject';

export interface Helpfulness {
  likes: number;
  dislikes: number;
}

export interface Review {
  id: string;
  productId: string;
  userId: string;
  title: string;
  comment?: string;
  rating: Rating;
  reviewDate: string;         // ISO-8601, set at creation
  photos?: string[];
  helpfulness: Helpfulness;
  status: ReviewStatus;
  verifiedPurchase: boolean;
  attributes?: Record<string, number>; // product-specific scores, e.g. { durability: 4 }
}

export interface ReviewResponse {
  id: string;
  reviewId: string;
  userId: string;
  comment: string;
  responseDate: string;
  isSeller: boolean;
  status: ResponseStatus;
}

export type RatingDistribution = Record<Rating, number>;

export interface ReviewSummary {
  productId: string;
  averageRating: number;
  totalReviews: number;
  distribution: RatingDistribution;
  attributeAverages: Record<string, number>;
  lastUpdated: string;
}

export type StatusFilter<S extends string> = S | 'all';

export interface ReviewWithResponses extends Review {
  responses: ReviewResponse[];
}

export interface ReviewPage {
  reviews: ReviewWithResponses[];
  total: number;
  pages: number;
  currentPage: number;
}

/** Status change plus everything that must land with it. */
export interface TransitionCommit {
  review: Review;
  expectedStatus: ReviewStatus;
  /** Approved-set version read before the recompute; omitted when the approved set does not change */
  expectedVersion?: number;
  summary?: ReviewSummary;
}

export interface RemovalCommit {
  review: Review;
  expectedVersion?: number;
  summary?: ReviewSummary;
}

export type AddResponseOutcome = 'added' | 'review_missing' | 'duplicate';

export interface ReviewRepository {
  getReview(reviewId: string): Promise<Review | null>;
  /** Returns false when the id is already taken */
  saveReview(review: Review): Promise<boolean>;
  listApprovedReviews(productId: string): Promise<Review[]>;
  listProductReviews(productId: string, status: StatusFilter<ReviewStatus>): Promise<Review[]>;
  listUserReviews(userId: string): Promise<Review[]>;
  listPendingReviews(): Promise<Review[]>;

  getProductVersion(productId: string): Promise<number>;
  commitTransition(commit: TransitionCommit): Promise<void>;
  commitRemoval(commit: RemovalCommit): Promise<void>;
  getSummary(productId: string): Promise<ReviewSummary | null>;

  /** Returns null when the review does not exist */
  setHelpfulness(reviewId: string, patch: Partial<Helpfulness>): Promise<Helpfulness | null>;

  addResponse(response: ReviewResponse): Promise<AddResponseOutcome>;
  listResponses(reviewId: string, status: StatusFilter<ResponseStatus>): Promise<ReviewResponse[]>;
  getResponse(responseId: string): Promise<ReviewResponse | null>;
  setResponseStatus(responseId: string, status: ResponseStatus): Promise<ReviewResponse | null>;

  ping(): Promise<void>;
}

export function isRating(value: number): value is Rating {
  return Number.isInteger(value) && value >= 1 && value <= 5;
}
