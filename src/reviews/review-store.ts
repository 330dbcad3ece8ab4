/**
 * Review Store
 *
 * Redis-backed with in-memory fallback. Every write that must land
 * together (status change + index moves + summary, or a cascading delete)
 * goes through a single Lua script, so readers never see half of it.
 */

import Redis from 'ioredis';
import {
  AddResponseOutcome,
  Helpfulness,
  RemovalCommit,
  ResponseStatus,
  Review,
  ReviewRepository,
  ReviewResponse,
  ReviewStatus,
  ReviewSummary,
  StatusFilter,
  TransitionCommit,
} from './types';
import { ConcurrencyConflictError, InvalidStateTransitionError, NotFoundError, PersistenceError } from './errors';
import { logger } from '../observability/logger';

const REVIEW_STATUSES: readonly ReviewStatus[] = ['pending', 'approved', 'rejected'];

/** Review document as stored; counters live in their own hash */
type StoredReview = Omit<Review, 'helpfulness'>;

type CommitOutcome = 'OK' | 'NOT_FOUND' | 'STATUS_CHANGED' | 'VERSION_CHANGED';

function isCommitOutcome(value: unknown): value is CommitOutcome {
  return value === 'OK' || value === 'NOT_FOUND' || value === 'STATUS_CHANGED' || value === 'VERSION_CHANGED';
}

function changesApprovedSet(from: ReviewStatus, to: ReviewStatus): boolean {
  return from !== to && (from === 'approved' || to === 'approved');
}

function toScore(isoDate: string): number {
  return new Date(isoDate).getTime();
}

function toCount(raw: unknown): number {
  const n = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  return Number.isNaN(n) ? 0 : n;
}

// ───── Lua Scripts ──────────────────────────────────────────────

// KEYS: review, helpfulness, product status index, user index, pending queue
// ARGV: review json, id, score, likes, dislikes, is pending
const SAVE_REVIEW_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('SET', KEYS[1], ARGV[1])
redis.call('HSET', KEYS[2], 'likes', ARGV[4], 'dislikes', ARGV[5])
redis.call('ZADD', KEYS[3], ARGV[3], ARGV[2])
redis.call('ZADD', KEYS[4], ARGV[3], ARGV[2])
if ARGV[6] == '1' then redis.call('ZADD', KEYS[5], ARGV[3], ARGV[2]) end
return 1
`;

// KEYS: review, from index, to index, pending queue, version, summary
// ARGV: id, expected status, review json, score, expected version, summary json, bump version
const COMMIT_TRANSITION_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return 'NOT_FOUND' end
if cjson.decode(current)['status'] ~= ARGV[2] then return 'STATUS_CHANGED' end
if ARGV[5] ~= '' and tonumber(redis.call('GET', KEYS[5]) or '0') ~= tonumber(ARGV[5]) then
  return 'VERSION_CHANGED'
end
redis.call('SET', KEYS[1], ARGV[3])
redis.call('ZREM', KEYS[2], ARGV[1])
redis.call('ZADD', KEYS[3], ARGV[4], ARGV[1])
redis.call('ZREM', KEYS[4], ARGV[1])
if ARGV[7] == '1' then redis.call('INCR', KEYS[5]) end
if ARGV[6] ~= '' then redis.call('SET', KEYS[6], ARGV[6]) end
return 'OK'
`;

// KEYS: review, helpfulness, product status index, user index, pending queue, version, summary, responses index
// ARGV: id, expected status, expected version, summary json, bump version, response key prefix
// Response keys are derived inside the script, so this assumes a single Redis node (not Cluster)
const COMMIT_REMOVAL_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return 'NOT_FOUND' end
if cjson.decode(current)['status'] ~= ARGV[2] then return 'STATUS_CHANGED' end
if ARGV[3] ~= '' and tonumber(redis.call('GET', KEYS[6]) or '0') ~= tonumber(ARGV[3]) then
  return 'VERSION_CHANGED'
end
for _, responseId in ipairs(redis.call('ZRANGE', KEYS[8], 0, -1)) do
  redis.call('DEL', ARGV[6] .. responseId)
end
redis.call('DEL', KEYS[1], KEYS[2], KEYS[8])
redis.call('ZREM', KEYS[3], ARGV[1])
redis.call('ZREM', KEYS[4], ARGV[1])
redis.call('ZREM', KEYS[5], ARGV[1])
if ARGV[5] == '1' then redis.call('INCR', KEYS[6]) end
if ARGV[4] ~= '' then redis.call('SET', KEYS[7], ARGV[4]) end
return 'OK'
`;

// KEYS: review, helpfulness   ARGV: likes, dislikes ('' keeps the current value)
const SET_HELPFULNESS_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return nil end
if ARGV[1] ~= '' then redis.call('HSET', KEYS[2], 'likes', ARGV[1]) end
if ARGV[2] ~= '' then redis.call('HSET', KEYS[2], 'dislikes', ARGV[2]) end
return redis.call('HMGET', KEYS[2], 'likes', 'dislikes')
`;

// KEYS: review, response, responses index   ARGV: response json, id, score
const ADD_RESPONSE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return 'REVIEW_MISSING' end
if redis.call('EXISTS', KEYS[2]) == 1 then return 'DUPLICATE' end
redis.call('SET', KEYS[2], ARGV[1])
redis.call('ZADD', KEYS[3], ARGV[3], ARGV[2])
return 'ADDED'
`;

// KEYS: response   ARGV: status
const SET_RESPONSE_STATUS_SCRIPT = `
local raw = redis.call('GET', KEYS[1])
if not raw then return nil end
local doc = cjson.decode(raw)
doc['status'] = ARGV[1]
local encoded = cjson.encode(doc)
redis.call('SET', KEYS[1], encoded)
return encoded
`;

// ───── Redis Implementation ─────────────────────────────────────

export class RedisReviewStore implements ReviewRepository {
  private readonly log = logger.child({ component: 'review-store-redis' });

  constructor(
    private readonly redis: Redis,
    private readonly prefix: string,
  ) {}

  async getReview(reviewId: string): Promise<Review | null> {
    const [review] = await this.loadMany([reviewId]);
    return review ?? null;
  }

  async saveReview(review: Review): Promise<boolean> {
    const { helpfulness, ...doc } = review;
    const score = toScore(review.reviewDate);
    const created = await this.run('saveReview', () => this.redis.eval(
      SAVE_REVIEW_SCRIPT,
      5,
      this.reviewKey(review.id),
      this.helpfulnessKey(review.id),
      this.productIndexKey(review.productId, review.status),
      this.userKey(review.userId),
      this.pendingKey(),
      JSON.stringify(doc),
      review.id,
      score,
      helpfulness.likes,
      helpfulness.dislikes,
      review.status === 'pending' ? '1' : '0',
    ));
    return created === 1;
  }

  async listApprovedReviews(productId: string): Promise<Review[]> {
    return this.listProductReviews(productId, 'approved');
  }

  async listProductReviews(productId: string, status: StatusFilter<ReviewStatus>): Promise<Review[]> {
    const statuses = status === 'all' ? REVIEW_STATUSES : [status];
    const ids: string[] = [];
    for (const s of statuses) {
      ids.push(...await this.run('listProductReviews', () => this.redis.zrange(this.productIndexKey(productId, s), 0, -1)));
    }
    const reviews = await this.loadMany(ids);
    // The indexes and documents move together, but filter in case a key was edited by hand
    return reviews.filter((r) => status === 'all' || r.status === status);
  }

  async listUserReviews(userId: string): Promise<Review[]> {
    const ids = await this.run('listUserReviews', () => this.redis.zrange(this.userKey(userId), 0, -1));
    return this.loadMany(ids);
  }

  async listPendingReviews(): Promise<Review[]> {
    const ids = await this.run('listPendingReviews', () => this.redis.zrange(this.pendingKey(), 0, -1));
    return (await this.loadMany(ids)).filter((r) => r.status === 'pending');
  }

  async getProductVersion(productId: string): Promise<number> {
    const raw = await this.run('getProductVersion', () => this.redis.get(this.versionKey(productId)));
    return toCount(raw);
  }

  async commitTransition(commit: TransitionCommit): Promise<void> {
    const { helpfulness: _counters, ...doc } = commit.review;
    const { productId, id, status } = commit.review;
    const outcome = await this.run('commitTransition', () => this.redis.eval(
      COMMIT_TRANSITION_SCRIPT,
      6,
      this.reviewKey(id),
      this.productIndexKey(productId, commit.expectedStatus),
      this.productIndexKey(productId, status),
      this.pendingKey(),
      this.versionKey(productId),
      this.summaryKey(productId),
      id,
      commit.expectedStatus,
      JSON.stringify(doc),
      toScore(commit.review.reviewDate),
      commit.expectedVersion ?? '',
      commit.summary ? JSON.stringify(commit.summary) : '',
      changesApprovedSet(commit.expectedStatus, status) ? '1' : '0',
    ));

    switch (this.outcome(outcome)) {
      case 'OK':
        return;
      case 'NOT_FOUND':
        throw new NotFoundError(`Review ${id} not found`, { reviewId: id });
      case 'STATUS_CHANGED':
        throw new InvalidStateTransitionError(
          `Review ${id} is no longer ${commit.expectedStatus}`,
          { reviewId: id, expected: commit.expectedStatus },
        );
      case 'VERSION_CHANGED':
        throw new ConcurrencyConflictError(
          `Approved reviews for product ${productId} changed during moderation`,
          { productId, reviewId: id },
        );
    }
  }

  async commitRemoval(commit: RemovalCommit): Promise<void> {
    const { id, productId, userId, status } = commit.review;
    const outcome = await this.run('commitRemoval', () => this.redis.eval(
      COMMIT_REMOVAL_SCRIPT,
      8,
      this.reviewKey(id),
      this.helpfulnessKey(id),
      this.productIndexKey(productId, status),
      this.userKey(userId),
      this.pendingKey(),
      this.versionKey(productId),
      this.summaryKey(productId),
      this.responsesKey(id),
      id,
      status,
      commit.expectedVersion ?? '',
      commit.summary ? JSON.stringify(commit.summary) : '',
      status === 'approved' ? '1' : '0',
      this.responseKey(''),
    ));

    switch (this.outcome(outcome)) {
      case 'OK':
        return;
      case 'NOT_FOUND':
        throw new NotFoundError(`Review ${id} not found`, { reviewId: id });
      case 'STATUS_CHANGED':
      case 'VERSION_CHANGED':
        throw new ConcurrencyConflictError(
          `Review ${id} changed while it was being removed`,
          { productId, reviewId: id },
        );
    }
  }

  async getSummary(productId: string): Promise<ReviewSummary | null> {
    const raw = await this.run('getSummary', () => this.redis.get(this.summaryKey(productId)));
    return raw ? (JSON.parse(raw) as ReviewSummary) : null;
  }

  async setHelpfulness(reviewId: string, patch: Partial<Helpfulness>): Promise<Helpfulness | null> {
    const result = await this.run('setHelpfulness', () => this.redis.eval(
      SET_HELPFULNESS_SCRIPT,
      2,
      this.reviewKey(reviewId),
      this.helpfulnessKey(reviewId),
      patch.likes ?? '',
      patch.dislikes ?? '',
    ));
    if (!Array.isArray(result)) return null;
    return { likes: toCount(result[0]), dislikes: toCount(result[1]) };
  }

  async addResponse(response: ReviewResponse): Promise<AddResponseOutcome> {
    const result = await this.run('addResponse', () => this.redis.eval(
      ADD_RESPONSE_SCRIPT,
      3,
      this.reviewKey(response.reviewId),
      this.responseKey(response.id),
      this.responsesKey(response.reviewId),
      JSON.stringify(response),
      response.id,
      toScore(response.responseDate),
    ));
    if (result === 'REVIEW_MISSING') return 'review_missing';
    if (result === 'DUPLICATE') return 'duplicate';
    return 'added';
  }

  async listResponses(reviewId: string, status: StatusFilter<ResponseStatus>): Promise<ReviewResponse[]> {
    const ids = await this.run('listResponses', () => this.redis.zrange(this.responsesKey(reviewId), 0, -1));
    if (ids.length === 0) return [];
    const raws = await this.run('listResponses', () => this.redis.mget(...ids.map((id) => this.responseKey(id))));
    const responses: ReviewResponse[] = [];
    for (const raw of raws) {
      if (!raw) continue;
      const response = JSON.parse(raw) as ReviewResponse;
      if (status === 'all' || response.status === status) responses.push(response);
    }
    return responses;
  }

  async getResponse(responseId: string): Promise<ReviewResponse | null> {
    const raw = await this.run('getResponse', () => this.redis.get(this.responseKey(responseId)));
    return raw ? (JSON.parse(raw) as ReviewResponse) : null;
  }

  async setResponseStatus(responseId: string, status: ResponseStatus): Promise<ReviewResponse | null> {
    const raw = await this.run('setResponseStatus', () => this.redis.eval(
      SET_RESPONSE_STATUS_SCRIPT,
      1,
      this.responseKey(responseId),
      status,
    ));
    return typeof raw === 'string' ? (JSON.parse(raw) as ReviewResponse) : null;
  }

  async ping(): Promise<void> {
    await this.run('ping', () => this.redis.ping());
  }

  // ───── Internals ─────

  private async loadMany(ids: string[]): Promise<Review[]> {
    if (ids.length === 0) return [];
    const pipeline = this.redis.pipeline();
    for (const id of ids) {
      pipeline.get(this.reviewKey(id));
      pipeline.hmget(this.helpfulnessKey(id), 'likes', 'dislikes');
    }
    const results = await this.run('loadReviews', () => pipeline.exec());
    if (!results) throw new PersistenceError('Review pipeline was discarded');

    const reviews: Review[] = [];
    for (let i = 0; i < results.length; i += 2) {
      const [docErr, raw] = results[i];
      const [countErr, counters] = results[i + 1];
      const err = docErr ?? countErr;
      if (err) throw new PersistenceError('Failed to load review', err);
      if (typeof raw !== 'string') continue;

      const doc = JSON.parse(raw) as StoredReview;
      const pair = Array.isArray(counters) ? counters : [];
      reviews.push({ ...doc, helpfulness: { likes: toCount(pair[0]), dislikes: toCount(pair[1]) } });
    }
    return reviews;
  }

  private outcome(raw: unknown): CommitOutcome {
    if (isCommitOutcome(raw)) return raw;
    throw new PersistenceError(`Unexpected commit result: ${String(raw)}`);
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      this.log.error({ err, operation }, 'Redis operation failed');
      throw new PersistenceError(`Storage failure during ${operation}`, err);
    }
  }

  private reviewKey(id: string): string {
    return `${this.prefix}review:${id}`;
  }

  private helpfulnessKey(id: string): string {
    return `${this.prefix}helpfulness:${id}`;
  }

  private productIndexKey(productId: string, status: ReviewStatus): string {
    return `${this.prefix}product:${productId}:${status}`;
  }

  private versionKey(productId: string): string {
    return `${this.prefix}product:${productId}:version`;
  }

  private summaryKey(productId: string): string {
    return `${this.prefix}summary:${productId}`;
  }

  private userKey(userId: string): string {
    return `${this.prefix}user:${userId}`;
  }

  private pendingKey(): string {
    return `${this.prefix}pending`;
  }

  private responsesKey(reviewId: string): string {
    return `${this.prefix}responses:${reviewId}`;
  }

  private responseKey(responseId: string): string {
    return `${this.prefix}response:${responseId}`;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryReviewStore implements ReviewRepository {
  private readonly reviews = new Map<string, Review>();
  private readonly summaries = new Map<string, ReviewSummary>();
  private readonly versions = new Map<string, number>();
  private readonly responses = new Map<string, ReviewResponse>();

  async getReview(reviewId: string): Promise<Review | null> {
    const review = this.reviews.get(reviewId);
    return review ? structuredClone(review) : null;
  }

  async saveReview(review: Review): Promise<boolean> {
    if (this.reviews.has(review.id)) return false;
    this.reviews.set(review.id, structuredClone(review));
    return true;
  }

  async listApprovedReviews(productId: string): Promise<Review[]> {
    return this.listProductReviews(productId, 'approved');
  }

  async listProductReviews(productId: string, status: StatusFilter<ReviewStatus>): Promise<Review[]> {
    return this.select((r) => r.productId === productId && (status === 'all' || r.status === status));
  }

  async listUserReviews(userId: string): Promise<Review[]> {
    return this.select((r) => r.userId === userId);
  }

  async listPendingReviews(): Promise<Review[]> {
    return this.select((r) => r.status === 'pending');
  }

  async getProductVersion(productId: string): Promise<number> {
    return this.versions.get(productId) ?? 0;
  }

  async commitTransition(commit: TransitionCommit): Promise<void> {
    const { id, productId, status } = commit.review;
    const current = this.reviews.get(id);
    if (!current) throw new NotFoundError(`Review ${id} not found`, { reviewId: id });
    if (current.status !== commit.expectedStatus) {
      throw new InvalidStateTransitionError(
        `Review ${id} is no longer ${commit.expectedStatus}`,
        { reviewId: id, expected: commit.expectedStatus },
      );
    }
    this.checkVersion(productId, commit.expectedVersion, id);

    // Counters are owned by setHelpfulness; keep whatever is stored
    this.reviews.set(id, { ...structuredClone(commit.review), helpfulness: current.helpfulness });
    if (changesApprovedSet(commit.expectedStatus, status)) this.bumpVersion(productId);
    if (commit.summary) this.summaries.set(productId, structuredClone(commit.summary));
  }

  async commitRemoval(commit: RemovalCommit): Promise<void> {
    const { id, productId, status } = commit.review;
    const current = this.reviews.get(id);
    if (!current) throw new NotFoundError(`Review ${id} not found`, { reviewId: id });
    if (current.status !== status) {
      throw new ConcurrencyConflictError(`Review ${id} changed while it was being removed`, { productId, reviewId: id });
    }
    this.checkVersion(productId, commit.expectedVersion, id);

    this.reviews.delete(id);
    for (const [responseId, response] of this.responses) {
      if (response.reviewId === id) this.responses.delete(responseId);
    }
    if (status === 'approved') this.bumpVersion(productId);
    if (commit.summary) this.summaries.set(productId, structuredClone(commit.summary));
  }

  async getSummary(productId: string): Promise<ReviewSummary | null> {
    const summary = this.summaries.get(productId);
    return summary ? structuredClone(summary) : null;
  }

  async setHelpfulness(reviewId: string, patch: Partial<Helpfulness>): Promise<Helpfulness | null> {
    const review = this.reviews.get(reviewId);
    if (!review) return null;
    if (patch.likes !== undefined) review.helpfulness.likes = patch.likes;
    if (patch.dislikes !== undefined) review.helpfulness.dislikes = patch.dislikes;
    return { ...review.helpfulness };
  }

  async addResponse(response: ReviewResponse): Promise<AddResponseOutcome> {
    if (!this.reviews.has(response.reviewId)) return 'review_missing';
    if (this.responses.has(response.id)) return 'duplicate';
    this.responses.set(response.id, structuredClone(response));
    return 'added';
  }

  async listResponses(reviewId: string, status: StatusFilter<ResponseStatus>): Promise<ReviewResponse[]> {
    return Array.from(this.responses.values())
      .filter((r) => r.reviewId === reviewId && (status === 'all' || r.status === status))
      .map((r) => structuredClone(r));
  }

  async getResponse(responseId: string): Promise<ReviewResponse | null> {
    const response = this.responses.get(responseId);
    return response ? structuredClone(response) : null;
  }

  async setResponseStatus(responseId: string, status: ResponseStatus): Promise<ReviewResponse | null> {
    const response = this.responses.get(responseId);
    if (!response) return null;
    response.status = status;
    return structuredClone(response);
  }

  async ping(): Promise<void> {
    // Nothing to reach
  }

  private select(predicate: (review: Review) => boolean): Review[] {
    return Array.from(this.reviews.values()).filter(predicate).map((r) => structuredClone(r));
  }

  private checkVersion(productId: string, expected: number | undefined, reviewId: string): void {
    if (expected === undefined) return;
    if ((this.versions.get(productId) ?? 0) !== expected) {
      throw new ConcurrencyConflictError(
        `Approved reviews for product ${productId} changed during moderation`,
        { productId, reviewId },
      );
    }
  }

  private bumpVersion(productId: string): void {
    this.versions.set(productId, (this.versions.get(productId) ?? 0) + 1);
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createReviewStore(redis: Redis | undefined, keyPrefix: string): ReviewRepository {
  if (redis) {
    logger.info({ keyPrefix }, 'Review store: Redis-backed');
    return new RedisReviewStore(redis, keyPrefix);
  }
  logger.info('Review store: In-memory');
  return new InMemoryReviewStore();
}
