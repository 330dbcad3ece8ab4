import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { env } from '../config/env';
import { HTTP_STATUS, ReviewError, ValidationError } from './errors';
import { ModerationAction, ResponseStatus, ReviewStatus, StatusFilter } from './types';
import { ReviewService } from './review-service';
import { ModerationService } from './moderation-service';
import { HelpfulnessTracker } from './helpfulness-tracker';
import { ResponseOrder, ReviewResponseLedger } from './response-ledger';

export interface ReviewRouteDeps {
  reviews: ReviewService;
  moderation: ModerationService;
  helpfulness: HelpfulnessTracker;
  responses: ReviewResponseLedger;
}

const REVIEW_FILTERS: readonly StatusFilter<ReviewStatus>[] = ['pending', 'approved', 'rejected', 'all'];
const RESPONSE_FILTERS: readonly StatusFilter<ResponseStatus>[] = ['active', 'inactive', 'all'];
const RESPONSE_STATUSES: readonly ResponseStatus[] = ['active', 'inactive'];
const RESPONSE_ORDERS: readonly ResponseOrder[] = ['asc', 'desc'];

function verifyAdminKey(req: FastifyRequest, reply: FastifyReply): boolean {
  const key = req.headers['x-admin-api-key'];
  if (typeof key !== 'string' || key !== env.security.adminApiKey) {
    reply.status(403).send({ error: 'Forbidden' });
    return false;
  }
  return true;
}

function sendError(reply: FastifyReply, error: ReviewError): FastifyReply {
  return reply.status(HTTP_STATUS[error.code]).send({ error: error.toJSON() });
}

function pick<T extends string>(raw: string | undefined, allowed: readonly T[], name: string): T | undefined | ValidationError {
  if (raw === undefined) return undefined;
  const match = allowed.find((value) => value === raw);
  return match ?? new ValidationError(`${name} must be one of: ${allowed.join(', ')}`, { [name]: raw });
}

function parseInteger(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  return /^-?\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
}

/** Aborts when the client goes away before the response is written */
function clientSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}

export function registerReviewRoutes(app: FastifyInstance, deps: ReviewRouteDeps): void {
  const { reviews, moderation, helpfulness, responses } = deps;

  /** Submit a review (always starts pending) */
  app.post('/reviews', async (req, reply) => {
    const result = await reviews.createReview(req.body);
    if (!result.ok) return sendError(reply, result.error);
    return reply.status(201).send({ id: result.value.id, status: result.value.status });
  });

  /** Moderation queue */
  app.get('/reviews/pending', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const result = await reviews.listPendingReviews();
    if (!result.ok) return sendError(reply, result.error);
    return reply.send({ count: result.value.length, reviews: result.value });
  });

  app.get<{ Params: { userId: string } }>('/reviews/users/:userId', async (req, reply) => {
    const result = await reviews.listReviewsByUser(req.params.userId);
    if (!result.ok) return sendError(reply, result.error);
    return reply.send({ count: result.value.length, reviews: result.value });
  });

  app.get<{
    Params: { productId: string };
    Querystring: { status?: string; page?: string; perPage?: string };
  }>('/reviews/products/:productId', async (req, reply) => {
    const status = pick(req.query.status, REVIEW_FILTERS, 'status');
    if (status instanceof ValidationError) return sendError(reply, status);

    const result = await reviews.listReviewsForProduct(req.params.productId, {
      status,
      page: parseInteger(req.query.page),
      perPage: parseInteger(req.query.perPage),
    });
    if (!result.ok) return sendError(reply, result.error);
    return reply.send(result.value);
  });

  app.get<{ Params: { productId: string } }>('/reviews/products/:productId/summary', async (req, reply) => {
    const result = await reviews.getSummary(req.params.productId);
    if (!result.ok) return sendError(reply, result.error);
    return reply.send(result.value);
  });

  app.get<{ Params: { reviewId: string } }>('/reviews/:reviewId', async (req, reply) => {
    const result = await reviews.getReview(req.params.reviewId);
    if (!result.ok) return sendError(reply, result.error);
    return reply.send(result.value);
  });

  app.delete<{ Params: { reviewId: string } }>('/reviews/:reviewId', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const result = await moderation.removeReview(req.params.reviewId, { signal: clientSignal(reply) });
    if (!result.ok) return sendError(reply, result.error);
    return reply.send({ message: 'Review deleted', summary: result.value.summary ?? null });
  });

  // ───── Moderation ─────

  const moderate = (action: ModerationAction, verb: string) =>
    async (req: FastifyRequest<{ Params: { reviewId: string } }>, reply: FastifyReply) => {
      if (!verifyAdminKey(req, reply)) return;

      const result = await moderation.transition(req.params.reviewId, action, { signal: clientSignal(reply) });
      if (!result.ok) return sendError(reply, result.error);
      return reply.send({
        message: `Review ${verb}`,
        review: result.value.review,
        summary: result.value.summary ?? null,
      });
    };

  app.put<{ Params: { reviewId: string } }>('/reviews/:reviewId/approve', moderate('approve', 'approved'));
  app.put<{ Params: { reviewId: string } }>('/reviews/:reviewId/reject', moderate('reject', 'rejected'));

  // ───── Helpfulness ─────

  app.patch<{
    Params: { reviewId: string };
    Body: { likes?: unknown; dislikes?: unknown } | null;
  }>('/reviews/:reviewId/helpfulness', async (req, reply) => {
    const result = await helpfulness.set(req.params.reviewId, req.body ?? {});
    if (!result.ok) return sendError(reply, result.error);
    return reply.send({ helpfulness: result.value });
  });

  // ───── Responses ─────

  app.post<{ Params: { reviewId: string } }>('/reviews/:reviewId/responses', async (req, reply) => {
    const result = await responses.addResponse(req.params.reviewId, req.body);
    if (!result.ok) return sendError(reply, result.error);
    return reply.status(201).send({ id: result.value.id });
  });

  app.get<{
    Params: { reviewId: string };
    Querystring: { status?: string; order?: string };
  }>('/reviews/:reviewId/responses', async (req, reply) => {
    const status = pick(req.query.status, RESPONSE_FILTERS, 'status');
    if (status instanceof ValidationError) return sendError(reply, status);
    const order = pick(req.query.order, RESPONSE_ORDERS, 'order');
    if (order instanceof ValidationError) return sendError(reply, order);

    const result = await responses.listResponses(req.params.reviewId, { status, order });
    if (!result.ok) return sendError(reply, result.error);
    return reply.send({ count: result.value.length, responses: result.value });
  });

  app.patch<{
    Params: { reviewId: string; responseId: string };
    Body: { status?: string } | null;
  }>('/reviews/:reviewId/responses/:responseId', async (req, reply) => {
    const status = pick(req.body?.status, RESPONSE_STATUSES, 'status');
    if (status instanceof ValidationError) return sendError(reply, status);
    if (!status) return sendError(reply, new ValidationError('status is required'));

    const result = await responses.setResponseStatus(req.params.reviewId, req.params.responseId, status);
    if (!result.ok) return sendError(reply, result.error);
    return reply.send(result.value);
  });
}
