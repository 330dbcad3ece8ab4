import { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app';

const ADMIN = { 'x-admin-api-key': 'test-admin-key' };

describe('Review HTTP API', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    ({ app } = await buildApp());
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function submit(body: Record<string, unknown>): Promise<string> {
    const res = await app.inject({ method: 'POST', url: '/reviews', payload: body });
    expect(res.statusCode).toBe(201);
    return res.json<{ id: string }>().id;
  }

  function approve(id: string) {
    return app.inject({ method: 'PUT', url: `/reviews/${id}/approve`, headers: ADMIN });
  }

  it('GET /health should report the service alive', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', service: 'reviews' });
  });

  it('GET /ready should skip the Redis check on the in-memory store', async () => {
    const res = await app.inject({ method: 'GET', url: '/ready' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ready', checks: { redis: { status: 'skipped' } } });
  });

  it('POST /reviews should create a pending review', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/reviews',
      payload: { id: 'rev-1', productId: 'P', userId: 'u1', title: 'Great', rating: 5 },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({ id: 'rev-1', status: 'pending' });
  });

  it('POST /reviews should answer 400 with the error envelope', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/reviews',
      payload: { productId: 'P', userId: 'u1', title: 'Too good', rating: 6 },
    });

    expect(res.statusCode).toBe(400);
    const { error } = res.json<{ error: { code: string; message: string; retryable: boolean } }>();
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('body/rating must be <= 5');
    expect(error.retryable).toBe(false);
  });

  it('should require the admin key for moderation', async () => {
    const id = await submit({ productId: 'P', userId: 'u1', title: 'Great', rating: 5 });

    const missing = await app.inject({ method: 'PUT', url: `/reviews/${id}/approve` });
    const wrong = await app.inject({ method: 'PUT', url: `/reviews/${id}/approve`, headers: { 'x-admin-api-key': 'nope' } });

    expect(missing.statusCode).toBe(403);
    expect(wrong.statusCode).toBe(403);
    expect(missing.json()).toEqual({ error: 'Forbidden' });
  });

  it('should approve reviews and serve the rebuilt summary', async () => {
    const a = await submit({ productId: 'P', userId: 'u1', title: 'Great', rating: 5, attributes: { durability: 4 } });
    const b = await submit({ productId: 'P', userId: 'u2', title: 'Fine', rating: 3 });

    const first = await approve(a);
    expect(first.statusCode).toBe(200);
    expect(first.json()).toMatchObject({ message: 'Review approved', review: { id: a, status: 'approved' } });
    expect((await approve(b)).statusCode).toBe(200);

    const res = await app.inject({ method: 'GET', url: '/reviews/products/P/summary' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      productId: 'P',
      averageRating: 4,
      totalReviews: 2,
      distribution: { 1: 0, 2: 0, 3: 1, 4: 0, 5: 1 },
      attributeAverages: { durability: 4 },
    });
  });

  it('should answer 409 when a review is approved twice', async () => {
    const id = await submit({ productId: 'P', userId: 'u1', title: 'Great', rating: 5 });
    await approve(id);

    const res = await approve(id);

    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({ error: { code: 'INVALID_STATE_TRANSITION' } });
  });

  it('should approve concurrent requests for one product without losing either', async () => {
    const a = await submit({ productId: 'P', userId: 'u1', title: 'Good', rating: 4 });
    const b = await submit({ productId: 'P', userId: 'u2', title: 'Meh', rating: 2 });

    const [ra, rb] = await Promise.all([approve(a), approve(b)]);
    expect([ra.statusCode, rb.statusCode]).toEqual([200, 200]);

    const summary = await app.inject({ method: 'GET', url: '/reviews/products/P/summary' });
    expect(summary.json()).toMatchObject({ totalReviews: 2, averageRating: 3 });
  });

  it('should reject a review without creating a summary', async () => {
    const id = await submit({ productId: 'Q', userId: 'u1', title: 'Spam', rating: 1 });

    const res = await app.inject({ method: 'PUT', url: `/reviews/${id}/reject`, headers: ADMIN });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ message: 'Review rejected', review: { status: 'rejected' }, summary: null });

    const summary = await app.inject({ method: 'GET', url: '/reviews/products/Q/summary' });
    expect(summary.statusCode).toBe(404);
  });

  it('GET /reviews/:id should answer 404 for an unknown review', async () => {
    const res = await app.inject({ method: 'GET', url: '/reviews/ghost' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ error: { code: 'NOT_FOUND', message: 'Review ghost not found' } });
  });

  it('should list the pending queue for admins only', async () => {
    await submit({ id: 'q1', productId: 'P', userId: 'u1', title: 'One', rating: 4 });

    expect((await app.inject({ method: 'GET', url: '/reviews/pending' })).statusCode).toBe(403);

    const res = await app.inject({ method: 'GET', url: '/reviews/pending', headers: ADMIN });
    expect(res.statusCode).toBe(200);
    const body = res.json<{ count: number; reviews: Array<{ id: string }> }>();
    expect(body.count).toBe(1);
    expect(body.reviews[0].id).toBe('q1');
  });

  it('should list product reviews with paging and validate the query', async () => {
    const a = await submit({ productId: 'P', userId: 'u1', title: 'One', rating: 4 });
    await approve(a);
    await submit({ productId: 'P', userId: 'u2', title: 'Two', rating: 2 });

    const approved = await app.inject({ method: 'GET', url: '/reviews/products/P' });
    expect(approved.json()).toMatchObject({ total: 1, pages: 1, currentPage: 1 });

    const all = await app.inject({ method: 'GET', url: '/reviews/products/P?status=all&perPage=1&page=2' });
    expect(all.json()).toMatchObject({ total: 2, pages: 2, currentPage: 2 });

    const badStatus = await app.inject({ method: 'GET', url: '/reviews/products/P?status=hidden' });
    expect(badStatus.statusCode).toBe(400);
    expect(badStatus.json()).toMatchObject({
      error: { message: 'status must be one of: pending, approved, rejected, all' },
    });

    const badPage = await app.inject({ method: 'GET', url: '/reviews/products/P?page=abc' });
    expect(badPage.statusCode).toBe(400);
  });

  it('should list a user\'s reviews', async () => {
    await submit({ productId: 'P', userId: 'u7', title: 'One', rating: 4 });
    await submit({ productId: 'Q', userId: 'u7', title: 'Two', rating: 3 });

    const res = await app.inject({ method: 'GET', url: '/reviews/users/u7' });
    expect(res.json()).toMatchObject({ count: 2 });
  });

  it('PATCH /reviews/:id/helpfulness should set the counters', async () => {
    const id = await submit({ productId: 'P', userId: 'u1', title: 'Great', rating: 5 });

    const res = await app.inject({ method: 'PATCH', url: `/reviews/${id}/helpfulness`, payload: { likes: 3 } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ helpfulness: { likes: 3, dislikes: 0 } });

    const bad = await app.inject({ method: 'PATCH', url: `/reviews/${id}/helpfulness`, payload: { likes: -1 } });
    expect(bad.statusCode).toBe(400);
  });

  it('should add, list and hide responses', async () => {
    const id = await submit({ productId: 'P', userId: 'u1', title: 'Great', rating: 5 });

    const created = await app.inject({
      method: 'POST',
      url: `/reviews/${id}/responses`,
      payload: { id: 'resp-1', userId: 'seller-1', comment: 'Thank you!', isSeller: true },
    });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toEqual({ id: 'resp-1' });

    const listed = await app.inject({ method: 'GET', url: `/reviews/${id}/responses` });
    expect(listed.json()).toMatchObject({ count: 1, responses: [{ id: 'resp-1', comment: 'Thank you!' }] });

    const hidden = await app.inject({
      method: 'PATCH',
      url: `/reviews/${id}/responses/resp-1`,
      payload: { status: 'inactive' },
    });
    expect(hidden.statusCode).toBe(200);
    expect(hidden.json()).toMatchObject({ id: 'resp-1', status: 'inactive' });

    const after = await app.inject({ method: 'GET', url: `/reviews/${id}/responses` });
    expect(after.json()).toEqual({ count: 0, responses: [] });

    const missingStatus = await app.inject({ method: 'PATCH', url: `/reviews/${id}/responses/resp-1`, payload: {} });
    expect(missingStatus.statusCode).toBe(400);
  });

  it('DELETE /reviews/:id should remove an approved review and rebuild the summary', async () => {
    const a = await submit({ productId: 'P', userId: 'u1', title: 'One', rating: 5 });
    const b = await submit({ productId: 'P', userId: 'u2', title: 'Two', rating: 1 });
    await approve(a);
    await approve(b);

    expect((await app.inject({ method: 'DELETE', url: `/reviews/${a}` })).statusCode).toBe(403);

    const res = await app.inject({ method: 'DELETE', url: `/reviews/${a}`, headers: ADMIN });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ message: 'Review deleted', summary: { totalReviews: 1, averageRating: 1 } });

    expect((await app.inject({ method: 'GET', url: `/reviews/${a}` })).statusCode).toBe(404);
  });

  it('GET /metrics should expose the moderation counter', async () => {
    const id = await submit({ productId: 'P', userId: 'u1', title: 'Great', rating: 5 });
    await approve(id);

    const res = await app.inject({ method: 'GET', url: '/metrics' });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain('reviews_moderation_transitions_total{action="approve",outcome="ok"}');
  });
});
