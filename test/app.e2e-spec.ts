import request from 'supertest';
import { createTestApp, type TestApp } from './support/test-app';

describe('REST API (e2e)', () => {
  let ctx: TestApp;
  let server: Parameters<typeof request>[0];

  beforeEach(async () => {
    ctx = await createTestApp();
    server = ctx.app.getHttpServer();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  async function register(username: string, email = `${username}@example.com`, password = 'password123') {
    const res = await request(server).post('/api/auth/register').send({ username, email, password }).expect(201);
    return { token: String(res.body.data.access_token), id: Number(res.body.data.user.id) };
  }

  it('walks through register, login and the post lifecycle', async () => {
    const alice = await register('alice');
    const bob = await register('bob');

    const login = await request(server)
      .post('/api/auth/login')
      .send({ username: 'alice', password: 'password123' })
      .expect(200);
    expect(login.body.data.user).toMatchObject({ id: alice.id, username: 'alice', email: 'alice@example.com' });
    expect(typeof login.body.data.access_token).toBe('string');

    const created = await request(server)
      .post('/api/posts')
      .set('Authorization', `Bearer ${alice.token}`)
      .send({ title: 'Hello', content: 'First post' })
      .expect(201);
    const post = created.body.data;
    expect(post).toMatchObject({ title: 'Hello', content: 'First post', author_id: alice.id });
    expect(post.created_at).toBe(post.updated_at);

    await request(server)
      .put(`/api/posts/${post.id}`)
      .set('Authorization', `Bearer ${bob.token}`)
      .send({ title: 'Hijack', content: 'nope' })
      .expect(403);

    const updated = await request(server)
      .put(`/api/posts/${post.id}`)
      .set('Authorization', `Bearer ${alice.token}`)
      .send({ title: 'Hello again', content: 'Edited' })
      .expect(200);
    expect(updated.body.data).toMatchObject({ id: post.id, title: 'Hello again', content: 'Edited' });
    expect(Date.parse(updated.body.data.updated_at)).toBeGreaterThan(Date.parse(post.updated_at));

    const fetched = await request(server).get(`/api/posts/${post.id}`).expect(200);
    expect(fetched.body.data.title).toBe('Hello again');

    await request(server).delete(`/api/posts/${post.id}`).set('Authorization', `Bearer ${bob.token}`).expect(403);
    const deleted = await request(server)
      .delete(`/api/posts/${post.id}`)
      .set('Authorization', `Bearer ${alice.token}`)
      .expect(204);
    expect(deleted.text).toBe('');

    await request(server).get(`/api/posts/${post.id}`).expect(404);
    await request(server).delete(`/api/posts/${post.id}`).set('Authorization', `Bearer ${alice.token}`).expect(404);
  });

  describe('auth', () => {
    it('rejects a duplicate username with 409', async () => {
      await register('alice');
      const res = await request(server)
        .post('/api/auth/register')
        .send({ username: 'alice', email: 'other@example.com', password: 'password123' })
        .expect(409);
      expect(res.body.meta).toMatchObject({ status: 409, errors: [{ code: 409, reason: 'username' }] });
    });

    it('rejects invalid registration input with 400 naming the field', async () => {
      const res = await request(server)
        .post('/api/auth/register')
        .send({ username: 'al', email: 'al@example.com', password: 'password123' })
        .expect(400);
      expect(res.body.meta.errors[0]).toEqual({
        code: 400,
        message: "validation failed for 'username': must be 3..64 chars",
        reason: 'username',
      });
    });

    it('answers unknown user and wrong password identically', async () => {
      await register('alice');
      const unknown = await request(server)
        .post('/api/auth/login')
        .send({ username: 'ghost', password: 'password123' })
        .expect(401);
      const wrong = await request(server)
        .post('/api/auth/login')
        .send({ username: 'alice', password: 'wrong-password' })
        .expect(401);
      expect(unknown.body.meta.errors).toEqual([{ code: 401, message: 'invalid credentials', reason: 'invalid_credentials' }]);
      expect(wrong.body.meta.errors).toEqual(unknown.body.meta.errors);
    });

    it('requires a bearer token for protected routes', async () => {
      const missing = await request(server).post('/api/posts').send({ title: 't', content: 'c' }).expect(401);
      expect(missing.body.meta.errors[0].reason).toBe('unauthorized');

      await request(server)
        .post('/api/posts')
        .set('Authorization', 'Basic abc')
        .send({ title: 't', content: 'c' })
        .expect(401);
      await request(server)
        .post('/api/posts')
        .set('Authorization', 'Bearer not-a-jwt')
        .send({ title: 't', content: 'c' })
        .expect(401);
    });

    it('accepts a lower-case scheme', async () => {
      const alice = await register('alice');
      await request(server)
        .post('/api/posts')
        .set('Authorization', `bearer ${alice.token}`)
        .send({ title: 't', content: 'c' })
        .expect(201);
    });
  });

  describe('list', () => {
    async function seed(count: number) {
      const alice = await register('alice');
      for (let i = 1; i <= count; i++) {
        await request(server)
          .post('/api/posts')
          .set('Authorization', `Bearer ${alice.token}`)
          .send({ title: `post ${i}`, content: 'body' })
          .expect(201);
      }
    }

    it('lists newest first with defaults', async () => {
      await seed(3);
      const res = await request(server).get('/api/posts').expect(200);
      expect(res.body.data).toMatchObject({ limit: 20, offset: 0, total: 3 });
      expect(res.body.data.posts.map((p: { title: string }) => p.title)).toEqual(['post 3', 'post 2', 'post 1']);
    });

    it('rounds the offset down to the containing page', async () => {
      await seed(5);
      const res = await request(server).get('/api/posts?limit=2&offset=3').expect(200);
      expect(res.body.data).toMatchObject({ limit: 2, offset: 2, total: 5 });
      expect(res.body.data.posts.map((p: { title: string }) => p.title)).toEqual(['post 3', 'post 2']);
    });

    it('rejects a limit above 100', async () => {
      const res = await request(server).get('/api/posts?limit=101').expect(400);
      expect(res.body.meta.errors[0].reason).toBe('limit');
    });

    it('rejects a negative offset and a non-numeric limit', async () => {
      await request(server).get('/api/posts?offset=-1').expect(400);
      await request(server).get('/api/posts?limit=abc').expect(400);
    });

    it('rejects an offset beyond the supported range with 400', async () => {
      const res = await request(server).get('/api/posts?offset=100000000000000000000').expect(400);
      expect(res.body.meta.errors[0]).toMatchObject({
        message: "validation failed for 'offset': must be 0..4294967295",
        reason: 'offset',
      });
    });
  });

  it('returns 404 for a missing post and 400 for a bad id', async () => {
    const missing = await request(server).get('/api/posts/999').expect(404);
    expect(missing.body.meta.errors[0]).toMatchObject({ code: 404, reason: 'not_found' });
    const bad = await request(server).get('/api/posts/abc').expect(400);
    expect(bad.body.meta.errors[0].reason).toBe('id');
  });

  it('answers malformed JSON with the error envelope', async () => {
    const res = await request(server)
      .post('/api/auth/login')
      .set('Content-Type', 'application/json')
      .send('{"username":')
      .expect(400);
    expect(res.body.meta.errors[0].reason).toBe('body');
  });

  it('echoes the request id', async () => {
    const res = await request(server).get('/api/posts/999').set('x-request-id', 'req-123').expect(404);
    expect(res.headers['x-request-id']).toBe('req-123');
    expect(res.body.meta.requestId).toBe('req-123');
  });

  describe('healthz', () => {
    it('reports ok outside the api prefix', async () => {
      const res = await request(server).get('/healthz').expect(200);
      expect(res.body.data).toMatchObject({ status: 'ok', service: 'quill-api', db: { status: 'ok', latencyMs: 2 } });
    });

    it('reports degraded when the database is down', async () => {
      ctx.db.ping.mockRejectedValueOnce(new Error('connection refused'));
      const res = await request(server).get('/healthz').expect(200);
      expect(res.body.data).toMatchObject({ status: 'degraded', db: { status: 'down', error: 'connection refused' } });
    });
  });
});
