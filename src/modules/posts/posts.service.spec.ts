import { ForbiddenError, NotFoundError, ValidationError } from '../../common/errors/domain-error';
import { InMemoryPostsRepository } from '../../../test/support/in-memory-posts.repository';
import { tickingClock } from '../../../test/support/ticking-clock';
import { PostsService } from './posts.service';

const ALICE = 1;
const BOB = 2;

function setup() {
  const repo = new InMemoryPostsRepository(tickingClock(), (id) => id === ALICE || id === BOB);
  return { repo, posts: new PostsService(repo) };
}

describe('PostsService', () => {
  it('creates a post with trimmed fields and equal timestamps', async () => {
    const { posts } = setup();
    const post = await posts.create(ALICE, { title: '  Hello ', content: ' World ' });
    expect(post).toMatchObject({ title: 'Hello', content: 'World', authorId: ALICE });
    expect(post.updatedAt).toEqual(post.createdAt);
  });

  it('rejects blank fields', async () => {
    const { posts } = setup();
    await expect(posts.create(ALICE, { title: '   ', content: 'x' })).rejects.toMatchObject({ field: 'title' });
    await expect(posts.create(ALICE, { title: 'x', content: '  ' })).rejects.toMatchObject({ field: 'content' });
    await expect(posts.create(ALICE, { title: 't'.repeat(256), content: 'x' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('reports a missing author as not found', async () => {
    const { posts } = setup();
    await expect(posts.create(99, { title: 't', content: 'c' })).rejects.toMatchObject({ resource: 'author' });
  });

  it('gets a post or reports not found', async () => {
    const { posts } = setup();
    const created = await posts.create(ALICE, { title: 't', content: 'c' });
    await expect(posts.get(created.id)).resolves.toEqual(created);
    await expect(posts.get(999)).rejects.toBeInstanceOf(NotFoundError);
    await expect(posts.get(0)).rejects.toBeInstanceOf(ValidationError);
  });

  describe('update', () => {
    it('lets the author update and advances updated_at', async () => {
      const { posts } = setup();
      const created = await posts.create(ALICE, { title: 't', content: 'c' });
      const updated = await posts.update(ALICE, created.id, { title: 'new', content: 'body' });
      expect(updated).toMatchObject({ id: created.id, title: 'new', content: 'body', createdAt: created.createdAt });
      expect(updated.updatedAt.getTime()).toBeGreaterThan(created.updatedAt.getTime());
    });

    it('forbids a non-owner and leaves the post unchanged', async () => {
      const { posts } = setup();
      const created = await posts.create(ALICE, { title: 't', content: 'c' });
      await expect(posts.update(BOB, created.id, { title: 'x', content: 'y' })).rejects.toBeInstanceOf(ForbiddenError);
      await expect(posts.get(created.id)).resolves.toEqual(created);
    });

    it('reports a missing post as not found', async () => {
      const { posts } = setup();
      await expect(posts.update(ALICE, 42, { title: 'x', content: 'y' })).rejects.toBeInstanceOf(NotFoundError);
    });

    it('validates before writing', async () => {
      const { repo, posts } = setup();
      const created = await posts.create(ALICE, { title: 't', content: 'c' });
      const spy = jest.spyOn(repo, 'updateOwned');
      await expect(posts.update(ALICE, created.id, { title: '', content: 'y' })).rejects.toBeInstanceOf(ValidationError);
      expect(spy).not.toHaveBeenCalled();
    });

    it('reports not found when the owner loses a race with a delete', async () => {
      const { repo, posts } = setup();
      const created = await posts.create(ALICE, { title: 't', content: 'c' });
      jest.spyOn(repo, 'updateOwned').mockResolvedValue(null);
      await expect(posts.update(ALICE, created.id, { title: 'x', content: 'y' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('delete', () => {
    it('lets the author delete', async () => {
      const { posts } = setup();
      const created = await posts.create(ALICE, { title: 't', content: 'c' });
      await posts.delete(ALICE, created.id);
      await expect(posts.get(created.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('forbids a non-owner and keeps the post', async () => {
      const { posts } = setup();
      const created = await posts.create(ALICE, { title: 't', content: 'c' });
      await expect(posts.delete(BOB, created.id)).rejects.toBeInstanceOf(ForbiddenError);
      await expect(posts.get(created.id)).resolves.toEqual(created);
    });

    it('reports a missing post as not found', async () => {
      const { posts } = setup();
      await expect(posts.delete(ALICE, 42)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('deletes at most once', async () => {
      const { posts } = setup();
      const created = await posts.create(ALICE, { title: 't', content: 'c' });
      await posts.delete(ALICE, created.id);
      await expect(posts.delete(ALICE, created.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('reports not found when the guarded delete matches nothing', async () => {
      const { repo, posts } = setup();
      const created = await posts.create(ALICE, { title: 't', content: 'c' });
      jest.spyOn(repo, 'deleteOwned').mockResolvedValue(false);
      await expect(posts.delete(ALICE, created.id)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('list', () => {
    it('translates limit/offset to the containing page', async () => {
      const { repo, posts } = setup();
      const spy = jest.spyOn(repo, 'list');

      await posts.list({ limit: 20, offset: 40 });
      await posts.list({ limit: 20, offset: 0 });
      await posts.list({ limit: 10, offset: 15 });

      expect(spy.mock.calls.map(([p]) => p)).toEqual([
        { page: 3, pageSize: 20 },
        { page: 1, pageSize: 20 },
        { page: 2, pageSize: 10 },
      ]);
    });

    it('returns newest first with the total and the page start', async () => {
      const { posts } = setup();
      for (let i = 1; i <= 5; i++) await posts.create(ALICE, { title: `p${i}`, content: 'c' });

      const page = await posts.list({ limit: 2, offset: 3 });
      expect(page.posts.map((p) => p.title)).toEqual(['p3', 'p2']);
      expect(page).toMatchObject({ page: 2, pageSize: 2, limit: 2, offset: 2, total: 5 });
    });

    it('breaks created_at ties by id descending', async () => {
      const same = new Date('2024-01-01T00:00:00.000Z');
      const repo = new InMemoryPostsRepository(() => same);
      const posts = new PostsService(repo);
      await posts.create(ALICE, { title: 'a', content: 'c' });
      await posts.create(ALICE, { title: 'b', content: 'c' });
      const page = await posts.list({ limit: 10, offset: 0 });
      expect(page.posts.map((p) => p.title)).toEqual(['b', 'a']);
    });
  });
});
