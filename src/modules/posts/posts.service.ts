import { Inject, Injectable, Logger } from '@nestjs/common';
import { ForbiddenError, NotFoundError } from '../../common/errors/domain-error';
import { toLimitOffset, toPage, type LimitOffset } from '../../common/pagination/pagination';
import { validatePositiveId } from '../users/user.model';
import { normalizePostInput, type Post, type PostInput } from './post.model';
import { POSTS_REPOSITORY, type PostsRepository } from './posts.repository';

export type PostPage = {
  posts: Post[];
  /** 1-based page the limit/offset resolved to. */
  page: number;
  pageSize: number;
  limit: number;
  /** Offset of the first row of `page`. */
  offset: number;
  total: number;
};

@Injectable()
export class PostsService {
  private readonly logger = new Logger(PostsService.name);

  constructor(@Inject(POSTS_REPOSITORY) private readonly posts: PostsRepository) {}

  async create(authorId: number, input: PostInput): Promise<Post> {
    validatePositiveId('author_id', authorId);
    const fields = normalizePostInput(input);
    const post = await this.posts.create({ ...fields, authorId });
    this.logger.debug(`Created post id=${post.id} author=${authorId}`);
    return post;
  }

  async get(id: number): Promise<Post> {
    validatePositiveId('id', id);
    const post = await this.posts.findById(id);
    if (!post) throw new NotFoundError('post');
    return post;
  }

  /**
   * Ownership is enforced by the write itself. A miss is disambiguated afterwards
   * so callers can tell a missing post from someone else's.
   */
  async update(actorId: number, postId: number, input: PostInput): Promise<Post> {
    validatePositiveId('id', postId);
    const fields = normalizePostInput(input);
    const updated = await this.posts.updateOwned(postId, actorId, fields);
    if (updated) return updated;

    const existing = await this.posts.findById(postId);
    if (existing && existing.authorId !== actorId) {
      this.logger.warn(`User id=${actorId} attempted to update post id=${postId} owned by id=${existing.authorId}`);
      throw new ForbiddenError();
    }
    // Absent, or deleted between the write and the lookup.
    throw new NotFoundError('post');
  }

  async delete(actorId: number, postId: number): Promise<void> {
    validatePositiveId('id', postId);
    const existing = await this.posts.findById(postId);
    if (!existing) throw new NotFoundError('post');
    if (existing.authorId !== actorId) {
      this.logger.warn(`User id=${actorId} attempted to delete post id=${postId} owned by id=${existing.authorId}`);
      throw new ForbiddenError();
    }
    const deleted = await this.posts.deleteOwned(postId, actorId);
    if (!deleted) throw new NotFoundError('post');
  }

  /** Callers pass an already-resolved limit (see resolveLimit). */
  async list({ limit, offset }: LimitOffset): Promise<PostPage> {
    const { page, pageSize } = toPage(limit, offset);
    const [posts, total] = await Promise.all([this.posts.list({ page, pageSize }), this.posts.count()]);
    const start = toLimitOffset(page, pageSize);
    return { posts, page, pageSize, limit: start.limit, offset: start.offset, total };
  }
}
