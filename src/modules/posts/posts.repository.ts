import type { PageRequest } from '../../common/pagination/pagination';
import type { Post, PostInput } from './post.model';

export type NewPost = PostInput & {
  authorId: number;
};

export interface PostsRepository {
  create(input: NewPost): Promise<Post>;
  findById(id: number): Promise<Post | null>;
  /**
   * Single conditional write: `WHERE id = postId AND author_id = ownerId`, bumping updated_at.
   * Resolves null when no row matched (missing post or another owner).
   */
  updateOwned(postId: number, ownerId: number, patch: PostInput): Promise<Post | null>;
  /** Same guard as updateOwned; resolves false when nothing was deleted. */
  deleteOwned(postId: number, ownerId: number): Promise<boolean>;
  /** Newest first: created_at DESC, id DESC. */
  list(page: PageRequest): Promise<Post[]>;
  count(): Promise<number>;
}

export const POSTS_REPOSITORY = Symbol('POSTS_REPOSITORY');
