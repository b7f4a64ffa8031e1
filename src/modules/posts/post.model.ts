import { ValidationError } from '../../common/errors/domain-error';
import { charLength, validatePositiveId } from '../users/user.model';

export type Post = {
  id: number;
  title: string;
  content: string;
  authorId: number;
  createdAt: Date;
  updatedAt: Date;
};

export type PostInput = {
  title: string;
  content: string;
};

export const TITLE_MAX_LENGTH = 255;

export function normalizeTitle(raw: string): string {
  const title = raw.trim();
  const len = charLength(title);
  if (len < 1 || len > TITLE_MAX_LENGTH) {
    throw new ValidationError('title', `must be 1..${TITLE_MAX_LENGTH} chars`);
  }
  return title;
}

export function normalizeContent(raw: string): string {
  const content = raw.trim();
  if (!content) throw new ValidationError('content', 'must not be empty');
  return content;
}

export function normalizePostInput(input: PostInput): PostInput {
  return {
    title: normalizeTitle(input.title),
    content: normalizeContent(input.content),
  };
}

export function createPost(input: Post): Post {
  const post: Post = {
    id: validatePositiveId('id', input.id),
    authorId: validatePositiveId('author_id', input.authorId),
    ...normalizePostInput(input),
    createdAt: input.createdAt,
    updatedAt: input.updatedAt,
  };
  if (post.updatedAt.getTime() < post.createdAt.getTime()) {
    throw new ValidationError('updated_at', 'must be >= created_at');
  }
  return post;
}
