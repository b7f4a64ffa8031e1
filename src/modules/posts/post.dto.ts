import type { Post } from './post.model';
import type { PostPage } from './posts.service';

export type PostDto = {
  id: number;
  title: string;
  content: string;
  author_id: number;
  created_at: string;
  updated_at: string;
};

export type ListPostsDto = {
  posts: PostDto[];
  limit: number;
  offset: number;
  total: number;
};

export function toPostDto(post: Post): PostDto {
  return {
    id: post.id,
    title: post.title,
    content: post.content,
    author_id: post.authorId,
    created_at: post.createdAt.toISOString(),
    updated_at: post.updatedAt.toISOString(),
  };
}

export function toListPostsDto(page: PostPage): ListPostsDto {
  return {
    posts: page.posts.map(toPostDto),
    limit: page.limit,
    offset: page.offset,
    total: page.total,
  };
}
