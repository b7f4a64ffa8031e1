import type { AuthResult } from '../auth/auth.service';
import type { Post } from '../posts/post.model';
import type { PostPage } from '../posts/posts.service';
import type { User } from '../users/user.model';
import type { AuthResponseMessage, ListPostsResponseMessage, PostMessage, UserMessage } from './rpc.types';

export function toUserMessage(user: User): UserMessage {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    createdAt: user.createdAt.toISOString(),
  };
}

export function toPostMessage(post: Post): PostMessage {
  return {
    id: post.id,
    title: post.title,
    content: post.content,
    authorId: post.authorId,
    createdAt: post.createdAt.toISOString(),
    updatedAt: post.updatedAt.toISOString(),
  };
}

export function toAuthResponseMessage(result: AuthResult): AuthResponseMessage {
  return { accessToken: result.accessToken, user: toUserMessage(result.user) };
}

export function toListPostsResponseMessage(page: PostPage): ListPostsResponseMessage {
  return {
    posts: page.posts.map(toPostMessage),
    page: page.page,
    pageSize: page.pageSize,
    total: page.total,
  };
}
