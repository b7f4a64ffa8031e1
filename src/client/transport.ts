import type { AuthResponse, ListPostsResponse, Post, PostFields } from './models';

/** One implementation per wire protocol; BlogClient owns the token. */
export interface BlogTransport {
  register(username: string, email: string, password: string): Promise<AuthResponse>;
  login(username: string, password: string): Promise<AuthResponse>;
  createPost(token: string, fields: PostFields): Promise<Post>;
  getPost(id: number): Promise<Post>;
  updatePost(token: string, id: number, fields: PostFields): Promise<Post>;
  deletePost(token: string, id: number): Promise<void>;
  listPosts(limit: number, offset: number): Promise<ListPostsResponse>;
  close?(): void;
}
