// Message shapes as @grpc/proto-loader presents them (camelCase, int64 as number).

export type UserMessage = {
  id: number;
  username: string;
  email: string;
  createdAt: string;
};

export type PostMessage = {
  id: number;
  title: string;
  content: string;
  authorId: number;
  createdAt: string;
  updatedAt: string;
};

export type AuthResponseMessage = {
  accessToken: string;
  user: UserMessage;
};

export type ListPostsResponseMessage = {
  posts: PostMessage[];
  page: number;
  pageSize: number;
  total: number;
};

export type EmptyMessage = Record<string, never>;
