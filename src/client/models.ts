import { z } from 'zod';

export type User = {
  id: number;
  username: string;
  email: string;
  createdAt: Date;
};

export type Post = {
  id: number;
  title: string;
  content: string;
  authorId: number;
  createdAt: Date;
  updatedAt: Date;
};

export type AuthResponse = {
  accessToken: string;
  user: User;
};

export type ListPostsResponse = {
  posts: Post[];
  limit: number;
  offset: number;
  total: number;
};

export type PostFields = {
  title: string;
  content: string;
};

const isoDate = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), 'must be an ISO-8601 timestamp')
  .transform((v) => new Date(v));

// REST bodies (snake_case).

export const userJsonSchema = z
  .object({ id: z.number().int(), username: z.string(), email: z.string(), created_at: isoDate })
  .transform((u): User => ({ id: u.id, username: u.username, email: u.email, createdAt: u.created_at }));

export const postJsonSchema = z
  .object({
    id: z.number().int(),
    title: z.string(),
    content: z.string(),
    author_id: z.number().int(),
    created_at: isoDate,
    updated_at: isoDate,
  })
  .transform(
    (p): Post => ({
      id: p.id,
      title: p.title,
      content: p.content,
      authorId: p.author_id,
      createdAt: p.created_at,
      updatedAt: p.updated_at,
    }),
  );

export const authJsonSchema = z
  .object({ access_token: z.string().min(1), user: userJsonSchema })
  .transform((a): AuthResponse => ({ accessToken: a.access_token, user: a.user }));

export const listPostsJsonSchema = z.object({
  posts: z.array(postJsonSchema),
  limit: z.number().int(),
  offset: z.number().int(),
  total: z.number().int(),
});

// gRPC messages (camelCase, as decoded by proto-loader).

export const userMessageSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  email: z.string(),
  createdAt: isoDate,
});

export const postMessageSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  content: z.string(),
  authorId: z.number().int(),
  createdAt: isoDate,
  updatedAt: isoDate,
});

export const authMessageSchema = z.object({ accessToken: z.string().min(1), user: userMessageSchema });

export const listPostsMessageSchema = z.object({
  posts: z.array(postMessageSchema),
  page: z.number().int(),
  pageSize: z.number().int(),
  total: z.number().int(),
});
