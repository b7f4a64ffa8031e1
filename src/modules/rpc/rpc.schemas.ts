import { z } from 'zod';

// Only what the proto types do not already guarantee; field bounds live in the shared auth/post schemas.

export const postIdRequestSchema = z.object({
  id: z.number().int(),
});

export const listPostsRequestSchema = z.object({
  page: z.number().int().nonnegative(),
  pageSize: z.number().int().nonnegative(),
});
