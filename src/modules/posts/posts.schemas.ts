import { z } from 'zod';
import { charLength } from '../users/user.model';
import { TITLE_MAX_LENGTH } from './post.model';

export const postInputSchema = z.object({
  title: z.string().refine((v) => {
    const len = charLength(v.trim());
    return len >= 1 && len <= TITLE_MAX_LENGTH;
  }, `must be 1..${TITLE_MAX_LENGTH} chars`),
  content: z.string().refine((v) => v.trim().length > 0, 'must not be empty'),
});

const optionalIntParam = (field: string) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v == null || v.trim() === '') return undefined;
      const n = Number(v);
      if (!Number.isInteger(n)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} must be an integer` });
        return z.NEVER;
      }
      return n;
    });

export const listPostsQuerySchema = z.object({
  limit: optionalIntParam('limit'),
  offset: optionalIntParam('offset'),
});

export const postIdParamSchema = z.coerce.number().int().positive('must be > 0');
