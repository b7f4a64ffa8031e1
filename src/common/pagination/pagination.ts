import { ValidationError } from '../errors/domain-error';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
/** Largest accepted REST offset (u32). */
export const MAX_OFFSET = 2 ** 32 - 1;

export type PageRequest = {
  /** 1-based. */
  page: number;
  pageSize: number;
};

export type LimitOffset = {
  limit: number;
  offset: number;
};

/**
 * limit/offset -> page/page_size. An offset that is not a multiple of the limit
 * rounds down to the page containing it.
 */
export function toPage(limit: number, offset: number): PageRequest {
  const pageSize = Math.max(Math.floor(limit), 1);
  const page = Math.floor(Math.max(offset, 0) / pageSize) + 1;
  return { page, pageSize };
}

/** page/page_size -> limit/offset (offset of the first row on the page). */
export function toLimitOffset(page: number, pageSize: number): LimitOffset {
  const limit = Math.max(Math.floor(pageSize), 1);
  const offset = (Math.max(Math.floor(page), 1) - 1) * limit;
  return { limit, offset };
}

/**
 * Applies the default to a missing/zero limit and enforces the shared cap.
 * Both transports call this so the bound is identical.
 */
export function resolveLimit(raw: number | null | undefined, field = 'limit'): number {
  if (raw == null || raw === 0) return DEFAULT_PAGE_SIZE;
  if (!Number.isInteger(raw) || raw < 1 || raw > MAX_PAGE_SIZE) {
    throw new ValidationError(field, `must be 1..${MAX_PAGE_SIZE}`);
  }
  return raw;
}

export function resolveOffset(raw: number | null | undefined, field = 'offset'): number {
  if (raw == null) return 0;
  if (!Number.isSafeInteger(raw) || raw < 0 || raw > MAX_OFFSET) {
    throw new ValidationError(field, `must be 0..${MAX_OFFSET}`);
  }
  return raw;
}
