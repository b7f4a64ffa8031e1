/**
 * Extracts the token from an `Authorization: Bearer <token>` value.
 * Returns null for anything else (missing header, other scheme, extra parts, blank token).
 */
export function parseBearerToken(header: string | null | undefined): string | null {
  if (typeof header !== 'string') return null;
  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2) return null;
  const [scheme, token] = parts;
  if (scheme.toLowerCase() !== 'bearer') return null;
  return token ? token : null;
}
