import jwt from 'jsonwebtoken';
import { z } from 'zod';

export type TokenClaims = {
  userId: number;
  username: string;
  expiresAt: Date;
};

/** Used when the configured lifetime is not positive. */
export const DEFAULT_TOKEN_TTL_SECONDS = 24 * 60 * 60;
/** Clock-skew tolerance applied to `exp` on verification. */
export const TOKEN_LEEWAY_SECONDS = 10;

const claimsSchema = z.object({
  user_id: z.number().int().positive(),
  username: z.string().min(1),
  exp: z.number().int(),
});

/**
 * Stateless HS256 identity tokens. There is no revocation: a token is valid from
 * issue until `exp` (plus leeway).
 */
export class TokenService {
  readonly ttlSeconds: number;

  constructor(
    private readonly secret: string,
    ttlSeconds: number,
  ) {
    this.ttlSeconds = Number.isFinite(ttlSeconds) && ttlSeconds > 0 ? Math.floor(ttlSeconds) : DEFAULT_TOKEN_TTL_SECONDS;
  }

  issue(userId: number, username: string): string {
    return jwt.sign({ user_id: userId, username }, this.secret, {
      algorithm: 'HS256',
      expiresIn: this.ttlSeconds,
    });
  }

  /** Any signature, format, expiry or claim-shape failure yields null. */
  verify(token: string): TokenClaims | null {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: ['HS256'],
        clockTolerance: TOKEN_LEEWAY_SECONDS,
      });
    } catch {
      return null;
    }
    const parsed = claimsSchema.safeParse(decoded);
    if (!parsed.success) return null;
    return {
      userId: parsed.data.user_id,
      username: parsed.data.username,
      expiresAt: new Date(parsed.data.exp * 1000),
    };
  }
}
