import { Injectable, Logger } from '@nestjs/common';
import * as argon2 from 'argon2';

export type PasswordVerification = 'match' | 'mismatch' | 'malformed';

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  /** `malformed` means the stored hash could not be parsed; that is a server fault, not a wrong password. */
  verify(plain: string, hash: string): Promise<PasswordVerification>;
}

export const PASSWORD_HASHER = Symbol('PASSWORD_HASHER');

// argon2id, 19 MiB, 2 passes, 1 lane.
export const ARGON2_MEMORY_COST_KIB = 19 * 1024;
export const ARGON2_TIME_COST = 2;
export const ARGON2_PARALLELISM = 1;

/**
 * Valid argon2id hash with the production cost parameters. Verified against on the
 * unknown-username login path so both failure paths cost one full verification.
 */
export const DUMMY_PASSWORD_HASH =
  '$argon2id$v=19$m=19456,t=2,p=1$cXVpbGwtZHVtbXktc2FsdA$HGitVpaVig6P7WPdADUBi5hNqyb95Vn3OCvrevhKO9M';

@Injectable()
export class Argon2PasswordHasher implements PasswordHasher {
  private readonly logger = new Logger(Argon2PasswordHasher.name);

  async hash(plain: string): Promise<string> {
    // Salt is generated per call by the library.
    return argon2.hash(plain, {
      type: argon2.argon2id,
      memoryCost: ARGON2_MEMORY_COST_KIB,
      timeCost: ARGON2_TIME_COST,
      parallelism: ARGON2_PARALLELISM,
    });
  }

  async verify(plain: string, hash: string): Promise<PasswordVerification> {
    if (!hash.startsWith('$argon2')) return 'malformed';
    try {
      return (await argon2.verify(hash, plain)) ? 'match' : 'mismatch';
    } catch (err) {
      this.logger.warn(`could not parse stored password hash: ${err instanceof Error ? err.message : String(err)}`);
      return 'malformed';
    }
  }
}
