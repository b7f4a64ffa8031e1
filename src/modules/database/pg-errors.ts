import {
  AlreadyExistsError,
  NotFoundError,
  UnexpectedError,
  ValidationError,
  isDomainError,
  type AnyDomainError,
} from '../../common/errors/domain-error';
import { USERS_EMAIL_KEY, USERS_USERNAME_KEY } from './schema';

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';

export type PgErrorInfo = {
  code: string;
  constraint: string | null;
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Reads the SQLSTATE and constraint name off a pg error, or one wrapped in `cause`. */
export function pgErrorInfo(err: unknown): PgErrorInfo | null {
  let current: unknown = err;
  for (let depth = 0; depth < 3 && isObject(current); depth++) {
    const code = current.code;
    if (typeof code === 'string' && /^[0-9A-Z]{5}$/.test(code)) {
      const constraint = current.constraint;
      return { code, constraint: typeof constraint === 'string' ? constraint : null };
    }
    current = current.cause;
  }
  return null;
}

function unexpected(err: unknown): UnexpectedError {
  const detail = err instanceof Error ? err.message : String(err);
  return new UnexpectedError(detail, { cause: err });
}

export function mapUserDbError(err: unknown): AnyDomainError {
  if (isDomainError(err)) return err;
  const info = pgErrorInfo(err);
  if (info?.code === PG_UNIQUE_VIOLATION) {
    if (info.constraint === USERS_USERNAME_KEY) return new AlreadyExistsError('username');
    if (info.constraint === USERS_EMAIL_KEY) return new AlreadyExistsError('email');
    return new AlreadyExistsError('user');
  }
  return unexpected(err);
}

export function mapPostDbError(err: unknown): AnyDomainError {
  if (isDomainError(err)) return err;
  const info = pgErrorInfo(err);
  if (info?.code === PG_FOREIGN_KEY_VIOLATION) return new NotFoundError('author');
  return unexpected(err);
}

export async function runQuery<T>(query: () => Promise<T>, mapError: (err: unknown) => AnyDomainError): Promise<T> {
  try {
    return await query();
  } catch (err) {
    throw mapError(err);
  }
}

/** Rows that fail model validation indicate corrupt data, not bad client input. */
export function fromRow<T>(build: () => T): T {
  try {
    return build();
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new UnexpectedError(`stored row failed validation: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
