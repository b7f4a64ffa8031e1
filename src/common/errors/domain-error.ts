export type DomainErrorKind =
  | 'validation'
  | 'not_found'
  | 'already_exists'
  | 'forbidden'
  | 'invalid_credentials'
  | 'unexpected';

/**
 * Base for every failure the services report. Transports map `kind` to their own
 * status codes (see error-status.ts); `message` is safe to show to clients except
 * for `unexpected`, whose detail stays server-side.
 */
export abstract class DomainError extends Error {
  abstract readonly kind: DomainErrorKind;
}

export class ValidationError extends DomainError {
  readonly kind = 'validation' as const;

  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super(`validation failed for '${field}': ${reason}`);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends DomainError {
  readonly kind = 'not_found' as const;

  constructor(readonly resource: string) {
    super(`resource not found: ${resource}`);
    this.name = 'NotFoundError';
  }
}

export class AlreadyExistsError extends DomainError {
  readonly kind = 'already_exists' as const;

  constructor(readonly field: string) {
    super(`resource already exists: ${field}`);
    this.name = 'AlreadyExistsError';
  }
}

export class ForbiddenError extends DomainError {
  readonly kind = 'forbidden' as const;

  constructor() {
    super('forbidden');
    this.name = 'ForbiddenError';
  }
}

export class InvalidCredentialsError extends DomainError {
  readonly kind = 'invalid_credentials' as const;

  constructor() {
    super('invalid credentials');
    this.name = 'InvalidCredentialsError';
  }
}

export class UnexpectedError extends DomainError {
  readonly kind = 'unexpected' as const;

  constructor(
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`unexpected error: ${detail}`, options);
    this.name = 'UnexpectedError';
  }
}

export type AnyDomainError =
  | ValidationError
  | NotFoundError
  | AlreadyExistsError
  | ForbiddenError
  | InvalidCredentialsError
  | UnexpectedError;

export function isDomainError(value: unknown): value is AnyDomainError {
  return (
    value instanceof ValidationError ||
    value instanceof NotFoundError ||
    value instanceof AlreadyExistsError ||
    value instanceof ForbiddenError ||
    value instanceof InvalidCredentialsError ||
    value instanceof UnexpectedError
  );
}

/** Wraps anything that is not already a domain error as Unexpected. */
export function toDomainError(err: unknown): AnyDomainError {
  if (isDomainError(err)) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new UnexpectedError(detail, { cause: err });
}
