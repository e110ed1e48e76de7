import type { PostResult } from './types';

export type FailureKind =
  | 'connection'
  | 'authorization'
  | 'bad_request'
  | 'unexpected_status'
  | 'invalid_response';

/**
 * Base class for every failure a request can end in.
 */
export abstract class ArchivesSpaceError extends Error {
  abstract readonly kind: FailureKind;

  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The host could not be reached. */
export class ConnectionFailure extends ArchivesSpaceError {
  readonly kind = 'connection';

  constructor(url: string, cause: unknown) {
    super(`Unable to connect to ${url}`, undefined, undefined, { cause });
  }
}

/** HTTP 403. */
export class AuthorizationFailure extends ArchivesSpaceError {
  readonly kind = 'authorization';

  constructor(body: string) {
    super('Forbidden -- check your credentials', 403, body);
  }
}

/** HTTP 400. */
export class BadRequestFailure extends ArchivesSpaceError {
  readonly kind = 'bad_request';

  constructor(body: string) {
    super('Bad Request', 400, body);
  }
}

export class UnexpectedStatusFailure extends ArchivesSpaceError {
  readonly kind = 'unexpected_status';

  constructor(status: number, body: string) {
    super(`Unexpected status ${status}`, status, body);
  }
}

/**
 * A response whose body could not be used: unreadable, not JSON, or a login
 * response without a session token.
 */
export class InvalidResponseFailure extends ArchivesSpaceError {
  readonly kind = 'invalid_response';

  constructor(reason: string, body: string, status = 200) {
    super(reason, status, body);
  }
}

export function unwrap<T>(result: PostResult<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
