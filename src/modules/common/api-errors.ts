import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Stable, machine-readable error kinds. Every failure leaves the service as
 * `{ kind, message, status, details? }`.
 */
export type ErrorKind =
  | 'upstream_unavailable'
  | 'missing_credential'
  | 'profile_fetch_failed'
  | 'missing_external_id'
  | 'provisioning_error'
  | 'unauthorized'
  | 'forbidden'
  | 'validation_error'
  | 'not_found'
  | 'internal_error';

export interface ErrorBody {
  kind: ErrorKind;
  message: string;
  status: number;
  details?: Record<string, unknown>;
}

export abstract class ApiError extends HttpException {
  abstract readonly kind: ErrorKind;

  protected constructor(
    message: string,
    status: number,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, status, options);
  }

  toBody(): ErrorBody {
    const body: ErrorBody = { kind: this.kind, message: this.message, status: this.getStatus() };
    if (this.details && Object.keys(this.details).length > 0) {
      body.details = this.details;
    }
    return body;
  }
}

/** USOS request-token or access-token endpoint unreachable, timed out or non-2xx. */
export class UpstreamUnavailableError extends ApiError {
  readonly kind = 'upstream_unavailable';

  constructor(message: string, details?: { upstreamStatus?: number; upstreamBody?: string }, cause?: unknown) {
    super(message, HttpStatus.BAD_GATEWAY, details, { cause });
  }
}

/** Request token, its secret, or the verifier is absent at callback time. */
export class MissingCredentialError extends ApiError {
  readonly kind = 'missing_credential';

  constructor(missing: string[]) {
    super(
      'Missing token or verifier in session or callback parameters.',
      HttpStatus.BAD_REQUEST,
      { missing },
    );
  }
}

export class ProfileFetchFailedError extends ApiError {
  readonly kind = 'profile_fetch_failed';

  constructor(
    message: string,
    details: { upstreamStatus?: number; upstreamBody?: string },
    cause?: unknown,
  ) {
    super(message, HttpStatus.BAD_GATEWAY, details, { cause });
  }
}

export class MissingExternalIdError extends ApiError {
  readonly kind = 'missing_external_id';

  constructor() {
    super('USOS user id not found in profile response.', HttpStatus.BAD_GATEWAY);
  }
}

export class ProvisioningError extends ApiError {
  readonly kind = 'provisioning_error';

  constructor(username: string, cause: unknown) {
    super(
      `Database error during user provisioning for ${username}.`,
      HttpStatus.INTERNAL_SERVER_ERROR,
      { username, reason: cause instanceof Error ? cause.message : String(cause) },
      { cause },
    );
  }
}

export class UnauthorizedError extends ApiError {
  readonly kind = 'unauthorized';

  constructor(message = 'Authentication credentials were not provided.') {
    super(message, HttpStatus.UNAUTHORIZED);
  }
}

export class ForbiddenError extends ApiError {
  readonly kind = 'forbidden';

  constructor(message = 'You do not have permission to perform this action.', details?: Record<string, unknown>) {
    super(message, HttpStatus.FORBIDDEN, details);
  }
}

export interface FieldError {
  /** Index within a batch; absent for single payloads. */
  index?: number;
  field?: string;
  messages: string[];
}

export class ValidationError extends ApiError {
  readonly kind = 'validation_error';

  constructor(readonly errors: FieldError[], message = 'Invalid payload.') {
    super(message, HttpStatus.BAD_REQUEST, { errors });
  }
}

export class NotFoundError extends ApiError {
  readonly kind = 'not_found';

  constructor(resource: string, id: number | string) {
    super(`${resource} ${id} not found.`, HttpStatus.NOT_FOUND, { resource, id });
  }
}

/** Kind for Nest's own HttpExceptions, keyed by status. */
export function kindForStatus(status: number): ErrorKind {
  switch (status) {
    case 400: return 'validation_error';
    case 401: return 'unauthorized';
    case 403: return 'forbidden';
    case 404: return 'not_found';
    case 502: return 'upstream_unavailable';
    default: return 'internal_error';
  }
}
