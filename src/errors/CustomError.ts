import { validationErrorType } from 'App/types/errorType';

export class CustomError extends Error {
  public code: string;
  public statusCode: number;
  public details?: validationErrorType[];

  constructor(
    message: string,
    code: string,
    statusCode: number,
    details?: validationErrorType[],
  ) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
  }
}

export class NotFoundError extends CustomError {
  constructor(message: string = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
  }
}

export class ValidationError extends CustomError {
  constructor(
    message: string = 'Validation error',
    details?: validationErrorType[],
  ) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class BadRequestError extends CustomError {
  constructor(message: string = 'Bad request') {
    super(message, 'BAD_REQUEST', 400);
  }
}

/* -------------------------------------------------------------------------------------------------
 * Authentication
 * ------------------------------------------------------------------------------------------------- */

/** Same message for unknown user and wrong password. */
export class InvalidCredentialsError extends CustomError {
  constructor(message: string = 'Invalid credentials') {
    super(message, 'INVALID_CREDENTIALS', 401);
  }
}

export class TokenExpiredError extends CustomError {
  constructor(message: string = 'Access token has expired') {
    super(message, 'TOKEN_EXPIRED', 401);
  }
}

export class TokenInvalidError extends CustomError {
  constructor(message: string = 'Access token is invalid') {
    super(message, 'TOKEN_INVALID', 401);
  }
}

/* -------------------------------------------------------------------------------------------------
 * Worker sessions
 * ------------------------------------------------------------------------------------------------- */

export class WorkerNotFoundError extends NotFoundError {
  constructor(message: string = 'Unknown or expired worker id') {
    super(message);
  }
}

export class AlreadyClaimedError extends CustomError {
  constructor(message: string = 'Worker has already been claimed') {
    super(message, 'ALREADY_CLAIMED', 409);
  }
}

export class SubjectMismatchError extends CustomError {
  constructor(message: string = 'Worker belongs to a different subscriber') {
    super(message, 'SUBJECT_MISMATCH', 403);
  }
}

export class ServerAtCapacityError extends CustomError {
  constructor(
    message: string = 'Server is at full capacity. Please try again later.',
  ) {
    super(message, 'SERVER_AT_CAPACITY', 503);
  }
}

/**
 * Raised when the registry detects a broken invariant (e.g. an id collision).
 * Indicates a bug in id generation rather than a recoverable condition.
 */
export class RegistryInvariantError extends CustomError {
  constructor(message: string) {
    super(message, 'REGISTRY_INVARIANT', 500);
  }
}

/* -------------------------------------------------------------------------------------------------
 * Offload pool
 * ------------------------------------------------------------------------------------------------- */

export class ProviderFailureError extends CustomError {
  public readonly provider: string;

  constructor(provider: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${provider} provider failed: ${reason}`, 'PROVIDER_FAILURE', 502);
    this.provider = provider;
    this.cause = cause;
  }
}

export class PoolSaturatedError extends CustomError {
  constructor(message: string = 'Offload pool queue is full') {
    super(message, 'POOL_SATURATED', 503);
  }
}
