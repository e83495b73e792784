/**
 * Service Error Taxonomy
 *
 * Every failure that crosses the service boundary is a ServiceError with a
 * machine-readable code. Each code maps to exactly one HTTP status.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const ErrorCode = {
  VALIDATION: "validation_failed",
  UNAUTHORIZED: "unauthorized",
  NOT_FOUND: "not_found",
  CONFLICT: "conflict",
  EXPIRED: "expired",
  RATE_LIMIT: "rate_limit_exceeded",
  INTERNAL: "internal_error",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

const HTTP_STATUS: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION]: 400,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.EXPIRED]: 410,
  [ErrorCode.RATE_LIMIT]: 429,
  [ErrorCode.INTERNAL]: 500,
};

/**
 * HTTP status for an error code.
 */
export function httpStatusFor(code: ErrorCode): number {
  return HTTP_STATUS[code];
}

export type ErrorDetails = Record<string, string | number | boolean>;

// =============================================================================
// ServiceError
// =============================================================================

export class ServiceError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ServiceError";
    this.code = code;
    this.details = details;
  }

  get statusCode(): number {
    return httpStatusFor(this.code);
  }
}

export function isServiceError(err: unknown): err is ServiceError {
  return err instanceof ServiceError;
}

// =============================================================================
// Factories
// =============================================================================

export function validationError(field: string, message: string): ServiceError {
  return new ServiceError(ErrorCode.VALIDATION, message, { field });
}

export function notFoundError(resource = "Short URL"): ServiceError {
  return new ServiceError(ErrorCode.NOT_FOUND, `${resource} not found`, { resource });
}

export function conflictError(resource: string, identifier: string): ServiceError {
  return new ServiceError(ErrorCode.CONFLICT, `${resource} '${identifier}' already exists`, {
    resource,
    identifier,
  });
}

export function unauthorizedError(message: string): ServiceError {
  return new ServiceError(ErrorCode.UNAUTHORIZED, message);
}

export function expiredError(resource = "Short URL"): ServiceError {
  return new ServiceError(ErrorCode.EXPIRED, `${resource} has expired`, { resource });
}

export function rateLimitError(limit: number, windowSeconds: number): ServiceError {
  return new ServiceError(
    ErrorCode.RATE_LIMIT,
    `Rate limit exceeded: ${limit} requests per ${windowSeconds}s`,
    { limit, window: `${windowSeconds}s` }
  );
}

/**
 * Internal failure. The cause is kept for logs and never serialized.
 */
export function internalError(message: string, cause?: unknown): ServiceError {
  return new ServiceError(ErrorCode.INTERNAL, message, undefined, { cause });
}
