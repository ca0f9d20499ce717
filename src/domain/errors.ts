/**
 * Raised when the process cannot start: an unreachable backend, a failed
 * self-check, an invalid configuration file.
 */
export class ConfigurationError extends Error {
  override readonly name: string = 'ConfigurationError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Base class for every failure reported by an upstream HTTP API
 * (the document store included). The retry classifier only recognizes
 * errors from this family.
 */
export class UpstreamApiError extends Error {
  override readonly name: string = 'UpstreamApiError';

  constructor(
    message: string,
    readonly statusCode: number,
    readonly body?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class Forbidden extends UpstreamApiError {
  override readonly name = 'Forbidden';
}

export class ResourceNotFound extends UpstreamApiError {
  override readonly name = 'ResourceNotFound';
}

export class UnprocessableEntity extends UpstreamApiError {
  override readonly name = 'UnprocessableEntity';
}

export class Conflict extends UpstreamApiError {
  override readonly name = 'Conflict';
}

export class PreconditionFailed extends UpstreamApiError {
  override readonly name = 'PreconditionFailed';
}

/** Any other non-2xx status, and connection failures (reported as 503). */
export class RequestFailed extends UpstreamApiError {
  override readonly name = 'RequestFailed';
}

/** Maps an HTTP status to the matching error subclass. */
export function errorFromStatus(statusCode: number, message: string, body?: unknown): UpstreamApiError {
  switch (statusCode) {
    case 403:
      return new Forbidden(message, statusCode, body);
    case 404:
      return new ResourceNotFound(message, statusCode, body);
    case 409:
      return new Conflict(message, statusCode, body);
    case 412:
      return new PreconditionFailed(message, statusCode, body);
    case 422:
      return new UnprocessableEntity(message, statusCode, body);
    default:
      return new RequestFailed(message, statusCode, body);
  }
}
