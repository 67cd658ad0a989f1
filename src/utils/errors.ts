// src/utils/errors.ts

export class CollectorError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Configuration errors
export class ConfigError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

export class NoDatasetsSelectedError extends ConfigError {
  constructor(message: string = 'No valid dataset selected', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NO_DATASETS_SELECTED';
  }
}

// API errors
export class ApiError extends CollectorError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class AuthenticationError extends ApiError {
  constructor(message: string = 'Authentication rejected', details?: Record<string, unknown>) {
    super(message, 401, details);
    this.code = 'AUTHENTICATION_FAILED';
  }
}

export class AuthorizationError extends ApiError {
  constructor(message: string = 'Authorization denied', details?: Record<string, unknown>) {
    super(message, 403, details);
    this.code = 'AUTHORIZATION_DENIED';
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string = 'Endpoint not found', details?: Record<string, unknown>) {
    super(message, 404, details);
    this.code = 'NOT_FOUND';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

// Network errors
export class NetworkError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

// Payload errors
export class ResponseParseError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RESPONSE_PARSE_ERROR', details);
  }
}

// Output errors
export class SinkError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SINK_ERROR', details);
  }
}

/**
 * Map an HTTP error status to the matching ApiError subclass
 */
export function errorForStatus(
  status: number,
  details?: Record<string, unknown>,
  retryAfter?: number
): ApiError {
  switch (status) {
    case 401:
      return new AuthenticationError(undefined, details);
    case 403:
      return new AuthorizationError(undefined, details);
    case 404:
      return new NotFoundError(undefined, details);
    case 429:
      return new RateLimitError(undefined, retryAfter, details);
  }
  if (status >= 500) {
    return new ApiServerError(`Server error: ${status}`, status, details);
  }
  return new ApiClientError(`Client error: ${status}`, status, details);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
