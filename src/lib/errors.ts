/**
 * Error codes used throughout the application
 */
export const ErrorCodes = {
  /** Authentication failed */
  AUTH_ERROR: 'auth_error',
  /** Request timed out */
  TIMEOUT: 'timeout',
  /** Backend rate limit exceeded */
  RATE_LIMIT: 'rate_limit',
  /** Backend rejected our credentials */
  UPSTREAM_AUTH_ERROR: 'upstream_auth_error',
  /** Backend answered with an error status or error event */
  UPSTREAM_ERROR: 'upstream_error',
  /** Backend could not be reached at all */
  UPSTREAM_UNREACHABLE: 'upstream_unreachable',
  /** Backend payload could not be parsed */
  MALFORMED_UPSTREAM: 'malformed_upstream',
  /** Invalid request */
  INVALID_REQUEST: 'invalid_request',
  /** Request body is not valid JSON */
  INVALID_JSON: 'invalid_json',
  /** Requested model does not resolve to an allowlisted base model */
  MODEL_NOT_ALLOWED: 'model_not_allowed',
  /** Unknown endpoint */
  NOT_FOUND: 'not_found',
  /** Internal server error */
  INTERNAL_ERROR: 'internal_error',
  /** Queue is full */
  QUEUE_FULL: 'queue_full',
  /** Request waited too long in queue */
  QUEUE_TIMEOUT: 'queue_timeout',
  /** Client went away before the backend answered */
  CLIENT_CLOSED: 'client_closed',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Custom API error class with HTTP status code and error code
 */
export class ApiError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  /** Request field the error refers to, if any */
  public readonly param: string | null;

  constructor(statusCode: number, code: ErrorCode, message: string, details?: unknown, param: string | null = null) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.param = param;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Factory functions for common errors
 */
export const Errors = {
  authRequired: () =>
    new ApiError(401, ErrorCodes.AUTH_ERROR, 'Authorization header is required'),

  authInvalid: () =>
    new ApiError(401, ErrorCodes.AUTH_ERROR, 'Invalid API key'),

  timeout: (timeoutMs: number) =>
    new ApiError(504, ErrorCodes.TIMEOUT, `Request timed out after ${timeoutMs}ms`),

  rateLimit: () =>
    new ApiError(429, ErrorCodes.RATE_LIMIT, 'Backend rate limit exceeded. Please try again later.'),

  upstreamAuthRejected: (status: 401 | 403, body?: string) =>
    new ApiError(
      status,
      ErrorCodes.UPSTREAM_AUTH_ERROR,
      `Backend rejected the configured credentials (HTTP ${status}). Refresh the auth file and restart.`,
      body ? { upstreamBody: body } : undefined
    ),

  upstreamError: (message: string, details?: unknown) =>
    new ApiError(502, ErrorCodes.UPSTREAM_ERROR, message, details),

  upstreamUnreachable: (cause: string) =>
    new ApiError(502, ErrorCodes.UPSTREAM_UNREACHABLE, `Failed to reach backend: ${cause}`, { cause }),

  malformedUpstream: (message: string, details?: unknown) =>
    new ApiError(502, ErrorCodes.MALFORMED_UPSTREAM, message, details),

  invalidRequest: (message: string, param: string | null = null) =>
    new ApiError(400, ErrorCodes.INVALID_REQUEST, message, undefined, param),

  invalidJson: (message: string) =>
    new ApiError(400, ErrorCodes.INVALID_JSON, `Invalid JSON body: ${message}`, undefined, 'body'),

  modelNotAllowed: (model: string, allowedModels: readonly string[]) =>
    new ApiError(
      400,
      ErrorCodes.MODEL_NOT_ALLOWED,
      `Model '${model}' is not allowed by this proxy. Allowed models: ${allowedModels.join(', ')}`,
      undefined,
      'model'
    ),

  notFound: (method: string, path: string) =>
    new ApiError(404, ErrorCodes.NOT_FOUND, `Endpoint not found: ${method} ${path}`),

  internalError: (message: string = 'An unexpected error occurred') =>
    new ApiError(500, ErrorCodes.INTERNAL_ERROR, message),

  queueFull: (maxSize: number) =>
    new ApiError(429, ErrorCodes.QUEUE_FULL, `Server is at capacity. Maximum queue size (${maxSize}) reached.`),

  queueTimeout: (timeoutMs: number) =>
    new ApiError(504, ErrorCodes.QUEUE_TIMEOUT, `Request waited too long in queue (${timeoutMs}ms)`),

  clientClosed: () =>
    new ApiError(499, ErrorCodes.CLIENT_CLOSED, 'Request was aborted'),
};

/**
 * Check if an error should trigger a retry
 * Only transient errors (timeout, rate limit, unreachable backend) are retryable
 * Credential rejections, invalid requests, etc. should fail immediately
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ApiError) {
    return (
      error.code === ErrorCodes.TIMEOUT ||
      error.code === ErrorCodes.RATE_LIMIT ||
      error.code === ErrorCodes.UPSTREAM_UNREACHABLE
    );
  }
  // Network errors are retryable
  if (error instanceof Error && error.message.includes('ECONNRESET')) {
    return true;
  }
  return false;
}
