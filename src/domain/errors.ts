/**
 * Typed error model.
 *
 * Every failure that leaves an RPC carries one of the status codes below.
 * User-visible errors are client-fixable and their message goes on the
 * wire verbatim; everything else is replaced by a generic message and the
 * cause is only logged.
 */

export const STATUS_CODES = [
  'OK',
  'InvalidArgument',
  'Unauthenticated',
  'PermissionDenied',
  'NotFound',
  'AlreadyExists',
  'FailedPrecondition',
  'ResourceExhausted',
  'Unavailable',
  'Internal',
  'Unknown',
] as const;

export type StatusCode = (typeof STATUS_CODES)[number];

/** The error record returned in API responses. */
export interface TypedError {
  code: StatusCode;
  message: string;
  /** Whether the message is safe and useful to show to the caller. */
  userVisible: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
}

/** Thrown by services and interceptors; the transport turns it into a response. */
export class RpcError extends Error {
  readonly typedError: TypedError;

  constructor(typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError.message, options);
    this.name = 'RpcError';
    this.typedError = typedError;
  }

  get code(): StatusCode {
    return this.typedError.code;
  }
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: StatusCode;
  message: string;
  userVisible?: boolean;
  details?: Record<string, unknown>;
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    userVisible: params.userVisible ?? false,
    details: params.details,
  };
}

// --- Factories ---

/** A client-fixable error whose message is returned as-is. */
export function userVisibleError(code: StatusCode, message: string, details?: Record<string, unknown>): RpcError {
  return new RpcError(createTypedError({ code, message, userVisible: true, details }));
}

/** An error whose message is for the logs; the wire gets a generic message. */
export function statusError(code: StatusCode, message: string, cause?: unknown): RpcError {
  const full = cause === undefined ? message : `${message}: ${errorMessage(cause)}`;
  return new RpcError(createTypedError({ code, message: full }), { cause });
}

export function invalidArgument(message: string): RpcError {
  return userVisibleError('InvalidArgument', message);
}

export function notFound(message: string): RpcError {
  return userVisibleError('NotFound', message);
}

export function permissionDenied(message: string): RpcError {
  return userVisibleError('PermissionDenied', message);
}

export function isRpcError(err: unknown): err is RpcError {
  return err instanceof RpcError;
}

/** Classify anything thrown into an RpcError; unclassified failures are Unknown. */
export function toRpcError(err: unknown): RpcError {
  if (err instanceof RpcError) return err;
  return statusError('Unknown', 'unexpected failure', err);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'Unknown error';
}

/** Message shown to the caller for a given error. */
export function publicMessage(error: TypedError): string {
  if (error.userVisible) return error.message;
  switch (error.code) {
    case 'Unauthenticated':
      return 'authentication failed';
    case 'PermissionDenied':
      return 'permission denied';
    case 'Unavailable':
      return 'service unavailable';
    default:
      return 'internal error';
  }
}

const HTTP_STATUS: Record<StatusCode, number> = {
  OK: 200,
  InvalidArgument: 400,
  Unauthenticated: 401,
  PermissionDenied: 403,
  NotFound: 404,
  AlreadyExists: 409,
  FailedPrecondition: 412,
  ResourceExhausted: 429,
  Unavailable: 503,
  Internal: 500,
  Unknown: 500,
};

export function httpStatusFor(code: StatusCode): number {
  return HTTP_STATUS[code];
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: { code: StatusCode; message: string; details?: Record<string, unknown> };
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return {
    error: {
      code: error.code,
      message: publicMessage(error),
      details: error.userVisible ? error.details : undefined,
    },
  };
}
