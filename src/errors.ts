import { ZodError } from 'zod';

export type RecognizerErrorKind =
  | 'unknown_error'
  | 'invalid_parameter'
  | 'missing_parameter'
  | 'invalid_request_format'
  | 'internal_error'
  | 'unauthorized'
  | 'invalid_api_key'
  | 'rate_limit_exceeded'
  | 'permission_denied'
  | 'token_expired'
  | 'unsupported_captcha_type'
  | 'invalid_image_format'
  | 'image_too_large'
  | 'image_too_small'
  | 'recognition_failed'
  | 'processing_timeout'
  | 'invalid_image_data'
  | 'database_error'
  | 'cache_error'
  | 'network_error'
  | 'file_system_error'
  | 'external_service_error';

export type ErrorCategory = 'generic' | 'auth' | 'business' | 'system';

export interface ErrorKindMeaning {
  code: number;
  category: ErrorCategory;
  summary: string;
}

// Codes are part of the public contract; never renumber.
export const ERROR_KIND_MEANINGS: Record<RecognizerErrorKind, ErrorKindMeaning> = {
  unknown_error: { code: 1000, category: 'generic', summary: 'Unexpected failure with no better classification.' },
  invalid_parameter: { code: 1001, category: 'generic', summary: 'A parameter has an invalid type or value.' },
  missing_parameter: { code: 1002, category: 'generic', summary: 'A required parameter was not supplied.' },
  invalid_request_format: { code: 1003, category: 'generic', summary: 'The request envelope could not be understood.' },
  internal_error: { code: 1004, category: 'generic', summary: 'An internal invariant was violated.' },
  unauthorized: { code: 2000, category: 'auth', summary: 'Caller is not authenticated.' },
  invalid_api_key: { code: 2001, category: 'auth', summary: 'API key is not recognized.' },
  rate_limit_exceeded: { code: 2002, category: 'auth', summary: 'Caller exceeded its request quota.' },
  permission_denied: { code: 2003, category: 'auth', summary: 'Caller lacks permission for the operation.' },
  token_expired: { code: 2004, category: 'auth', summary: 'Caller credentials have expired.' },
  unsupported_captcha_type: { code: 3000, category: 'business', summary: 'No processor is registered for the challenge type.' },
  invalid_image_format: { code: 3001, category: 'business', summary: 'Image could not be accepted in its format.' },
  image_too_large: { code: 3002, category: 'business', summary: 'Image payload exceeds the configured maximum.' },
  image_too_small: { code: 3003, category: 'business', summary: 'Image payload is below the configured minimum.' },
  recognition_failed: { code: 3004, category: 'business', summary: 'The processor produced no usable text.' },
  processing_timeout: { code: 3005, category: 'business', summary: 'The OCR oracle did not answer in time.' },
  invalid_image_data: { code: 3006, category: 'business', summary: 'Image bytes are empty, malformed or undecodable.' },
  database_error: { code: 4000, category: 'system', summary: 'Persistent storage failure.' },
  cache_error: { code: 4001, category: 'system', summary: 'Result cache failure.' },
  network_error: { code: 4002, category: 'system', summary: 'Network transport failure.' },
  file_system_error: { code: 4003, category: 'system', summary: 'File could not be read.' },
  external_service_error: { code: 4004, category: 'system', summary: 'An external collaborator failed.' },
};

export type ErrorDetails = Record<string, unknown>;

export class RecognizerError extends Error {
  readonly kind: RecognizerErrorKind;
  readonly code: number;
  readonly category: ErrorCategory;
  readonly details: ErrorDetails;

  constructor(kind: RecognizerErrorKind, message: string, opts?: { details?: ErrorDetails; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'RecognizerError';
    this.kind = kind;
    const meaning = ERROR_KIND_MEANINGS[kind];
    this.code = meaning.code;
    this.category = meaning.category;
    this.details = opts?.details ?? {};
  }
}

export const isRecognizerError = (value: unknown): value is RecognizerError =>
  value instanceof RecognizerError;

export const describeError = (value: unknown): string => {
  if (value instanceof Error && typeof value.message === 'string') return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export const unsupportedCaptchaType = (requestedType: string, knownTypes: readonly string[]): RecognizerError =>
  new RecognizerError('unsupported_captcha_type', `Unsupported captcha type: ${requestedType}`, {
    details: { requestedType, knownTypes: [...knownTypes] },
  });

export const invalidImage = (message: string, details?: ErrorDetails, cause?: unknown): RecognizerError =>
  new RecognizerError('invalid_image_format', message, { details, cause });

export const invalidImageData = (message: string, details?: ErrorDetails, cause?: unknown): RecognizerError =>
  new RecognizerError('invalid_image_data', message, { details, cause });

export const imageTooLarge = (size: number, maxSize: number): RecognizerError =>
  new RecognizerError('image_too_large', `Image size ${String(size)} bytes exceeds limit of ${String(maxSize)} bytes`, {
    details: { actualSize: size, maxSize },
  });

export const imageTooSmall = (size: number, minSize: number): RecognizerError =>
  new RecognizerError('image_too_small', `Image size ${String(size)} bytes is below minimum of ${String(minSize)} bytes`, {
    details: { actualSize: size, minSize },
  });

export const recognitionFailed = (message: string, details?: ErrorDetails, cause?: unknown): RecognizerError =>
  new RecognizerError('recognition_failed', message, { details, cause });

export const processingTimeout = (timeoutMs: number, details?: ErrorDetails): RecognizerError =>
  new RecognizerError('processing_timeout', `Processing timed out after ${String(timeoutMs)}ms`, {
    details: { timeoutMs, ...details },
  });

export const invalidParameter = (message: string, details?: ErrorDetails, cause?: unknown): RecognizerError =>
  new RecognizerError('invalid_parameter', message, { details, cause });

export const externalServiceError = (message: string, details?: ErrorDetails, cause?: unknown): RecognizerError =>
  new RecognizerError('external_service_error', message, { details, cause });

export const cacheError = (message: string, cause?: unknown): RecognizerError =>
  new RecognizerError('cache_error', message, { details: { error: describeError(cause) }, cause });

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

interface ErrnoLike {
  code: string;
  errno?: number;
  syscall?: string;
  path?: string;
  message: string;
}

const NETWORK_ERRNO = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE', 'EHOSTUNREACH']);

const FS_REASON_BY_ERRNO: Partial<Record<string, string>> = {
  ENOENT: 'file_not_found',
  ENOTDIR: 'file_not_found',
  EISDIR: 'is_directory',
  EACCES: 'permission_denied',
  EPERM: 'permission_denied',
};

const isErrnoLike = (value: unknown): value is ErrnoLike => (
  value instanceof Error
  && 'code' in value
  && typeof value.code === 'string'
  && /^E[A-Z_]+$/.test(value.code)
);

const classifyErrno = (error: ErrnoLike): RecognizerError => {
  if (NETWORK_ERRNO.has(error.code)) {
    return new RecognizerError('network_error', 'Network failure', {
      details: { errno: error.code, error: error.message },
      cause: error,
    });
  }
  const reason = FS_REASON_BY_ERRNO[error.code] ?? 'io_error';
  const message = reason === 'file_not_found'
    ? 'File not found'
    : reason === 'permission_denied'
      ? 'Permission denied'
      : 'File system failure';
  const details: ErrorDetails = { errno: error.code, reason, error: error.message };
  if (typeof error.path === 'string') details.path = error.path;
  if (typeof error.syscall === 'string') details.syscall = error.syscall;
  return new RecognizerError('file_system_error', message, { details, cause: error });
};

export const classifyError = (value: unknown): RecognizerError => {
  if (isRecognizerError(value)) return value;
  if (isErrnoLike(value)) return classifyErrno(value);
  if (value instanceof ZodError) {
    const issues = value.issues.map((issue) => `${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`);
    return new RecognizerError('invalid_parameter', 'Parameter validation failed', {
      details: { issues },
      cause: value,
    });
  }
  const details: ErrorDetails = { error: describeError(value) };
  if (value instanceof Error && typeof value.stack === 'string') details.stack = value.stack;
  return new RecognizerError('unknown_error', 'Internal error', { details, cause: value });
};

// ---------------------------------------------------------------------------
// Response envelopes
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  success: false;
  error_code: number;
  message: string;
  details?: ErrorDetails;
  cause?: string;
}

export interface SuccessResponse<T> {
  success: true;
  message: string;
  data: T;
}

export const toErrorResponse = (value: unknown): ErrorResponse => {
  const error = classifyError(value);
  const response: ErrorResponse = {
    success: false,
    error_code: error.code,
    message: error.message,
  };
  const details = Object.fromEntries(Object.entries(error.details).filter(([key]) => key !== 'stack'));
  if (Object.keys(details).length > 0) response.details = details;
  if (error.cause !== undefined) response.cause = describeError(error.cause);
  return response;
};

export const toSuccessResponse = <T>(data: T, message = 'OK'): SuccessResponse<T> => ({
  success: true,
  message,
  data,
});
