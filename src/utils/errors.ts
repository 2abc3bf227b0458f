/**
 * Custom Error Classes
 *
 * Every error raised by the access layer extends BudgetToolError and
 * carries a `type` tag, so the dispatch boundary can render it as either
 * structured JSON or plain text.
 */

import { ZodError } from 'zod';
import { sanitizeErrorMessage } from './sanitize.js';

export type ErrorType =
  | 'validation_error'
  | 'not_found'
  | 'api_error'
  | 'rate_limit'
  | 'connection_error'
  | 'partial_update'
  | 'unknown_error';

export abstract class BudgetToolError extends Error {
  abstract readonly type: ErrorType;
}

/**
 * Error thrown when local input is missing or malformed.
 * Raised before any network call.
 */
export class ValidationError extends BudgetToolError {
  readonly type = 'validation_error' as const;

  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a resource is not found.
 */
export class NotFoundError extends BudgetToolError {
  readonly type = 'not_found' as const;

  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when the YNAB API answers with a non-success status.
 */
export class ApiError extends BudgetToolError {
  readonly type = 'api_error' as const;

  constructor(
    message: string,
    public readonly status: number | null,
    public readonly detail?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Error thrown when YNAB signals throttling (HTTP 429).
 * Surfaced to the caller; nothing in this server retries.
 */
export class RateLimitError extends BudgetToolError {
  readonly type = 'rate_limit' as const;

  constructor(
    message = 'Rate limit exceeded. Please wait before making more requests.',
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

/**
 * Error thrown when a request to YNAB could not complete at all.
 */
export class ConnectionError extends BudgetToolError {
  readonly type = 'connection_error' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConnectionError';
  }
}

/**
 * A category write that was applied before a later write failed.
 */
export interface AppliedCategoryUpdate {
  category_id: string;
  budgeted: number;
}

/**
 * Error thrown when a multi-write operation fails part way through.
 * The writes recorded in `applied` have already reached YNAB and are not undone.
 */
export class PartialUpdateError extends BudgetToolError {
  readonly type = 'partial_update' as const;

  constructor(
    message: string,
    public readonly applied: AppliedCategoryUpdate[],
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'PartialUpdateError';
  }
}

/**
 * Guidance shown when no access token is configured.
 */
export const MISSING_TOKEN_MESSAGE =
  'YNAB_ACCESS_TOKEN environment variable must be set. ' +
  'Get your token at: https://app.ynab.com/settings/developer';

/**
 * YNAB API error codes and their meanings.
 */
export const YNAB_ERROR_CODES: Record<string, { message: string; suggestion: string }> = {
  '400': {
    message: 'Bad request',
    suggestion: 'Check that all required parameters are provided and valid.',
  },
  '401': {
    message: 'Unauthorized',
    suggestion: 'Authentication failed. Verify YNAB_ACCESS_TOKEN is valid and not revoked.',
  },
  '403': {
    message: 'Forbidden',
    suggestion: 'You do not have permission to access this resource.',
  },
  '404': {
    message: 'Not found',
    suggestion: 'The requested resource does not exist. Check the ID is correct.',
  },
  '409': {
    message: 'Conflict',
    suggestion: 'The resource has been modified. Refresh and try again.',
  },
  '429': {
    message: 'Too many requests',
    suggestion: 'Rate limit exceeded. Wait a moment before retrying.',
  },
  '500': {
    message: 'Internal server error',
    suggestion: 'YNAB is experiencing issues. Try again later.',
  },
  '503': {
    message: 'Service unavailable',
    suggestion: 'YNAB is temporarily unavailable. Try again later.',
  },
};

interface SdkErrorDetail {
  id: string;
  name?: string;
  detail?: string;
}

/**
 * Read the `{ error: { id, name, detail } }` body the YNAB SDK throws
 * for non-success responses.
 */
function readSdkError(error: unknown): SdkErrorDetail | null {
  if (typeof error !== 'object' || error === null || !('error' in error)) return null;
  const inner = error.error;
  if (typeof inner !== 'object' || inner === null || !('id' in inner)) return null;
  if (typeof inner.id !== 'string' && typeof inner.id !== 'number') return null;

  const result: SdkErrorDetail = { id: String(inner.id) };
  if ('name' in inner && typeof inner.name === 'string') result.name = inner.name;
  if ('detail' in inner && typeof inner.detail === 'string') result.detail = inner.detail;
  return result;
}

/**
 * Read the HTTP status from a fetch-style `{ response: Response }` error.
 */
function readResponseStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('response' in error)) return null;
  const response = error.response;
  if (typeof response !== 'object' || response === null || !('status' in response)) return null;
  return typeof response.status === 'number' ? response.status : null;
}

const TRANSPORT_ERROR_NAMES = new Set(['FetchError', 'AbortError', 'TimeoutError']);

const TRANSPORT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

/**
 * Whether a thrown Error means the request never completed: the SDK's
 * FetchError, an aborted or timed-out fetch, undici's `fetch failed`, or a
 * socket error code.
 */
function isTransportFailure(error: Error): boolean {
  if (TRANSPORT_ERROR_NAMES.has(error.name)) return true;
  if (error instanceof TypeError && error.message === 'fetch failed') return true;
  return 'code' in error && typeof error.code === 'string' && TRANSPORT_ERROR_CODES.has(error.code);
}

function errorForStatus(message: string, status: number | null, detail?: string): BudgetToolError {
  if (status === 429) {
    return new RateLimitError(message);
  }
  return new ApiError(message, status, detail);
}

/**
 * Translate anything thrown by the YNAB SDK into the error taxonomy,
 * prefixing the message with the failing operation.
 */
export function translateRemoteError(operation: string, error: unknown): BudgetToolError {
  const prefix = `Failed to ${operation}`;

  const sdkError = readSdkError(error);
  if (sdkError !== null) {
    const status = Number.parseInt(sdkError.id, 10);
    const text = sdkError.detail ?? sdkError.name ?? `error ${sdkError.id}`;
    return errorForStatus(
      `${prefix}: ${text}`,
      Number.isNaN(status) ? null : status,
      sdkError.detail
    );
  }

  const status = readResponseStatus(error);
  if (status !== null) {
    return errorForStatus(`${prefix}: HTTP ${status}`, status);
  }

  if (error instanceof Error && isTransportFailure(error)) {
    return new ConnectionError(`${prefix}: ${sanitizeErrorMessage(error)}`, error);
  }

  // Unreadable bodies, unexpected response shapes and the like
  return new ApiError(`${prefix}: ${sanitizeErrorMessage(error)}`, null);
}

/**
 * Structured error shape returned to tool callers.
 */
export interface ErrorPayload {
  error: true;
  type: ErrorType;
  message: string;
  suggestion: string;
  status?: number;
  field?: string;
  retry_after_ms?: number;
  applied?: AppliedCategoryUpdate[];
  issues?: { field: string; message: string }[];
}

/**
 * Convert any thrown value into an ErrorPayload with sensitive data redacted.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof ValidationError) {
    const payload: ErrorPayload = {
      error: true,
      type: error.type,
      message: sanitizeErrorMessage(error),
      suggestion: 'Check that all input parameters are valid.',
    };
    if (error.field !== undefined) payload.field = error.field;
    return payload;
  }

  if (error instanceof NotFoundError) {
    return {
      error: true,
      type: error.type,
      message: sanitizeErrorMessage(error),
      suggestion: 'Verify the ID exists by listing available resources first.',
    };
  }

  if (error instanceof RateLimitError) {
    const payload: ErrorPayload = {
      error: true,
      type: error.type,
      message: sanitizeErrorMessage(error),
      suggestion: 'YNAB allows 200 requests per hour per token. Wait before making more requests.',
    };
    if (error.retryAfterMs !== undefined) payload.retry_after_ms = error.retryAfterMs;
    return payload;
  }

  if (error instanceof ApiError) {
    const info = error.status !== null ? YNAB_ERROR_CODES[String(error.status)] : undefined;
    const payload: ErrorPayload = {
      error: true,
      type: error.type,
      message: sanitizeErrorMessage(error),
      suggestion: info?.suggestion ?? 'Check the YNAB API documentation for more information.',
    };
    if (error.status !== null) payload.status = error.status;
    return payload;
  }

  if (error instanceof ConnectionError) {
    return {
      error: true,
      type: error.type,
      message: sanitizeErrorMessage(error),
      suggestion: 'Could not reach YNAB. Check your network connection and try again.',
    };
  }

  if (error instanceof PartialUpdateError) {
    return {
      error: true,
      type: error.type,
      message: sanitizeErrorMessage(error),
      applied: error.applied,
      suggestion:
        'Some changes were already saved. Review the categories listed in "applied" before retrying.',
    };
  }

  if (error instanceof ZodError) {
    return {
      error: true,
      type: 'validation_error',
      message: 'Invalid input parameters',
      issues: error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: sanitizeErrorMessage(issue.message),
      })),
      suggestion: 'Check that all required parameters are provided with correct types.',
    };
  }

  return {
    error: true,
    type: 'unknown_error',
    message: sanitizeErrorMessage(error),
    suggestion: 'An unexpected error occurred. Check the server logs for details.',
  };
}
