// ============================================================================
// CRM Error Types — Typed errors for API call failures
// ============================================================================

import type { PlatformError } from './types/index.js';

/**
 * Base error for all CRM API errors.
 * Includes the HTTP status code and response body for debugging.
 * NEVER includes record field values in messages.
 */
export class CrmApiError extends Error {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(message: string, statusCode: number, responseBody: string) {
    super(message);
    this.name = 'CrmApiError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/**
 * Thrown when the org refuses a request over API limits
 * (403 REQUEST_LIMIT_EXCEEDED, or 429 from an edge proxy).
 */
export class CrmRateLimitError extends CrmApiError {
  constructor(statusCode: number, responseBody: string) {
    super(`CRM API request limit exceeded (${statusCode}). Retry after backoff.`, statusCode, responseBody);
    this.name = 'CrmRateLimitError';
  }
}

/**
 * Thrown on HTTP 401 (Unauthorized).
 * Indicates the session token is invalid or expired.
 */
export class CrmAuthError extends CrmApiError {
  constructor(responseBody: string) {
    super(
      'CRM API authentication failed (401). Check that SF_ACCESS_TOKEN is a valid session token.',
      401,
      responseBody,
    );
    this.name = 'CrmAuthError';
  }
}

export type DmlOperation = 'insert' | 'update' | 'upsert' | 'delete';

/**
 * A DML request was answered but one or more records failed.
 * `errors` holds the platform's error entries exactly as returned.
 */
export class CrmDmlError extends Error {
  readonly operation: DmlOperation;
  readonly sobject: string;
  readonly errors: PlatformError[];

  constructor(operation: DmlOperation, sobject: string, errors: PlatformError[]) {
    const first = errors[0];
    const summary = first ? `${first.statusCode}: ${first.message}` : 'unknown failure';
    super(`${sobject} ${operation} failed (${errors.length} error(s)). First: ${summary}`);
    this.name = 'CrmDmlError';
    this.operation = operation;
    this.sobject = sobject;
    this.errors = errors;
  }
}
