/**
 * Portal Error Taxonomy
 *
 * Every failure the library reports is one of five kinds:
 * - `network` - connectivity or HTTP status failures after retries ran out
 * - `authentication` - bad credentials or an unexpected sign-in response
 * - `parse` - expected markup or field missing
 * - `session_expired` - the portal sent us back to the sign-in page
 * - `validation` - a model rejected malformed or missing data
 *
 * Lower layers throw these directly. Layer boundaries call
 * {@link toPortalError} to map anything else onto the nearest kind.
 */

import { getErrorMessage } from './utils/helpers.js';

export type PortalErrorKind =
  | 'network'
  | 'authentication'
  | 'parse'
  | 'session_expired'
  | 'validation';

export interface ValidationIssue {
  field: string;
  message: string;
}

export abstract class PortalError extends Error {
  abstract readonly kind: PortalErrorKind;
  /** HTTP-like hint for callers that surface errors over HTTP */
  readonly statusCode: number;

  protected constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class NetworkError extends PortalError {
  readonly kind = 'network';
  /** Last HTTP status seen, when the failure was a status and not a socket error */
  readonly status?: number;

  constructor(message = 'Network error', options: { status?: number; cause?: unknown } = {}) {
    super(message, 0, { cause: options.cause });
    this.status = options.status;
  }
}

export class AuthenticationError extends PortalError {
  readonly kind = 'authentication';

  constructor(message = 'Authentication failed', options?: { cause?: unknown }) {
    super(message, 401, options);
  }
}

export class ParseError extends PortalError {
  readonly kind = 'parse';
  /** Name of the record field that could not be found */
  readonly field?: string;

  constructor(message = 'Failed to parse portal response', options: { field?: string; cause?: unknown } = {}) {
    super(message, 200, { cause: options.cause });
    this.field = options.field;
  }
}

export class SessionExpiredError extends PortalError {
  readonly kind = 'session_expired';

  constructor(message = 'Session expired', options?: { cause?: unknown }) {
    super(message, 401, options);
  }
}

export class ValidationError extends PortalError {
  readonly kind = 'validation';
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[], message?: string) {
    super(message ?? formatIssues(issues), 422);
    this.issues = issues;
  }
}

function formatIssues(issues: readonly ValidationIssue[]): string {
  if (issues.length === 0) return 'Validation failed';
  return `Validation failed: ${issues.map(i => `${i.field}: ${i.message}`).join('; ')}`;
}

export function isPortalError(value: unknown): value is PortalError {
  return value instanceof PortalError;
}

/**
 * Map any thrown value onto the error taxonomy.
 *
 * Portal errors whose kind is in `passThrough` are returned as they are;
 * everything else becomes a `fallback` error with the original as `cause`.
 */
export function toPortalError(
  error: unknown,
  fallback: 'authentication' | 'parse' | 'network',
  passThrough: readonly PortalErrorKind[] = ['network', 'authentication', 'parse', 'session_expired', 'validation'],
  context?: string
): PortalError {
  if (isPortalError(error) && passThrough.includes(error.kind)) {
    return error;
  }

  const detail = getErrorMessage(error);
  const message = context ? `${context}: ${detail}` : detail;

  switch (fallback) {
    case 'authentication':
      return new AuthenticationError(message, { cause: error });
    case 'parse':
      return new ParseError(message, { cause: error });
    case 'network':
      return new NetworkError(message, { cause: error });
  }
}

// ============================================================================
// Result type
// ============================================================================

export type PortalResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: PortalError };

/**
 * Await a portal operation and capture its outcome as a {@link PortalResult}.
 * Errors outside the taxonomy are reported as `parse` failures.
 */
export async function settle<T>(operation: Promise<T>): Promise<PortalResult<T>> {
  try {
    return { ok: true, value: await operation };
  } catch (error: unknown) {
    return { ok: false, error: toPortalError(error, 'parse') };
  }
}
