/**
 * Security error type shared by every layer of the gate.
 *
 * Internal causes travel in `details`; callers outside the process only ever
 * see the `code` and the fixed `message`.
 */

/**
 * Error codes raised inside the engine
 */
export type SecurityErrorCode =
  | 'MALFORMED_CREDENTIAL'
  | 'TOKEN_EXPIRED'
  | 'WRONG_AUDIENCE'
  | 'WRONG_ISSUER'
  | 'MISSING_SCOPE'
  | 'SIGNATURE_INVALID'
  | 'KEY_FETCH_FAILED'
  | 'EXCHANGE_FAILED'
  | 'TIMEOUT'
  | 'ABORTED'
  | 'CONFIGURATION_ERROR';

export class GateSecurityError extends Error {
  constructor(
    public readonly code: SecurityErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GateSecurityError';

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GateSecurityError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createSecurityError(
  code: SecurityErrorCode,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): GateSecurityError {
  return new GateSecurityError(code, message, statusCode, details);
}

// Predefined security error types
export const SecurityErrors = {
  MALFORMED_CREDENTIAL: (details?: Record<string, unknown>) =>
    createSecurityError('MALFORMED_CREDENTIAL', 'Unauthorized: Malformed credential', 401, details),

  TOKEN_EXPIRED: (details?: Record<string, unknown>) =>
    createSecurityError('TOKEN_EXPIRED', 'Unauthorized: Token has expired', 401, details),

  WRONG_AUDIENCE: (details?: Record<string, unknown>) =>
    createSecurityError('WRONG_AUDIENCE', 'Unauthorized: Token audience is not accepted', 401, details),

  WRONG_ISSUER: (details?: Record<string, unknown>) =>
    createSecurityError('WRONG_ISSUER', 'Unauthorized: Token issuer is not trusted', 401, details),

  MISSING_SCOPE: (details?: Record<string, unknown>) =>
    createSecurityError('MISSING_SCOPE', 'Forbidden: Token is missing required scopes', 403, details),

  SIGNATURE_INVALID: (details?: Record<string, unknown>) =>
    createSecurityError('SIGNATURE_INVALID', 'Unauthorized: Invalid token signature', 401, details),

  KEY_FETCH_FAILED: (details?: Record<string, unknown>) =>
    createSecurityError('KEY_FETCH_FAILED', 'Unauthorized: Signing keys unavailable', 401, details),

  EXCHANGE_FAILED: (details?: Record<string, unknown>) =>
    createSecurityError('EXCHANGE_FAILED', 'Forbidden: Delegated token exchange failed', 403, details),

  TIMEOUT: (operation: string, timeoutMs: number) =>
    createSecurityError('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, 504, {
      operation,
      timeoutMs,
    }),

  CONFIGURATION_ERROR: (message: string) =>
    createSecurityError('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500),
} as const;

export function isSecurityError(error: unknown): error is GateSecurityError {
  return error instanceof GateSecurityError;
}

/**
 * Describe an unknown thrown value for the audit trail
 */
export function describeCause(error: unknown): string {
  if (error instanceof GateSecurityError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof GateSecurityError) {
    return {
      type: 'SecurityError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}
