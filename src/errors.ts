export type IdentityErrorCode = 'missing_identity' | 'user_not_found' | 'insufficient_role';

/**
 * Rejection raised while resolving the caller's identity. Fastify reads `statusCode` and
 * `headers` off thrown errors when it builds the response.
 */
export class IdentityError extends Error {
  readonly statusCode: number;
  readonly code: IdentityErrorCode;
  readonly headers: Record<string, string>;

  constructor(statusCode: number, code: IdentityErrorCode, message: string, headers: Record<string, string> = {}) {
    super(message);
    this.name = 'IdentityError';
    this.statusCode = statusCode;
    this.code = code;
    this.headers = headers;
  }
}

export class UnauthorizedError extends IdentityError {
  constructor(code: 'missing_identity' | 'user_not_found', message: string) {
    super(401, code, message, { 'www-authenticate': 'Bearer' });
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends IdentityError {
  constructor(message = 'Insufficient permissions') {
    super(403, 'insufficient_role', message);
    this.name = 'ForbiddenError';
  }
}

/** Any store failure other than a not-found. */
export class StoreError extends Error {
  readonly statusCode = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
