import { ForbiddenError, UnauthorizedError } from './errors.js';
import type { User } from './users.js';
import type { UserVerifier } from './verifier.js';

// The header value is trusted as the caller's identity. Nothing here checks a credential:
// an upstream gateway is expected to authenticate the caller and set the header.

export const DEFAULT_USER_HEADER = 'x-user-email';
export const USER_ID_HEADER = 'x-user-id';
const BEARER = 'Bearer ';

export type RequestHeaders = Record<string, string | string[] | undefined>;

export type IdentityOptions = {
  headerName?: string;
  autoCreate?: boolean;
  // empty means any resolved user is let through
  requiredRoles?: readonly string[];
};

function header(headers: RequestHeaders, name: string) {
  const raw = headers[name.toLowerCase()];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Reads the identity claim: the configured header, then `x-user-id`, then a
 * `Bearer` authorization value with the prefix stripped.
 */
export function extractIdentity(headers: RequestHeaders, headerName = DEFAULT_USER_HEADER) {
  const direct = header(headers, headerName) ?? header(headers, USER_ID_HEADER);
  if (direct) return direct;

  const authorization = header(headers, 'authorization');
  if (!authorization?.startsWith(BEARER)) return null;
  return authorization.slice(BEARER.length).trim() || null;
}

export function hasRole(user: User, requiredRoles: readonly string[]) {
  return requiredRoles.length === 0 || requiredRoles.includes(user.role);
}

/** Extract, resolve, authorize. Throws IdentityError subclasses; store failures propagate. */
export async function resolveIdentity(verifier: UserVerifier, headers: RequestHeaders, options: IdentityOptions = {}) {
  const identity = extractIdentity(headers, options.headerName);
  if (!identity) throw new UnauthorizedError('missing_identity', 'Missing user identifier');

  let user = await verifier.getUser(identity);
  if (!user) {
    if (!options.autoCreate) throw new UnauthorizedError('user_not_found', 'User not found');
    user = await verifier.createUser({ email: identity, displayName: identity });
  }

  if (!hasRole(user, options.requiredRoles ?? [])) throw new ForbiddenError();
  return user;
}
