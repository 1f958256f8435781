import fp from 'fastify-plugin';
import type { FastifyRequest } from 'fastify';
import { ForbiddenError } from './errors.js';
import { resolveIdentity, type IdentityOptions } from './identity.js';
import type { User } from './users.js';
import type { UserVerifier } from './verifier.js';

export type IdentityHook = (request: FastifyRequest) => Promise<void>;

type LookupOptions = Pick<IdentityOptions, 'headerName' | 'autoCreate'>;

declare module 'fastify' {
  interface FastifyInstance {
    identity: {
      currentUser: IdentityHook;
      requireRole: (roles: readonly string[]) => IdentityHook;
    };
  }

  interface FastifyRequest {
    currentUser: User | null;
  }
}

/**
 * preHandler that resolves the caller and sets `request.currentUser`. Failures are thrown
 * as UnauthorizedError (401, `WWW-Authenticate: Bearer`) and left to Fastify's error
 * handling.
 */
export function currentUser(verifier: UserVerifier, options: LookupOptions = {}): IdentityHook {
  const lookup = { headerName: options.headerName, autoCreate: options.autoCreate };
  return async (request) => {
    request.currentUser = await resolveIdentity(verifier, request.headers, lookup);
  };
}

/** currentUser plus a role membership check; a role outside `roles` is a 403, so an empty list admits nobody. */
export function requireRole(verifier: UserVerifier, roles: readonly string[], options: LookupOptions = {}): IdentityHook {
  const resolve = currentUser(verifier, options);
  return async (request) => {
    await resolve(request);
    if (!request.currentUser || !roles.includes(request.currentUser.role)) throw new ForbiddenError();
  };
}

export type IdentityPluginOptions = LookupOptions & { verifier: UserVerifier };

export const identityPlugin = fp<IdentityPluginOptions>(
  async (app, opts) => {
    const { verifier, ...lookup } = opts;
    app.decorateRequest('currentUser', null);
    app.decorate('identity', {
      currentUser: currentUser(verifier, lookup),
      requireRole: (roles: readonly string[]) => requireRole(verifier, roles, lookup),
    });
  },
  { name: 'identity' }
);
