import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { IdentityError } from './errors.js';
import { resolveIdentity, type IdentityOptions } from './identity.js';
import type { User } from './users.js';
import type { UserVerifier } from './verifier.js';

declare global {
  namespace Express {
    interface Request {
      currentUser?: User;
    }
  }
}

type Handler = (req: Request, res: Response, next: NextFunction) => unknown;

/**
 * Wraps an Express handler so it only runs for a caller whose identity header resolves
 * to a user (holding one of `requiredRoles`, when given). Rejections are answered here
 * with 401/403 JSON; store failures go to `next`.
 *
 *   app.get('/admin', requireIdentity(verifier, { requiredRoles: ['admin'] })((req, res) => {
 *     res.json({ email: req.currentUser?.email });
 *   }));
 */
export function requireIdentity(verifier: UserVerifier, options: IdentityOptions = {}) {
  return (handler: Handler): RequestHandler =>
    (req, res, next) => {
      resolveIdentity(verifier, req.headers, options)
        .then(async (user) => {
          req.currentUser = user;
          await handler(req, res, next);
        })
        .catch((err: unknown) => {
          if (err instanceof IdentityError) {
            res.status(err.statusCode).json({ ok: false, error: err.code });
            return;
          }
          next(err);
        });
    };
}
