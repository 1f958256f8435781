import Fastify, { type FastifyServerOptions } from 'fastify';
import { identityPlugin } from './fastify.js';
import { isRole, publicUser, UserRole } from './users.js';
import type { UserVerifier } from './verifier.js';

export type AppOptions = {
  verifier: UserVerifier;
  headerName?: string;
  autoCreate?: boolean;
  logger?: FastifyServerOptions['logger'];
  trustProxy?: boolean;
  // one colored line per response through app.log
  requestLog?: boolean;
};

const ansi = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function colorStatus(statusCode: number) {
  if (statusCode >= 500) return `${ansi.red}${statusCode}${ansi.reset}`;
  if (statusCode >= 400) return `${ansi.yellow}${statusCode}${ansi.reset}`;
  return `${ansi.green}${statusCode}${ansi.reset}`;
}

type NewUserBody = { email?: unknown; username?: unknown; role?: unknown; displayName?: unknown };

// Admin routes address users by their identity (the email), not the stored `user_` key.
export async function buildApp(opts: AppOptions) {
  const app = Fastify({ logger: opts.logger ?? false, disableRequestLogging: true, trustProxy: opts.trustProxy ?? false });

  await app.register(identityPlugin, { verifier: opts.verifier, headerName: opts.headerName, autoCreate: opts.autoCreate });

  if (opts.requestLog) {
    app.addHook('onResponse', async (req, reply) => {
      // Keep healthcheck noise out of logs
      if (req.url === '/health' || req.url === '/api/health') return;
      const ms = Number(reply.elapsedTime.toFixed(1));
      app.log.info(`${ansi.cyan}${req.method}${ansi.reset} ${req.url} -> ${colorStatus(reply.statusCode)} ${ansi.dim}${ms}ms${ansi.reset}`);
    });
  }

  const { verifier } = opts;
  const admin = app.identity.requireRole([UserRole.Admin]);

  app.get('/health', async () => ({ ok: true }));
  app.get('/api/health', async () => ({ ok: true }));

  app.get('/api/me', { preHandler: app.identity.currentUser }, async (req, reply) => {
    if (!req.currentUser) return reply.code(401).send({ ok: false });
    return { ok: true, user: publicUser(req.currentUser) };
  });

  app.get<{ Params: { id: string } }>('/api/admin/users/:id', { preHandler: admin }, async (req, reply) => {
    const { id } = req.params;
    const user = await verifier.getUser(id);
    if (!user) return reply.code(404).send({ ok: false });
    return { ok: true, user: publicUser(user) };
  });

  app.post<{ Body: NewUserBody | undefined }>('/api/admin/users', { preHandler: admin }, async (req, reply) => {
    const body: NewUserBody = req.body ?? {};
    const email = typeof body.email === 'string' ? body.email.trim() : '';
    if (!email.includes('@')) return reply.code(400).send({ ok: false, error: 'invalid_email' });
    const role = isRole(body.role) ? body.role : null;
    if (body.role !== undefined && !role) return reply.code(400).send({ ok: false, error: 'invalid_role' });

    if (await verifier.getUser(email)) return reply.code(409).send({ ok: false });

    const user = await verifier.createUser({
      email,
      username: typeof body.username === 'string' ? body.username : null,
      role,
      displayName: typeof body.displayName === 'string' ? body.displayName : null,
    });
    req.log.info({ email, role: user.role, by: req.currentUser?.userId }, 'admin created user');
    return { ok: true, user: publicUser(user) };
  });

  type RoleRoute = { Params: { id: string }; Body: { role?: unknown } | undefined };
  app.put<RoleRoute>('/api/admin/users/:id/role', { preHandler: admin }, async (req, reply) => {
    const { id } = req.params;
    if (id === req.currentUser?.userId) return reply.code(400).send({ ok: false, error: 'cannot_change_self_role' });

    const role = req.body?.role;
    if (!isRole(role)) return reply.code(400).send({ ok: false, error: 'invalid_role' });

    const result = await verifier.changeRole(id, role);
    if (result.status === 'not_found') return reply.code(404).send({ ok: false });
    if (result.status === 'error') {
      req.log.error({ err: result.error, userId: id }, 'role update failed');
      return reply.code(500).send({ ok: false, error: 'store_error' });
    }
    req.log.info({ userId: id, role, by: req.currentUser?.userId }, 'admin set role');
    return { ok: true, user: publicUser(result.user) };
  });

  return app;
}
