import { buildApp } from './app.js';
import { config } from './config.js';
import { closeDb, db, initDb } from './db.js';
import { errorMessage } from './errors.js';
import logger from './logger.js';
import { PgDocumentCollection } from './pgCollection.js';
import { UserRole } from './users.js';
import { UserVerifier } from './verifier.js';

await initDb(config.databaseUrl);

const users = new PgDocumentCollection(db(), { table: config.usersTable, partitionKey: 'user_id' });
await users.ensureTable(['username', 'type']);
const verifier = new UserVerifier(users);

// bootstrap admin if missing
const admin = await verifier.findUser(config.adminEmail);
if (admin.status === 'error') throw admin.error;
if (admin.status === 'not_found') {
  await verifier.createUser({ email: config.adminEmail, role: UserRole.Admin });
  logger.info('users', 'bootstrapped admin user', { email: config.adminEmail });
}

// Use pino-pretty for human-readable logs
const app = await buildApp({
  verifier,
  headerName: config.userHeader,
  autoCreate: config.autoCreateUsers,
  trustProxy: config.trustProxy,
  requestLog: true,
  logger: {
    level: config.logLevel,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        singleLine: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  },
});

if (config.autoCreateUsers) {
  logger.warn('identity', 'AUTO_CREATE_USERS is on: any caller that can set the identity header gets an account');
}

await app.listen({ port: config.port, host: '0.0.0.0' });
logger.success('api', `Server listening on port ${config.port}`);

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.info('api', `${signal} received, shutting down`);
    app
      .close()
      .then(closeDb)
      .then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error('api', 'shutdown failed', { error: errorMessage(err) });
          process.exit(1);
        }
      );
  });
}
