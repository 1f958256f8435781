import 'dotenv/config';
import { parseLogLevel } from './logger.js';

function flag(value: string | undefined, fallback: boolean) {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export const config = {
  port: Number(process.env.PORT ?? 3000),
  databaseUrl: process.env.DATABASE_URL ?? '',
  usersTable: process.env.USERS_TABLE ?? 'user_documents',

  // Header carrying the caller's identity claim. Set by an upstream proxy; never verified here.
  userHeader: (process.env.USER_HEADER ?? 'x-user-email').toLowerCase(),
  autoCreateUsers: flag(process.env.AUTO_CREATE_USERS, false),
  adminEmail: process.env.ADMIN_EMAIL ?? 'admin@local',

  trustProxy: flag(process.env.TRUST_PROXY, false),
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};

export { flag as parseFlag, parseLogLevel };
