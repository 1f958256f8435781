// Colored console logger for library and bootstrap messages. Request logs go through Fastify's pino.

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const rank = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 } as const;

export type LogLevel = keyof typeof rank;

export function parseLogLevel(value: string | undefined): LogLevel {
  const v = value?.trim().toLowerCase();
  return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' || v === 'silent' ? v : 'info';
}

type Meta = Record<string, unknown>;

// read per call so a .env loaded after this module still applies
function enabled(level: LogLevel) {
  return rank[level] >= rank[parseLogLevel(process.env.LOG_LEVEL)];
}

function timestamp() {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

export function formatMessage(level: string, color: string, prefix: string, msg: string, meta?: Meta) {
  const ts = `${colors.gray}${timestamp()}${colors.reset}`;
  const lvl = `${color}${level.padEnd(5)}${colors.reset}`;
  const pfx = `${colors.cyan}[${prefix}]${colors.reset}`;
  const metaStr = meta ? ` ${colors.dim}${JSON.stringify(meta)}${colors.reset}` : '';
  return `${ts} ${lvl} ${pfx} ${msg}${metaStr}`;
}

export const logger = {
  debug: (prefix: string, msg: string, meta?: Meta) => {
    if (enabled('debug')) console.log(formatMessage('DEBUG', colors.gray, prefix, msg, meta));
  },

  info: (prefix: string, msg: string, meta?: Meta) => {
    if (enabled('info')) console.log(formatMessage('INFO', colors.green, prefix, msg, meta));
  },

  warn: (prefix: string, msg: string, meta?: Meta) => {
    if (enabled('warn')) console.warn(formatMessage('WARN', colors.yellow, prefix, msg, meta));
  },

  error: (prefix: string, msg: string, meta?: Meta) => {
    if (enabled('error')) console.error(formatMessage('ERROR', colors.red, prefix, msg, meta));
  },

  success: (prefix: string, msg: string, meta?: Meta) => {
    if (enabled('info')) console.log(formatMessage('✓', colors.green + colors.bright, prefix, msg, meta));
  },
};

export type Logger = typeof logger;

export default logger;
