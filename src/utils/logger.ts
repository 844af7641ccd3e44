import { inspect } from 'util';

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

type LogMeta = Record<string, unknown>;

const levelOrder: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelOrder, value);
}

// Read on every call: .env may be loaded after this module is first imported
function resolveLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

const REDACT_KEYS = new Set([
  'password',
  'authorization',
  'cookie',
  'set-cookie',
  'token',
  'apikey',
  'api-key',
  'connectionstring',
]);

function redactValue(key: string, value: unknown): unknown {
  if (REDACT_KEYS.has(key.toLowerCase())) {
    return '[REDACTED]';
  }
  // Heuristic: keys containing token/secret/password
  const lowered = key.toLowerCase();
  if (lowered.includes('token') || lowered.includes('secret') || lowered.includes('password')) {
    return '[REDACTED]';
  }
  return value;
}

function redact(obj: unknown, depth = 0): unknown {
  if (obj == null) return obj;
  if (typeof obj !== 'object') return obj;
  if (obj instanceof Date) return obj.toISOString();
  if (depth > 4) return '[Object]';

  if (Array.isArray(obj)) return obj.map((v) => redact(v, depth + 1));

  const out: LogMeta = {};
  for (const [k, v] of Object.entries(obj)) {
    out[k] = redactValue(k, redact(v, depth + 1));
  }
  return out;
}

function readField(err: Error, field: string): unknown {
  return field in err ? Reflect.get(err, field) : undefined;
}

function serializeError(err: unknown): LogMeta {
  if (!err) return { message: 'Unknown error' };
  if (err instanceof Error) {
    // pg attaches code/detail/hint to its DatabaseError
    return {
      name: err.name,
      message: err.message,
      stack: err.stack,
      code: readField(err, 'code'),
      detail: readField(err, 'detail'),
      hint: readField(err, 'hint'),
    };
  }
  if (typeof err === 'object') {
    const redacted = redact(err);
    return typeof redacted === 'object' && redacted !== null ? { ...redacted } : { message: String(err) };
  }
  return { message: String(err) };
}

function log(level: LogLevel, msg: string, meta?: LogMeta) {
  if (levelOrder[level] > levelOrder[resolveLevel()]) return;
  const time = new Date().toISOString();
  const base: LogMeta = { level, time, msg };
  const redacted = meta ? redact(meta) : undefined;
  const payload: LogMeta =
    typeof redacted === 'object' && redacted !== null ? { ...base, ...redacted } : base;
  // Structured JSON for production; pretty-ish for dev
  if (process.env.NODE_ENV === 'production') {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(payload));
  } else {
    const line = `[${time}] ${level.toUpperCase()} ${msg}`;
    // eslint-disable-next-line no-console
    console.log(line, inspect(payload, { depth: 4, colors: false }));
  }
}

export const logger = {
  get level(): LogLevel {
    return resolveLevel();
  },
  fatal: (msg: string, meta?: LogMeta) => log('fatal', msg, meta),
  error: (msg: string, meta?: LogMeta) => log('error', msg, meta),
  warn: (msg: string, meta?: LogMeta) => log('warn', msg, meta),
  info: (msg: string, meta?: LogMeta) => log('info', msg, meta),
  debug: (msg: string, meta?: LogMeta) => log('debug', msg, meta),
  trace: (msg: string, meta?: LogMeta) => log('trace', msg, meta),
  serializeError,
};

export type Logger = typeof logger;
