import { getEnv } from '../config/env';

// --- Types ---

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  folder?: string;
  step?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  folder?: string;
  step?: string;
}

// --- Log level ordering ---

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// --- Secret redaction ---

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'cookie'];

// Site URLs may carry a login in the authority or a session token in the query
const URL_PATTERNS: Array<[RegExp, string]> = [
  [/(\/\/[^/\s:@]+):[^@\s/]+@/g, '$1:[REDACTED]@'],
  [/([?&](?:token|session|sid|auth)[^=&#\s]*=)[^&#\s]+/gi, '$1[REDACTED]'],
];

// Exact values to mask wherever they appear, e.g. the login password echoed
// back inside a browser error's call log
const registeredSecrets = new Set<string>();

export function registerSecret(value: string): void {
  if (value) registeredSecrets.add(value);
}

function redactValue(key: string, value: unknown): unknown {
  if (typeof value !== 'string') return value;

  const lowerKey = key.toLowerCase();
  if (SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))) {
    return '[REDACTED]';
  }
  let redacted = value;
  for (const secret of registeredSecrets) {
    redacted = redacted.split(secret).join('[REDACTED]');
  }
  for (const [pattern, replacement] of URL_PATTERNS) {
    redacted = redacted.replace(pattern, replacement);
  }
  return redacted;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isRecord(value)) {
      result[key] = redactObject(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) =>
        isRecord(item) ? redactObject(item) : redactValue(key, item),
      );
    } else {
      result[key] = redactValue(key, value);
    }
  }
  return result;
}

// --- Logger class ---

export class Logger {
  private level: LogLevel;
  private service: string;
  private context: Record<string, unknown>;

  constructor(opts: LoggerOptions = {}) {
    const env = getEnv();
    this.level =
      opts.level ?? env.CARDBATCH_LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');
    this.service = opts.service ?? 'cardbatch';
    this.context = {};

    if (opts.folder) this.context.folder = opts.folder;
    if (opts.step) this.context.step = opts.step;
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({
      level: this.level,
      service: this.service,
    });
    child.context = { ...this.context, ...bindings };
    return child;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...this.context,
      ...(data ? redactObject(data) : {}),
    };

    const line = JSON.stringify(entry);

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}

// --- Singleton for convenience ---

let _defaultLogger: Logger | null = null;

export function getLogger(opts?: LoggerOptions): Logger {
  if (!_defaultLogger || opts) {
    _defaultLogger = new Logger(opts);
  }
  return _defaultLogger;
}
