import { isPlainObject } from '@recordkit/core';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// Field values pass through debug logs, so credential-shaped keys are masked.
const SECRET_KEYS = new Set([
  'password',
  'passwordhash',
  'pass',
  'token',
  'accesstoken',
  'refreshtoken',
  'apikey',
  'secret',
  'connectionstring',
  'authorization',
]);

const REDACTED = '[REDACTED]';
const BEARER_TOKEN = /\bBearer\s+[A-Za-z0-9._-]{8,}/g;
const URL_CREDENTIALS = /([a-z][a-z0-9+.-]*:\/\/[^:\s/]+:)[^@\s/]+@/gi;

function maskText(text: string): string {
  return text.replace(BEARER_TOKEN, `Bearer ${REDACTED}`).replace(URL_CREDENTIALS, `$1${REDACTED}@`);
}

/**
 * Turn a log payload into JSON-safe data with secrets masked
 */
export function redactSecrets(value: unknown): unknown {
  switch (typeof value) {
    case 'string':
      return maskText(value);
    case 'number':
    case 'boolean':
    case 'undefined':
      return value;
    case 'bigint':
      return value.toString();
  }
  if (value === null) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (Array.isArray(value)) return value.map(redactSecrets);
  if (value instanceof Error) {
    return {
      name: value.name,
      message: maskText(value.message),
      stack: value.stack ? maskText(value.stack) : undefined,
    };
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        SECRET_KEYS.has(key.toLowerCase()) ? REDACTED : redactSecrets(item),
      ])
    );
  }
  return String(value);
}

/**
 * Line logger writing to stderr. Child loggers carry extra fields on every line.
 */
export class Logger {
  constructor(
    private readonly options: LoggerOptions = {},
    private readonly bound: Record<string, unknown> = {}
  ) {}

  get level(): LogLevel {
    return this.options.level ?? 'warn';
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  child(fields: Record<string, unknown>): Logger {
    return new Logger(this.options, { ...this.bound, ...fields });
  }

  log(level: LogLevel, msg: string, extra: Record<string, unknown> = {}): void {
    if (!this.isLevelEnabled(level)) return;

    const entry = redactSecrets({ ts: new Date().toISOString(), level, msg, ...this.bound, ...extra });
    if (!isPlainObject(entry)) return;

    if (this.options.format === 'json') {
      process.stderr.write(`${JSON.stringify(entry)}\n`);
      return;
    }

    const location = [entry['recordType'], entry['field']]
      .filter((part): part is string => typeof part === 'string' && part.length > 0)
      .join('.');
    const prefix = `[${String(entry['ts'])}] ${level.toUpperCase()}`;
    process.stderr.write(`${prefix}${location ? ` ${location}` : ''} ${String(entry['msg'])}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>): void {
    this.log('debug', msg, extra);
  }

  info(msg: string, extra?: Record<string, unknown>): void {
    this.log('info', msg, extra);
  }

  warn(msg: string, extra?: Record<string, unknown>): void {
    this.log('warn', msg, extra);
  }

  error(msg: string, extra?: Record<string, unknown>): void {
    this.log('error', msg, extra);
  }
}
