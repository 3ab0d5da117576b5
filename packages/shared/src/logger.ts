import pino from 'pino';
import { type OperationalLogger } from '@gatehouse/domain';

const SENSITIVE_KEYS = new Set([
  'pin',
  'oldpin',
  'newpin',
  'masterpin',
  'code',
  'codeplain',
  'codehash',
  'pinhash',
  'token',
  'accesstoken',
  'secret',
  'authorization',
  'cookie',
  'ip',
  'ipaddress',
  'remoteaddress',
  'deviceinfo',
  'frontimagebase64',
  'leftimagebase64',
  'rightimagebase64',
  'body',
]);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

function sanitize(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = sanitize(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isRecord(item) ? sanitize(item) : item));
    } else {
      result[key] = value;
    }
  }
  return result;
}

export interface SafeLogger extends OperationalLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

export function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta, msg) {
      logger.info(sanitize(meta), msg);
    },
    warn(meta, msg) {
      logger.warn(sanitize(meta), msg);
    },
    error(meta, msg) {
      logger.error(sanitize(meta), msg);
    },
    debug(meta, msg) {
      logger.debug(sanitize(meta), msg);
    },
    fatal(meta, msg) {
      logger.fatal(sanitize(meta), msg);
    },
    child(bindings) {
      return wrapPino(logger.child(sanitize(bindings)));
    },
  };
}

export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const pinoInstance = pino({
    name: opts.name,
    level: opts.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(pinoInstance);
}
