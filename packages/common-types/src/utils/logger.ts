import { pino } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import { sanitizeLogMessage, sanitizeObject } from './logSanitizer.js';

/** Properties already handled by standard extraction */
const HANDLED_PROPS = new Set(['type', 'message', 'stack', 'cause', 'name']);

/** Non-enumerable properties common on Node.js errors */
const NODE_ERROR_PROPS = ['code', 'errno', 'syscall'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Determine the error type from constructor name or name property
 */
function determineErrorType(errObj: Record<string, unknown>): string {
  const constructorName: unknown = errObj.constructor?.name;
  if (typeof constructorName === 'string' && constructorName !== 'Object') {
    return constructorName;
  }
  if (typeof errObj.name === 'string' && errObj.name !== '') {
    return errObj.name;
  }
  return 'Object';
}

/**
 * Error serializer for `{ err }` bindings.
 *
 * Handles Error instances, grammY's GrammyError/HttpError (their
 * `error_code`/`description` fields are enumerable and kept), plain objects
 * thrown by ioredis, and non-object values. Every string is sanitized.
 */
function customErrorSerializer(err: unknown): object {
  if (!isRecord(err)) {
    return {
      type: err === null || err === undefined ? 'null' : typeof err,
      value: typeof err === 'string' ? sanitizeLogMessage(err) : err,
    };
  }

  const serialized: Record<string, unknown> = { type: determineErrorType(err) };

  if (typeof err.message === 'string') {
    serialized.message = sanitizeLogMessage(err.message);
  }
  if (typeof err.stack === 'string') {
    serialized.stack = sanitizeLogMessage(err.stack);
  }
  if (err.cause !== undefined) {
    serialized.cause = err.cause === err ? '[Circular]' : customErrorSerializer(err.cause);
  }

  for (const key of Object.keys(err)) {
    const value = err[key];
    if (HANDLED_PROPS.has(key) || typeof value === 'function') {
      continue;
    }
    serialized[key] = sanitizeObject(value);
  }

  if (err instanceof Error) {
    for (const key of NODE_ERROR_PROPS) {
      if (!(key in serialized) && key in err && err[key] !== undefined) {
        serialized[key] = err[key];
      }
    }
  }

  return serialized;
}

/**
 * Creates a logger instance with environment-aware configuration.
 * Uses pino-pretty transport ONLY when explicitly enabled via ENABLE_PRETTY_LOGS=true.
 * Defaults to plain JSON logging for production compatibility.
 *
 * ⚠️ Log errors as `logger.error({ err: error }, 'What failed')` so the
 * serializer above sees them.
 *
 * @param destination - Output stream override, used by tests to capture lines
 */
export function createLogger(name?: string, destination?: DestinationStream): Logger {
  const usePrettyLogs = process.env.ENABLE_PRETTY_LOGS === 'true' && destination === undefined;

  const config: LoggerOptions = {
    level: process.env.LOG_LEVEL ?? 'info',
    name,
    serializers: {
      err: customErrorSerializer,
    },
    formatters: {
      log: (object: Record<string, unknown>) => {
        const sanitized = sanitizeObject(object);
        return isRecord(sanitized) ? sanitized : object;
      },
    },
  };

  // Only use pino-pretty when explicitly enabled (requires pino-pretty to be installed)
  if (usePrettyLogs) {
    config.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return destination === undefined ? pino(config) : pino(config, destination);
}
