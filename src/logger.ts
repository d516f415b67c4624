import pino, { type Logger, type LoggerOptions } from 'pino';

import { sanitizeMessage } from './security/redaction.js';

export const REDACTED_LOG_PATHS = [
  'accessToken',
  'token',
  'authorization',
  'headers.authorization',
  'headers.Authorization',
  '*.accessToken',
  '*.token',
  '*.authorization'
];

export function buildLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: undefined,
    redact: {
      paths: REDACTED_LOG_PATHS,
      censor: '[REDACTED]'
    },
    hooks: {
      logMethod(args, method) {
        // The first argument may be a merging object at runtime; only strings are rewritten.
        const [first, ...rest] = args;
        const head = typeof first === 'string' ? sanitizeMessage(first) : first;
        method.apply(this, [head, ...rest.map((arg: unknown) => (typeof arg === 'string' ? sanitizeMessage(arg) : arg))]);
      }
    }
  };
}

export function createLogger(level: string, options: { pretty?: boolean } = {}): Logger {
  const loggerOptions = buildLoggerOptions(level);

  // MCP stdio requires stdout to be reserved for JSON-RPC frames only.
  // Send logs to stderr to avoid corrupting protocol messages.
  if (options.pretty) {
    return pino(
      loggerOptions,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: false,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2
        }
      })
    );
  }

  return pino(loggerOptions, pino.destination({ fd: 2, sync: false }));
}
