/**
 * Logging with Pino. Connection strings and credentials are redacted, and
 * everything goes to stderr so CLI output on stdout stays plain JSON.
 */

import pino from 'pino';
import type { LoggerOptions } from 'pino';

const redactPaths = [
  'connectionString',
  'password',
  'secret',
  'token',
  '*.connectionString',
  '*.password',
  'headers.authorization'
];

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]'
  }
};

const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pretty
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          destination: 2
        }
      }
    })
  : pino(options, pino.destination(2));

export const createChildLogger = (name: string) => logger.child({ module: name });
