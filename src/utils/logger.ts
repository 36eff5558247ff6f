/**
 * Logging with Pino - SMTP credentials are redacted
 */

import pino, { type Logger } from 'pino';

const redactPaths = [
  'password',
  'smtpPassword',
  'smtpUser',
  'auth.pass',
  'auth.user',
  '*.password',
  '*.smtpPassword',
  '*.auth.pass',
  'headers.authorization',
  'headers.cookie',
];

function usePrettyTransport(): boolean {
  const nodeEnv = process.env.NODE_ENV;
  return nodeEnv !== 'production' && nodeEnv !== 'test';
}

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport: usePrettyTransport()
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type { Logger };

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
