/**
 * Logger utility using pino
 */

import pino from 'pino';
import type { Logger } from 'pino';

// The release credential must never reach a log line
const REDACT_PATHS = ['token', 'authToken', '*.token', '*.authToken', 'headers.authorization', '*.headers.authorization'];

export function createLogger(config: { level: string; pretty: boolean }): Logger {
  if (config.pretty) {
    return pino({
      level: config.level,
      redact: { paths: REDACT_PATHS, censor: '[redacted]' },
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(
    {
      level: config.level,
      redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    },
    pino.destination(2)
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type { Logger };
