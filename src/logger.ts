/**
 * Logger setup for the CLI. The library itself never logs.
 */

import { pino, type Logger } from 'pino';
import type { LoggingConfig } from './core/config/schema.js';

export function createLogger(config: LoggingConfig): Logger {
  const level = process.env['LOG_LEVEL'] ?? config.level;

  if (!config.prettyPrint) {
    return pino({ level });
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    },
  });
}
