/**
 * Logger factory
 */

import { pino, type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'hr-synth',
    level: options.level ?? 'info',
    transport: options.pretty
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  });
}
