import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export interface LoggerOptions {
  level: LogLevel;
  /** Extra bindings attached to every entry. */
  bindings?: Record<string, unknown>;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({ name: 'polycodec', level: options.level }).child(options.bindings ?? {});
}
