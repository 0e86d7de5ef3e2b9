/**
 * Logger contract shared by every hedging component.
 *
 * Shape matches pino (and therefore Fastify's `app.log`), so the server passes
 * its own logger down and the collector script builds one with `createLogger`.
 */

import { pino } from 'pino';

export type LogFn = (obj: Record<string, unknown>, msg?: string) => void;

export interface Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export function createLogger(level: LogLevel = 'info', name = 'hedging'): Logger {
  return pino({ name, level });
}
