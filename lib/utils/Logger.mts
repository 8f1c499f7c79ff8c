/**
 * Scoped console logging
 *
 * Every module logs through its own scope so lines read
 * `[PanelCoordinator] Connected to ...`.
 */

import type { LogSink, LoggerFunction } from '../types.mjs';

export interface ScopedLogger {
  debug: LoggerFunction;
  log: LoggerFunction;
  warn: LoggerFunction;
  error: LoggerFunction;
}

/**
 * Create a logger that prefixes every line with `[scope]`
 *
 * @example
 * const logger = createLogger('StateStore');
 * logger.log(`Stored ${count} zones`);
 */
export function createLogger(scope: string, sink: LogSink = console): ScopedLogger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args: unknown[]) => sink.debug(prefix, ...args),
    log: (...args: unknown[]) => sink.log(prefix, ...args),
    warn: (...args: unknown[]) => sink.warn(prefix, ...args),
    error: (...args: unknown[]) => sink.error(prefix, ...args),
  };
}
