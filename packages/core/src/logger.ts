/**
 * @module logger
 * Component loggers that publish `log` events onto the {@link EventBus}.
 *
 * Nothing here writes to stdout; reporters subscribed to the `log` channel
 * decide what to print.
 */

import type { EventBus } from './event-bus.js';
import type { LogLevel, Variables } from './types.js';

export interface Logger {
  debug(message: string, data?: Variables): void;
  info(message: string, data?: Variables): void;
  warn(message: string, data?: Variables): void;
  error(message: string, data?: Variables): void;
}

/**
 * Create a logger that emits `{ type: 'log' }` records on the bus.
 *
 * @param bus - Destination bus
 * @param source - Component name stamped on every record
 */
export function createBusLogger(bus: EventBus, source: string): Logger {
  const log = (level: LogLevel) => (message: string, data?: Variables): void => {
    bus.emit('log', { type: 'log', level, source, message, data, timestamp: Date.now() });
  };
  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

const noop = (): void => {};

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
