import { pino, type Logger } from 'pino';
import type { LoggingConfig } from '../config/config.js';

/**
 * Create the root logger. Components derive children with
 * `logger.child({ component: '...' })`.
 */
export function createLogger(config: LoggingConfig): Logger {
  return pino({
    name: 'focus-hud',
    level: config.level,
  });
}
