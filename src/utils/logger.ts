/**
 * Structured logger
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { pino } from 'pino';
import type { Logger } from 'pino';
import { config } from '../config/index.js';

interface TransportTarget {
  target: string;
  level: string;
  options: Record<string, unknown>;
}

function createLogger(): Logger {
  const level = config.app.env === 'test' ? 'silent' : config.logging.level;
  const targets: TransportTarget[] = [];

  if (level !== 'silent') {
    targets.push(
      config.app.env === 'development'
        ? {
            target: 'pino-pretty',
            level,
            options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
          }
        : { target: 'pino/file', level, options: { destination: 1 } }
    );

    if (config.logging.file) {
      mkdirSync(dirname(config.logging.file), { recursive: true });
      targets.push({ target: 'pino/file', level, options: { destination: config.logging.file } });
    }
  }

  return pino({
    level,
    base: { service: config.app.name, env: config.app.env },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(targets.length > 0 && { transport: { targets } }),
  });
}

export const logger = createLogger();

/**
 * Child logger tagged with a component name
 */
export function componentLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ component, ...bindings });
}

export type { Logger };
