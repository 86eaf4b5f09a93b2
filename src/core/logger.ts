/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('tools/xrandr_client');
 *
 * Logs are written to stderr so stdout carries only what the user
 * asked for (e.g. the raw `query` listing).
 */

import pino from 'pino';
import { BeamerConfig } from './types';

let instance: pino.Logger | null = null;
const children = new Set<pino.Logger>();
let destination: pino.DestinationStream = pino.destination(2);

function create(level: string): pino.Logger {
  // records are forwarded so the destination can be swapped after creation
  return pino({ name: 'beamer', level }, { write: (msg: string) => { destination.write(msg); } });
}

/** Redirect log records, e.g. to capture them in tests. Defaults back to stderr. */
export function setLogDestination(stream: pino.DestinationStream = pino.destination(2)): void {
  destination = stream;
}

export function initLogger(config: Pick<BeamerConfig, 'logLevel'>): pino.Logger {
  const logger = getLogger();
  logger.level = config.logLevel;
  // children copy the level when created, before config was known
  for (const child of children) {
    child.level = config.logLevel;
  }
  return logger;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for early imports before initLogger is called
    instance = create('warn');
  }
  return instance;
}

/**
 * Returns a child logger scoped to a specific module.
 * Usage:  const log = scopedLogger('tools/query_parser');
 */
export function scopedLogger(moduleName: string): pino.Logger {
  const child = getLogger().child({ module: moduleName });
  children.add(child);
  return child;
}
