/**
 * @module logger
 * Shared pino logger for engine diagnostics.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { loadConfig } from './config';

export type { Logger } from 'pino';

/** Root logger; every module logs through a child of it. */
export const rootLogger: Logger = pino({
  name: 'cmdtree',
  level: loadConfig().logLevel,
});

/**
 * Create a child logger tagged with a component name.
 * @param component - Value of the `component` field on every line.
 */
export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}
