/**
 * @module config
 * Runtime configuration read from the environment, plus group defaults.
 */

/** Log levels accepted by the logger, including `silent`. */
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Environment-derived settings. */
export interface CmdtreeConfig {
  /** Minimum level written by the shared logger. */
  logLevel: LogLevel;
}

/** Level used when `CMDTREE_LOG_LEVEL` is unset or not a known level. */
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/** Defaults applied to every group that does not override them. */
export const DEFAULT_GROUP_OPTIONS = {
  autoStart: false,
  description: 'command group',
  sequentialDescription: 'sequential command group',
} as const;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Read configuration from an environment map.
 * @param env - Defaults to `process.env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CmdtreeConfig {
  const raw = env.CMDTREE_LOG_LEVEL?.trim().toLowerCase();
  return {
    logLevel: raw !== undefined && isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL,
  };
}
