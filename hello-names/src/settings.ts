import { SettingsError } from './errors.js';
import { DEFAULT_NAMES } from './greeting.js';

export const LOG_LEVEL_VAR = 'HELLO_NAMES_LOG_LEVEL';
export const DEFAULT_NAMES_VAR = 'HELLO_NAMES_DEFAULT_NAMES';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Settings {
  readonly logLevel: LogLevel;
  readonly defaultNames: readonly string[];
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Map a raw environment value to a log level.
 *
 * Unset means `warn`. Returns null for anything pino does not know.
 */
export function resolveLogLevel(raw: string | undefined): LogLevel | null {
  if (raw === undefined) {
    return 'warn';
  }
  const value = raw.trim().toLowerCase();
  return isLogLevel(value) ? value : null;
}

/**
 * Split a comma-separated list of names, trimming entries and dropping empty ones.
 */
export function parseNameList(raw: string): string[] {
  return raw
    .split(',')
    .map(name => name.trim())
    .filter(Boolean);
}

/**
 * Read the CLI settings from the environment.
 *
 * Throws SettingsError if HELLO_NAMES_LOG_LEVEL is not a known level.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const rawLevel = env[LOG_LEVEL_VAR];
  const logLevel = resolveLogLevel(rawLevel);
  if (logLevel === null) {
    throw new SettingsError(
      LOG_LEVEL_VAR,
      `Invalid ${LOG_LEVEL_VAR} "${rawLevel ?? ''}" (expected one of: ${LOG_LEVELS.join(', ')})`
    );
  }

  const rawNames = env[DEFAULT_NAMES_VAR];
  const defaultNames = rawNames === undefined ? DEFAULT_NAMES : parseNameList(rawNames);

  return {
    logLevel,
    defaultNames
  };
}
