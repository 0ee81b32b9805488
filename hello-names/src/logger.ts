import pino, { type Logger } from 'pino';
import { LOG_LEVEL_VAR, type LogLevel, resolveLogLevel } from './settings.js';

/**
 * Create a pino logger that writes to stderr, leaving stdout to the greetings.
 */
export function createLogger(level: LogLevel): Logger {
  return pino(
    {
      name: 'hello-names',
      level
    },
    pino.destination(2)
  );
}

// An invalid level is reported by loadSettings(); importing this module must not throw.
export const logger: Logger = createLogger(resolveLogLevel(process.env[LOG_LEVEL_VAR]) ?? 'warn');
