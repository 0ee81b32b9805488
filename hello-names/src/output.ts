import { greet } from './greeting.js';
import { logger } from './logger.js';

export type LineWriter = (line: string) => void;

export const stdoutWriter: LineWriter = line => {
  process.stdout.write(`${line}\n`);
};

/**
 * Write one greeting per name, in order, and return how many lines were written.
 */
export function printGreetings(names: readonly string[], write: LineWriter = stdoutWriter): number {
  let written = 0;

  for (const name of names) {
    const greeting = greet(name);
    logger.debug({ name, greeting }, 'Writing greeting');
    write(greeting);
    written += 1;
  }

  logger.info({ count: written }, 'Greetings written');
  return written;
}
