import { Command, CommanderError } from 'commander';
import { SettingsError } from './errors.js';
import { logger } from './logger.js';
import { readPackageVersion } from './packageInfo.js';
import { printGreetings, stdoutWriter, type LineWriter } from './output.js';
import { loadSettings } from './settings.js';

export type ExitCode = 0 | 1;

export interface MainOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly write?: LineWriter;
}

/**
 * Commander-based CLI entrypoint.
 *
 * With no names, greets the defaults (Alice, Bob and Charlie unless
 * HELLO_NAMES_DEFAULT_NAMES overrides them). Names starting with a dash are
 * greeted like any other; `--help` and `--version` return 0 instead of exiting.
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<ExitCode> {
  const { env = process.env, write = stdoutWriter } = options;
  const program = new Command();

  program
    .name('hello-names')
    .description('Print a greeting for each name, one per line')
    .version(readPackageVersion())
    .exitOverride()
    .allowUnknownOption()
    .argument('[names...]', 'names to greet, in order. If omitted, use the default names.')
    .action((names: string[]) => {
      const settings = loadSettings(env);
      logger.level = settings.logLevel;

      const targetNames = names.length > 0 ? names : settings.defaultNames;
      logger.debug({ names: targetNames }, 'Greeting names');
      printGreetings(targetNames, write);
    });

  try {
    await program.parseAsync(['node', 'hello-names', ...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already written help, version or usage errors.
      return error.exitCode === 0 ? 0 : 1;
    }
    if (error instanceof SettingsError) {
      // eslint-disable-next-line no-console
      console.error(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  return 0;
}

if (import.meta.url === `file://${process.argv[1] ?? ''}`) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ error }, 'Unexpected failure');
      process.exitCode = 1;
    }
  );
}
