import { Command, Option } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createCliExecutionContext } from '../cli/context.js';
import { showPackages, type ShowFormat } from '../core/show/show-packages.js';
import { SHOW_FORMATS } from '../constants/index.js';
import { getExecutionOptions } from './global-options.js';

interface ShowCommandOptions {
  format: ShowFormat;
}

/**
 * Setup the show command
 */
export function setupShowCommand(program: Command): void {
  program
    .command('show')
    .aliases(['inspect', 'list'])
    .description('Show installed packages, or the install records of one package version')
    .argument('[name]', 'package name pattern')
    .argument('[version]', 'version pattern; prints the full install records')
    .addOption(new Option('--format <format>', 'output format of the summary').choices(SHOW_FORMATS).default('ascii'))
    .action(withErrorHandling(async (
      name: string | undefined,
      version: string | undefined,
      options: ShowCommandOptions,
      command: Command
    ) => {
      logger.debug('Show command invoked', { name, version, options });
      const ctx = await createCliExecutionContext(getExecutionOptions(command));
      const text = await showPackages(ctx, { namePattern: name, versionPattern: version, format: options.format });
      process.stdout.write(text);
    }));
}
