import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createCliExecutionContext } from '../cli/context.js';
import { removePackages } from '../core/remove/remove-packages.js';
import { EXIT_CODES } from '../constants/index.js';
import { collect, getExecutionOptions } from './global-options.js';

interface RemoveCommandOptions {
  yes?: boolean;
  keep: string[];
}

/**
 * Setup the remove command
 */
export function setupRemoveCommand(program: Command): void {
  program
    .command('remove')
    .aliases(['delete', 'uninstall', 'rm'])
    .description('Remove installed packages (name and version are shell-style patterns)')
    .argument('<name>', 'package name pattern')
    .argument('<version>', 'version pattern')
    .option('-y, --yes', 'do not ask for confirmation')
    .option('-k, --keep <name/version>', 'keep matching installs out of the selection (repeatable)', collect, [])
    .action(withErrorHandling(async (name: string, version: string, options: RemoveCommandOptions, command: Command) => {
      logger.debug('Remove command invoked', { name, version, options });
      const ctx = await createCliExecutionContext(getExecutionOptions(command));
      const result = await removePackages(ctx, {
        namePattern: name,
        versionPattern: version,
        yes: options.yes,
        keep: options.keep
      });
      if (!result.confirmed) {
        ctx.output.info('Nothing removed.');
        process.exitCode = EXIT_CODES.NOT_CONFIRMED;
      }
    }));
}
