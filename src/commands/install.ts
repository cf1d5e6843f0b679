import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createCliExecutionContext } from '../cli/context.js';
import { installPackage } from '../core/install/install-package.js';
import { getExecutionOptions } from './global-options.js';

interface InstallCommandOptions {
  dryRun?: boolean;
}

/**
 * Setup the install command
 */
export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('add')
    .description('Build a package version and install it into its prefix')
    .argument('<name>', 'package name from the settings (shell-style pattern matching one package)')
    .argument('<version>', 'version to install, parsed with the package\'s version expressions')
    .option('--dry-run', 'run the discovery build and the collision check only')
    .action(withErrorHandling(async (name: string, version: string, options: InstallCommandOptions, command: Command) => {
      logger.debug('Install command invoked', { name, version, options });
      const ctx = await createCliExecutionContext(getExecutionOptions(command));
      await installPackage(ctx, { name, version, dryRun: options.dryRun });
    }));
}
