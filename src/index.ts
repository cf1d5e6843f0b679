#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';
import { CLI_NAME, EXIT_CODES } from './constants/index.js';

import { collect, type GlobalOptions } from './commands/global-options.js';
import { setupInstallCommand } from './commands/install.js';
import { setupRemoveCommand } from './commands/remove.js';
import { setupShowCommand } from './commands/show.js';
import { setupCompletionCommand } from './commands/completion.js';

/**
 * lpkgm CLI - Main entry point
 *
 * Installs package builds into a shared software tree, one manifest per
 * install, and removes them again by that manifest.
 */

// Create the main program
const program = new Command();

program
  .name(CLI_NAME)
  .description('Manifest-driven installer for shared software trees')
  .version(getVersion())
  .option('-c, --settings <path>', 'settings file (default: $LPKGM_SETTINGS or ./lpkgm-settings.json)')
  .option('-D, --define <key=value>', 'override a settings definition, e.g. -Dplatform=el9 (repeatable)', collect, [])
  .option('--verbose', 'log debug output')
  .configureHelp({ sortSubcommands: true });

setupInstallCommand(program);
setupRemoveCommand(program);
setupShowCommand(program);
setupCompletionCommand(program);

program.hook('preAction', () => {
  const opts = program.opts<GlobalOptions>();
  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions gracefully
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(EXIT_CODES.FAILURE);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(EXIT_CODES.FAILURE);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isMainModule()) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(EXIT_CODES.FAILURE);
  });
}

// Export the program for testing purposes
export { program };
