/**
 * Execution Context Module
 *
 * Creates the ExecutionContext every command works from: the settings file
 * is located and loaded once, command line definitions are folded in, and
 * the platform is picked.
 */

import { stat, access, constants as fsConstants } from 'fs/promises';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { loadSettings, resolveSettingsPath, getSelectedPlatform } from './settings.js';
import { parseDefineArguments } from '../utils/definitions.js';
import { consoleOutput } from './ports/console-output.js';
import { nonInteractivePrompt } from './ports/console-prompt.js';
import { describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * Settings path priority:
 * 1. --settings
 * 2. $LPKGM_SETTINGS
 * 3. ./lpkgm-settings.json
 *
 * Ports default to plain console output and a prompt that refuses to ask;
 * the CLI swaps in its own.
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const sourceCwd = process.cwd();
  await validateSourceCwd(sourceCwd);

  const settingsPath = resolveSettingsPath(options.settings, process.env, sourceCwd);
  const overrides = parseDefineArguments(options.define ?? []);
  const settings = await loadSettings(settingsPath, { overrides, cwd: sourceCwd });

  const context: ExecutionContext = {
    sourceCwd,
    settingsPath,
    settings,
    platform: getSelectedPlatform(settings),
    output: consoleOutput,
    prompt: nonInteractivePrompt,
    interactive: options.interactive ?? false
  };

  logger.debug('Created execution context', {
    sourceCwd: context.sourceCwd,
    settingsPath: context.settingsPath,
    platform: context.platform
  });

  return context;
}

async function validateSourceCwd(sourceCwd: string): Promise<void> {
  try {
    const sourceStat = await stat(sourceCwd);
    if (!sourceStat.isDirectory()) {
      throw new Error(`Source working directory is not a directory: ${sourceCwd}`);
    }
    await access(sourceCwd, fsConstants.R_OK);
  } catch (error) {
    throw new Error(
      `Invalid source working directory: ${sourceCwd}\n` +
      `Error: ${describeError(error)}`
    );
  }
}
