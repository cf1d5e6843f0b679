import { Command } from 'commander';
import { withErrorHandling, describeError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { loadSettings, resolveSettingsPath } from '../core/settings.js';
import { parseDefineArguments } from '../utils/definitions.js';
import { FileSystemEnumerator } from '../core/completion/fs-enumerator.js';
import { resolveCompletions } from '../core/completion/resolver.js';
import { renderBashCompletionScript } from '../core/completion/bash-script.js';
import type { ExecutionOptions } from '../types/execution-context.js';
import { getExecutionOptions } from './global-options.js';

/** Where candidates and the script are written */
export interface TextSink {
  write(text: string): unknown;
}

interface CompletionCommandOptions {
  line?: string;
  point?: string;
  script?: boolean;
}

/**
 * Enumerator over the settings when they load; without them only what the
 * working directory offers (settings files) can be completed.
 */
async function createEnumerator(options: ExecutionOptions, cwd: string): Promise<FileSystemEnumerator> {
  try {
    const settingsPath = resolveSettingsPath(options.settings, process.env, cwd);
    const settings = await loadSettings(settingsPath, {
      overrides: parseDefineArguments(options.define ?? []),
      cwd
    });
    return FileSystemEnumerator.fromSettings(settings, cwd);
  } catch (error) {
    logger.debug(`Completing without settings: ${describeError(error)}`);
    return new FileSystemEnumerator({ cwd });
  }
}

/**
 * Candidates for the word under `point` in `line`, one per array entry.
 * A missing point means the end of the line.
 */
export async function completeLine(
  line: string,
  point: number | undefined,
  options: ExecutionOptions = {},
  cwd: string = process.cwd()
): Promise<string[]> {
  const enumerator = await createEnumerator(options, cwd);
  return resolveCompletions(line, point ?? line.length, enumerator);
}

function parsePoint(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const point = Number.parseInt(value, 10);
  if (!Number.isInteger(point) || point < 0) {
    throw new ValidationError(`--point must be a non-negative integer, got "${value}"`);
  }
  return point;
}

/**
 * Setup the completion command
 */
export function setupCompletionCommand(program: Command, stdout: TextSink = process.stdout): void {
  program
    .command('completion')
    .description('Print shell completion candidates, or the bash completion script')
    .option('--line <line>', 'command line typed so far ($COMP_LINE)')
    .option('--point <index>', 'cursor position within the line ($COMP_POINT)')
    .option('--script', 'print the bash completion script')
    .action(withErrorHandling(async (options: CompletionCommandOptions, command: Command) => {
      if (options.script || options.line === undefined) {
        stdout.write(renderBashCompletionScript());
        return;
      }
      const candidates = await completeLine(options.line, parsePoint(options.point), getExecutionOptions(command));
      if (candidates.length > 0) {
        stdout.write(`${candidates.join('\n')}\n`);
      }
    }));
}
