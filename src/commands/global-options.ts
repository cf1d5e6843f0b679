import type { Command } from 'commander';
import type { ExecutionOptions } from '../types/execution-context.js';

/**
 * Options declared on the root program and shared by every subcommand
 */
export type GlobalOptions = {
  settings?: string;
  define?: string[];
  verbose?: boolean;
};

/** Commander option parser that accumulates a repeatable option */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function getExecutionOptions(command: Command): ExecutionOptions {
  const globals = command.optsWithGlobals<GlobalOptions>();
  return {
    settings: globals.settings,
    define: globals.define ?? []
  };
}
