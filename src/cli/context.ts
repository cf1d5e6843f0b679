/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations
 * (Clack output adapter, Clack prompt adapter).
 *
 * Command handlers should use this instead of calling
 * createExecutionContext() directly so that ports are injected.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { createClackOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedClackPrompt: PromptPort | undefined;

function getCliPorts(isInteractive: boolean): { output: OutputPort; prompt: PromptPort } {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    cachedClackPrompt ??= createClackPrompt();
    return { output: cachedClackOutput, prompt: cachedClackPrompt };
  }
  return { output: consoleOutput, prompt: nonInteractivePrompt };
}

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Create an ExecutionContext with CLI-specific ports injected.
 *
 * In interactive mode (TTY): uses Clack for output and prompts.
 * In non-interactive mode (CI/piped): uses plain console output and refuses to prompt.
 */
export async function createCliExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const interactive = detectInteractive(options.interactive);
  const ctx = await createExecutionContext({ ...options, interactive });
  const ports = getCliPorts(interactive);

  ctx.output = ports.output;
  ctx.prompt = ports.prompt;

  return ctx;
}
