/**
 * Clack Prompt Adapter
 *
 * CLI-specific PromptPort implementation that routes to @clack/prompts
 * for interactive terminal prompts.
 */

import * as clack from '@clack/prompts';
import type { PromptPort } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

/**
 * Create a Clack-based PromptPort for interactive terminal sessions.
 */
export function createClackPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const result = await clack.confirm({
        message,
        initialValue: initial ?? false,
      });
      if (clack.isCancel(result)) {
        clack.cancel('Operation cancelled.');
        throw new UserCancellationError('Operation cancelled by user');
      }
      return result;
    }
  };
}
