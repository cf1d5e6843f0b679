/**
 * Prompt Port Interface
 *
 * Defines the contract for interactive user prompts.
 * Core logic uses this interface instead of @clack/prompts directly.
 *
 * Implementations:
 *   - ClackPromptAdapter (CLI): routes to @clack/prompts
 *   - NonInteractivePromptAdapter (CI/default): throws on prompt attempts
 */

export interface PromptPort {
  /** Prompt for a yes/no confirmation */
  confirm(message: string, initial?: boolean): Promise<boolean>;
}
