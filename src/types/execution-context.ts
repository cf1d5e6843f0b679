/**
 * Execution Context Types
 *
 * Type definitions for the context every command builds once at entry and
 * threads through the core flows.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import type { LpkgmSettings } from './index.js';

/**
 * ExecutionContext - resolved settings plus the ports used for talking to
 * the user.
 */
export interface ExecutionContext {
  /**
   * Absolute path to the working directory the command was started in.
   * Relative paths in arguments resolve against it.
   */
  sourceCwd: string;

  /** Absolute path of the settings file that was loaded */
  settingsPath: string;

  /** Settings with all definitions expanded */
  settings: LpkgmSettings;

  /** Platform selected by `-Dplatform=` or the settings definitions */
  platform?: string;

  /**
   * Output port for all user-facing messages (info, success, error, warn, etc.).
   * CLI provides the clack adapter on a TTY and the console adapter otherwise.
   */
  output: OutputPort;

  /**
   * Prompt port for confirmations.
   * Non-interactive sessions get an adapter that refuses to prompt.
   */
  prompt: PromptPort;

  /** True when prompting is possible (TTY stdin and not CI) */
  interactive: boolean;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /** Settings file path (`-c/--settings`) */
  settings?: string;

  /** `key=value` definitions from `-D/--define` */
  define?: string[];

  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}
