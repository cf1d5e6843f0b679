/**
 * Build Driver
 *
 * The capability the install transaction needs from a build system:
 * "install into directory X". The transaction calls it twice per install,
 * once for the probe directory and once for the real prefix, with the same
 * configuration object both times.
 */

import type { BuildPhase } from '../../utils/errors.js';

/** Opaque build configuration, forwarded untouched to the driver */
export type BuildConfig = Readonly<Record<string, string>>;

export interface BuildInvocation {
  /** Directory holding the build source */
  sourceDir: string;
  /** Directory the build must install into */
  installRoot: string;
  config: BuildConfig;
  phase: BuildPhase;
}

export interface BuildDriver {
  /**
   * Build and install into `installRoot`.
   * Rejects with BuildFailedError when the build reports failure.
   */
  install(invocation: BuildInvocation): Promise<void>;
}
