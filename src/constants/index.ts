/**
 * Shared constants for the lpkgm CLI application
 * This file provides a single source of truth for directory names,
 * file patterns and other constants used throughout the application.
 */

export const CLI_NAME = 'lpkgm' as const;

export const DIR_PATTERNS = {
  /** Per-platform registry of install records: <root>/<platform>/.packages */
  PACKAGES_REGISTRY: '.packages'
} as const;

export const FILE_PATTERNS = {
  RECORD_SUFFIX: '.json',
  MANIFEST_SUFFIX: '.files',
  LOCK_SUFFIX: '.lpkgm.lock',
  PROBE_PREFIX: 'lpkgm-probe-',
  DEFAULT_SETTINGS: './lpkgm-settings.json',
  SETTINGS_EXTENSIONS: ['.json', '.jsonc', '.yml', '.yaml'],
} as const;

export const ENV_VARS = {
  SETTINGS: 'LPKGM_SETTINGS',
  VERBOSE: 'LPKGM_VERBOSE',
  LOG_LEVEL: 'LOGLEVEL',
  INSTALL_ROOT: 'LPKGM_INSTALL_ROOT',
  SOURCE_DIR: 'LPKGM_SOURCE_DIR',
  PLATFORM: 'LPKGM_PLATFORM',
  BUILD_PHASE: 'LPKGM_BUILD_PHASE'
} as const;

/** Definition key naming the active platform (`-Dplatform=<id>`) */
export const PLATFORM_DEFINITION = 'platform' as const;

export const DEFAULT_PREFIX_TEMPLATE = '{root}/{platform}/{package}/{fullVersion}' as const;

/** Maximum depth below the root at which platform directories are searched */
export const PLATFORM_SEARCH_DEPTH = 3;

/** Number of trailing build output lines kept on a failed build */
export const BUILD_OUTPUT_TAIL_LINES = 40;

/** Age at which an unrefreshed prefix lock is taken over */
export const PREFIX_LOCK_STALE_MS = 10_000;

/** Number of log files offered when completing a flag value */
export const RECENT_LOG_FILES_LIMIT = 20;

/**
 * Subcommand keywords accepted on the command line, keyed by canonical name.
 * The canonical keyword comes first in each list.
 */
export const SUBCOMMAND_KEYWORDS = {
  install: ['install', 'add'],
  remove: ['remove', 'delete', 'uninstall', 'rm'],
  show: ['show', 'inspect', 'list']
} as const;

/** Output formats of the show command */
export const SHOW_FORMATS = ['ascii', 'json'] as const;

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  NOT_CONFIRMED: 2,
  BUILD_FAILED: 3,
  COLLISION_DETECTED: 4,
  INCOMPLETE_INSTALL: 5,
  PREFIX_LOCKED: 6
} as const;

export type Subcommand = keyof typeof SUBCOMMAND_KEYWORDS;
export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];
