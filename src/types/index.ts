/**
 * Common types and interfaces for the lpkgm CLI application
 */

import { EXIT_CODES, type ExitCode } from '../constants/index.js';

export * from './execution-context.js';

// Settings file types

/** Shell command string, or argv array run without a shell */
export type BuildCommand = string | string[];

export interface BuildDefinition {
  commands: BuildCommand[];
  env?: Record<string, string>;
  /**
   * Opaque build configuration forwarded to the build driver.
   * Both install phases receive the same (frozen) object.
   */
  config?: Record<string, string>;
}

export interface PackageDefinition {
  'version-regex': string[];
  'default-version-values'?: Record<string, string>;
  /** Versions offered for installation, optionally per platform glob */
  versions?: string[] | Record<string, string[]>;
  source: string;
  prefix?: string;
  build: BuildDefinition;
}

export interface LpkgmSettings {
  /** Root of the shared software tree; platform roots live below it */
  root: string;
  definitions: Record<string, string>;
  'tmp-dir-prefix'?: string;
  'log-dir'?: string;
  packages: Record<string, PackageDefinition>;
}

// Install record types

/**
 * Version attributes extracted from a version string. `fullVersion` is the
 * string the user typed; the rest come from named regex groups.
 */
export interface PackageVersion {
  fullVersion: string;
  [attribute: string]: string;
}

export interface InstallStats {
  size: number;
  nFiles: number;
}

/** Persisted at <root>/<platform>/.packages/<name>/<fullVersion>.json */
export interface InstallRecord {
  package: string;
  version: PackageVersion;
  installedAt: string;
  prefix: string;
  manifest: string;
  fsEntries: string[];
  stats: InstallStats;
}

// Command result types

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types

export class LpkgmError extends Error {
  public code: string;
  public details?: Record<string, unknown>;
  public exitCode: ExitCode;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    exitCode: ExitCode = EXIT_CODES.FAILURE
  ) {
    super(message);
    this.name = 'LpkgmError';
    this.code = code;
    this.details = details;
    this.exitCode = exitCode;
  }
}

export enum ErrorCodes {
  BUILD_FAILED = 'BUILD_FAILED',
  COLLISION_DETECTED = 'COLLISION_DETECTED',
  INCOMPLETE_INSTALL = 'INCOMPLETE_INSTALL',
  PROBE_CLEANUP_FAILED = 'PROBE_CLEANUP_FAILED',
  PREFIX_LOCKED = 'PREFIX_LOCKED',
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  ALREADY_INSTALLED = 'ALREADY_INSTALLED',
  VERSION_PARSE_ERROR = 'VERSION_PARSE_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
