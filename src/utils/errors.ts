import { LpkgmError, ErrorCodes, CommandResult } from '../types/index.js';
import { EXIT_CODES, type ExitCode } from '../constants/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the lpkgm CLI.
 *
 * The first four mirror the install transaction taxonomy; each carries the
 * stable exit code the CLI terminates with.
 */

export type BuildPhase = 'discovery' | 'commit';

export class BuildFailedError extends LpkgmError {
  public readonly phase: BuildPhase;
  public readonly exitStatus?: number;

  constructor(
    message: string,
    details: { phase: BuildPhase; exitStatus?: number; command?: string; outputTail?: string[] }
  ) {
    const suffix = details.phase === 'commit'
      ? ' (commit phase: the prefix may be partially populated)'
      : '';
    super(`Build failed: ${message}${suffix}`, ErrorCodes.BUILD_FAILED, details, EXIT_CODES.BUILD_FAILED);
    this.name = 'BuildFailedError';
    this.phase = details.phase;
    this.exitStatus = details.exitStatus;
  }
}

export class CollisionDetectedError extends LpkgmError {
  /** First colliding absolute path */
  public readonly path: string;
  /** Every colliding absolute path, in footprint order */
  public readonly paths: readonly string[];

  constructor(paths: readonly string[]) {
    const [first = ''] = paths;
    const more = paths.length > 1 ? ` (and ${paths.length - 1} more)` : '';
    super(
      `Collision detected: file ${first} already exists (refusing overwrite)${more}` +
        (paths.length > 1 ? `\n${paths.map(p => `  ${p}`).join('\n')}` : ''),
      ErrorCodes.COLLISION_DETECTED,
      { paths: [...paths] },
      EXIT_CODES.COLLISION_DETECTED
    );
    this.name = 'CollisionDetectedError';
    this.path = first;
    this.paths = paths;
  }
}

export class IncompleteInstallError extends LpkgmError {
  public readonly path: string;

  constructor(path: string, prefix: string) {
    super(
      `Incomplete install: file ${path} does not exist or is not a file (assumed to be installed). ` +
        `Prefix ${prefix} is partially populated and needs manual cleanup.`,
      ErrorCodes.INCOMPLETE_INSTALL,
      { path, prefix },
      EXIT_CODES.INCOMPLETE_INSTALL
    );
    this.name = 'IncompleteInstallError';
    this.path = path;
  }
}

/**
 * Never thrown out of a transaction: the probe directory is gone from the
 * install's point of view, so this is reported as a warning.
 */
export class ProbeCleanupFailedError extends LpkgmError {
  constructor(probeDir: string, cause: unknown) {
    super(`Failed to remove probe directory ${probeDir}`, ErrorCodes.PROBE_CLEANUP_FAILED, { probeDir, cause });
    this.name = 'ProbeCleanupFailedError';
  }
}

export class PrefixLockedError extends LpkgmError {
  constructor(lockPath: string, holder?: string) {
    super(
      `Prefix is locked by another transaction (${lockPath}${holder ? `, held by ${holder}` : ''}). ` +
        'A lock whose holder died is taken over once it goes stale.',
      ErrorCodes.PREFIX_LOCKED,
      { lockPath, holder },
      EXIT_CODES.PREFIX_LOCKED
    );
    this.name = 'PrefixLockedError';
  }
}

export class PackageNotFoundError extends LpkgmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.PACKAGE_NOT_FOUND, details);
    this.name = 'PackageNotFoundError';
  }
}

export class AlreadyInstalledError extends LpkgmError {
  constructor(packageName: string, version: string, recordPath: string) {
    super(
      `Package "${packageName}" of version "${version}" installed (file ${recordPath} exists).`,
      ErrorCodes.ALREADY_INSTALLED,
      { packageName, version, recordPath }
    );
    this.name = 'AlreadyInstalledError';
  }
}

export class VersionParseError extends LpkgmError {
  constructor(packageName: string, version: string, expressions: readonly string[]) {
    super(
      `Failed to parse version expression "${version}" with any of the version parsing expression(s) ` +
        `specified for package "${packageName}":\n${expressions.map(e => `    ${e}`).join('\n')}\n` +
        'Please check the version expression or correct the settings file.',
      ErrorCodes.VERSION_PARSE_ERROR,
      { packageName, version, expressions: [...expressions] }
    );
    this.name = 'VersionParseError';
  }
}

export class FileSystemError extends LpkgmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends LpkgmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends LpkgmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Node reports failed syscalls as errors carrying a string `code`.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult & { exitCode: ExitCode } {
  if (error instanceof LpkgmError) {
    // Surface details only in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message,
      exitCode: error.exitCode
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message,
      exitCode: EXIT_CODES.FAILURE
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred',
      exitCode: EXIT_CODES.FAILURE
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      // Handle user cancellation gracefully - just exit without error message
      if (error instanceof UserCancellationError) {
        process.exit(EXIT_CODES.SUCCESS);
        return;
      }

      const result = handleError(error);
      console.error(`❌ ${result.error}`);
      process.exit(result.exitCode);
    }
  };
}
