/**
 * Command Build Driver
 *
 * Runs a package's configured build commands in the source directory.
 * String commands go through the shell; argv arrays are spawned directly.
 * Every argument is a template over the package variables, the build
 * configuration, `{installRoot}` and `{sourceDir}`.
 */

import { spawn } from 'child_process';
import { createWriteStream, type WriteStream } from 'fs';
import { finished } from 'stream/promises';
import { join } from 'path';
import type { BuildCommand } from '../../types/index.js';
import type { BuildDriver, BuildInvocation } from './build-driver.js';
import { BUILD_OUTPUT_TAIL_LINES, ENV_VARS } from '../../constants/index.js';
import { expandTemplate, type TemplateVariables } from '../../utils/definitions.js';
import { ensureDir } from '../../utils/fs.js';
import { BuildFailedError, FileSystemError, describeError, type BuildPhase } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface CommandBuildDriverOptions {
  commands: readonly BuildCommand[];
  /** Extra environment, values are templates */
  env?: Readonly<Record<string, string>>;
  /** Package variables (definitions, version attributes, package name) */
  variables?: TemplateVariables;
  /** Exposed to commands as $LPKGM_PLATFORM */
  platform?: string;
  /** When set, each phase's output is appended to `<logDir>/<logName>-<phase>.log` */
  logDir?: string;
  logName?: string;
  /** Trailing output lines kept on the error of a failed command */
  outputTailLines?: number;
}

interface CommandOutcome {
  exitStatus: number | null;
  signal: NodeJS.Signals | null;
  /** Last output lines, at most `outputTailLines` */
  tail: string[];
}

interface BuildLog {
  path: string;
  stream: WriteStream;
}

function describeCommand(command: BuildCommand): string {
  return typeof command === 'string' ? command : command.join(' ');
}

async function closeLog(log: BuildLog | undefined): Promise<void> {
  if (!log) return;
  log.stream.end();
  try {
    await finished(log.stream);
  } catch (error) {
    throw new FileSystemError(`Failed to write build log: ${log.path}`, { path: log.path, error });
  }
}

export class CommandBuildDriver implements BuildDriver {
  private readonly options: CommandBuildDriverOptions;

  constructor(options: CommandBuildDriverOptions) {
    if (options.commands.length === 0) {
      throw new Error('CommandBuildDriver needs at least one command');
    }
    this.options = options;
  }

  async install(invocation: BuildInvocation): Promise<void> {
    const { sourceDir, installRoot, config, phase } = invocation;
    const variables: TemplateVariables = {
      ...(this.options.variables ?? {}),
      ...config,
      installRoot,
      sourceDir
    };
    const env = this.buildEnvironment(variables, invocation);

    for (const command of this.options.commands) {
      const expanded = this.expandCommand(command, variables);
      const display = describeCommand(expanded);
      logger.info(`${sourceDir} $ ${display}`);

      const log = await this.openLog(phase, display);
      let outcome: CommandOutcome;
      try {
        outcome = await this.runCommand(expanded, sourceDir, env, line => log?.stream.write(`${line}\n`));
      } catch (error) {
        throw new BuildFailedError(`could not run "${display}": ${describeError(error)}`, {
          phase,
          command: display
        });
      } finally {
        await closeLog(log);
      }

      if (outcome.exitStatus !== 0) {
        const status = outcome.signal
          ? `killed by ${outcome.signal}`
          : `exit code ${outcome.exitStatus ?? 'unknown'}`;
        logger.error(`Build command failed (${status}): ${display}`);
        throw new BuildFailedError(`"${display}" failed with ${status}`, {
          phase,
          command: display,
          exitStatus: outcome.exitStatus ?? undefined,
          outputTail: outcome.tail
        });
      }
    }
  }

  private expandCommand(command: BuildCommand, variables: TemplateVariables): BuildCommand {
    const expand = (value: string): string =>
      expandTemplate(value, variables, { strict: true, context: 'build command' });
    return typeof command === 'string' ? expand(command) : command.map(expand);
  }

  private buildEnvironment(variables: TemplateVariables, invocation: BuildInvocation): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...process.env };
    for (const [key, value] of Object.entries(this.options.env ?? {})) {
      env[key] = expandTemplate(value, variables, { strict: true, context: `build environment ${key}` });
    }
    env[ENV_VARS.INSTALL_ROOT] = invocation.installRoot;
    env[ENV_VARS.SOURCE_DIR] = invocation.sourceDir;
    env[ENV_VARS.BUILD_PHASE] = invocation.phase;
    if (this.options.platform) {
      env[ENV_VARS.PLATFORM] = this.options.platform;
    }
    return env;
  }

  private runCommand(
    command: BuildCommand,
    cwd: string,
    env: NodeJS.ProcessEnv,
    onLine: (line: string) => void
  ): Promise<CommandOutcome> {
    const tailLines = this.options.outputTailLines ?? BUILD_OUTPUT_TAIL_LINES;
    return new Promise((resolvePromise, rejectPromise) => {
      const child = typeof command === 'string'
        ? spawn(command, { cwd, env, shell: true, stdio: ['ignore', 'pipe', 'pipe'] })
        : spawn(command[0] ?? '', command.slice(1), { cwd, env, stdio: ['ignore', 'pipe', 'pipe'] });

      const tail: string[] = [];
      const pending = { stdout: '', stderr: '' };
      const emit = (stream: 'stdout' | 'stderr', line: string): void => {
        tail.push(line);
        if (tail.length > tailLines) {
          tail.shift();
        }
        onLine(line);
        logger.debug(`[${stream}] ${line}`);
      };
      const collect = (stream: 'stdout' | 'stderr', chunk: string): void => {
        const lines = (pending[stream] + chunk).split('\n');
        pending[stream] = lines.pop() ?? '';
        for (const line of lines) {
          emit(stream, line);
        }
      };
      const flush = (): void => {
        for (const stream of ['stdout', 'stderr'] as const) {
          if (pending[stream]) {
            emit(stream, pending[stream]);
            pending[stream] = '';
          }
        }
      };

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => collect('stdout', chunk));
      child.stderr.on('data', (chunk: string) => collect('stderr', chunk));
      child.once('error', rejectPromise);
      child.once('close', (exitStatus: number | null, signal: NodeJS.Signals | null) => {
        flush();
        resolvePromise({ exitStatus, signal, tail });
      });
    });
  }

  /** Appends to `<logDir>/<logName>-<phase>.log` as output arrives */
  private async openLog(phase: BuildPhase, display: string): Promise<BuildLog | undefined> {
    const { logDir, logName } = this.options;
    if (!logDir || !logName) {
      return undefined;
    }
    await ensureDir(logDir);
    const path = join(logDir, `${logName}-${phase}.log`);
    const stream = createWriteStream(path, { flags: 'a', encoding: 'utf8' });
    stream.on('error', error => logger.debug(`Build log ${path} failed: ${error.message}`));
    stream.write(`$ ${display}\n`);
    return { path, stream };
  }
}
