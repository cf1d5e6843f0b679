import { dirname, extname, resolve } from 'path';
import * as yaml from 'js-yaml';
import type { BuildCommand, BuildDefinition, LpkgmSettings, PackageDefinition } from '../types/index.js';
import { ENV_VARS, FILE_PATTERNS, PLATFORM_DEFINITION } from '../constants/index.js';
import { exists, readJsonOrJsoncFile, readTextFile } from '../utils/fs.js';
import { expandEnvironment, expandTemplate, resolveDefinitions } from '../utils/definitions.js';
import { ConfigError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Settings file loading and validation.
 * Supports JSON, JSONC and YAML formats.
 */

export interface LoadSettingsOptions {
  /** Definitions from the command line; they override the file's */
  overrides?: Record<string, string>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Settings path priority: explicit option, then $LPKGM_SETTINGS, then
 * ./lpkgm-settings.json. Relative paths resolve against `cwd`.
 */
export function resolveSettingsPath(
  option: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string {
  const candidate = option ?? env[ENV_VARS.SETTINGS] ?? FILE_PATTERNS.DEFAULT_SETTINGS;
  return resolve(cwd, candidate);
}

/**
 * Read the raw (unvalidated) settings document
 */
async function readSettingsDocument(settingsPath: string): Promise<unknown> {
  const ext = extname(settingsPath).toLowerCase();
  if (ext === '.yml' || ext === '.yaml') {
    const content = await readTextFile(settingsPath);
    try {
      return yaml.load(content);
    } catch (error) {
      throw new ConfigError(`Failed to parse settings file ${settingsPath}: ${describeError(error)}`, { settingsPath });
    }
  }
  return readJsonOrJsoncFile(settingsPath);
}

/**
 * Load, validate and expand the settings file.
 */
export async function loadSettings(settingsPath: string, options: LoadSettingsOptions = {}): Promise<LpkgmSettings> {
  const env = options.env ?? process.env;

  if (!(await exists(settingsPath))) {
    throw new ConfigError(`Settings file not found: "${settingsPath}"`, { settingsPath });
  }

  logger.debug(`Loading settings from: ${settingsPath}`);
  const document = await readSettingsDocument(settingsPath);
  const raw = validateSettings(document, settingsPath);

  const definitions = resolveDefinitions(
    {
      pwd: options.cwd ?? process.cwd(),
      settingsDir: dirname(settingsPath),
      ...raw.definitions,
      ...(options.overrides ?? {})
    },
    env
  );

  const expandPath = (value: string, key: string): string =>
    resolve(dirname(settingsPath), expandEnvironment(expandTemplate(value, definitions, { strict: true, context: key }), env));

  const root = expandPath(raw.root, 'root');
  const settings: LpkgmSettings = {
    root,
    definitions: { ...definitions, root },
    packages: raw.packages
  };
  if (raw['tmp-dir-prefix'] !== undefined) {
    settings['tmp-dir-prefix'] = expandPath(raw['tmp-dir-prefix'], 'tmp-dir-prefix');
  }
  if (raw['log-dir'] !== undefined) {
    settings['log-dir'] = expandPath(raw['log-dir'], 'log-dir');
  }

  const packageCount = Object.keys(settings.packages).length;
  if (packageCount === 0) {
    logger.warn('No package descriptions loaded.');
  } else {
    logger.info(`${packageCount} package(s) known overall.`);
  }

  return settings;
}

/**
 * The platform to operate on, or undefined when none is defined
 */
export function getSelectedPlatform(settings: LpkgmSettings): string | undefined {
  const platform = settings.definitions[PLATFORM_DEFINITION];
  return platform ? platform : undefined;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(settingsPath: string, key: string, expectation: string): never {
  throw new ConfigError(`Invalid settings file ${settingsPath}: "${key}" ${expectation}`, { settingsPath, key });
}

function readStringMap(value: unknown, settingsPath: string, key: string): Record<string, string> {
  if (value === undefined) return {};
  if (!isRecord(value)) fail(settingsPath, key, 'must be an object of strings');
  const result: Record<string, string> = {};
  for (const [entryKey, entryValue] of Object.entries(value)) {
    if (typeof entryValue === 'number' || typeof entryValue === 'boolean') {
      result[entryKey] = String(entryValue);
    } else if (typeof entryValue === 'string') {
      result[entryKey] = entryValue;
    } else {
      fail(settingsPath, `${key}.${entryKey}`, 'must be a string');
    }
  }
  return result;
}

function readStringArray(value: unknown, settingsPath: string, key: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    fail(settingsPath, key, 'must be an array of strings');
  }
  return value;
}

function readOptionalString(value: unknown, settingsPath: string, key: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') fail(settingsPath, key, 'must be a string');
  return value;
}

function readBuildCommand(value: unknown, settingsPath: string, key: string): BuildCommand {
  if (typeof value === 'string') return value;
  const argv = readStringArray(value, settingsPath, key);
  if (argv.length === 0) fail(settingsPath, key, 'must not be empty');
  return argv;
}

function readBuildDefinition(value: unknown, settingsPath: string, key: string): BuildDefinition {
  if (!isRecord(value)) fail(settingsPath, key, 'must be an object');
  if (!Array.isArray(value.commands) || value.commands.length === 0) {
    fail(settingsPath, `${key}.commands`, 'must be a non-empty array');
  }
  const build: BuildDefinition = {
    commands: value.commands.map((command: unknown, index: number) =>
      readBuildCommand(command, settingsPath, `${key}.commands[${index}]`))
  };
  if (value.env !== undefined) build.env = readStringMap(value.env, settingsPath, `${key}.env`);
  if (value.config !== undefined) build.config = readStringMap(value.config, settingsPath, `${key}.config`);
  return build;
}

function readVersions(value: unknown, settingsPath: string, key: string): PackageDefinition['versions'] {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return readStringArray(value, settingsPath, key);
  if (!isRecord(value)) fail(settingsPath, key, 'must be an array or an object of arrays');
  const result: Record<string, string[]> = {};
  for (const [platformPattern, versions] of Object.entries(value)) {
    result[platformPattern] = readStringArray(versions, settingsPath, `${key}.${platformPattern}`);
  }
  return result;
}

function readPackageDefinition(value: unknown, settingsPath: string, name: string): PackageDefinition {
  const key = `packages.${name}`;
  if (!isRecord(value)) fail(settingsPath, key, 'must be an object');

  const versionRegex = readStringArray(value['version-regex'], settingsPath, `${key}.version-regex`);
  for (const expression of versionRegex) {
    try {
      new RegExp(expression);
    } catch (error) {
      fail(settingsPath, `${key}.version-regex`, `contains an invalid expression "${expression}": ${describeError(error)}`);
    }
  }

  const source = readOptionalString(value.source, settingsPath, `${key}.source`);
  if (source === undefined) fail(settingsPath, `${key}.source`, 'is required');

  const definition: PackageDefinition = {
    'version-regex': versionRegex,
    source,
    build: readBuildDefinition(value.build, settingsPath, `${key}.build`)
  };

  if (value['default-version-values'] !== undefined) {
    definition['default-version-values'] = readStringMap(
      value['default-version-values'], settingsPath, `${key}.default-version-values`
    );
  }
  const versions = readVersions(value.versions, settingsPath, `${key}.versions`);
  if (versions !== undefined) definition.versions = versions;
  const prefix = readOptionalString(value.prefix, settingsPath, `${key}.prefix`);
  if (prefix !== undefined) definition.prefix = prefix;

  return definition;
}

/**
 * Check the shape of a parsed settings document.
 */
export function validateSettings(document: unknown, settingsPath: string): LpkgmSettings {
  if (!isRecord(document)) {
    throw new ConfigError(`Invalid settings file ${settingsPath}: expected an object at top level`, { settingsPath });
  }

  const root = readOptionalString(document.root, settingsPath, 'root');
  if (root === undefined) fail(settingsPath, 'root', 'is required');

  const packagesValue = document.packages ?? {};
  if (!isRecord(packagesValue)) fail(settingsPath, 'packages', 'must be an object keyed by package name');
  const packages: Record<string, PackageDefinition> = {};
  for (const [name, definition] of Object.entries(packagesValue)) {
    packages[name] = readPackageDefinition(definition, settingsPath, name);
  }

  const settings: LpkgmSettings = {
    root,
    definitions: readStringMap(document.definitions, settingsPath, 'definitions'),
    packages
  };
  const tmpDirPrefix = readOptionalString(document['tmp-dir-prefix'], settingsPath, 'tmp-dir-prefix');
  if (tmpDirPrefix !== undefined) settings['tmp-dir-prefix'] = tmpDirPrefix;
  const logDir = readOptionalString(document['log-dir'], settingsPath, 'log-dir');
  if (logDir !== undefined) settings['log-dir'] = logDir;

  return settings;
}
