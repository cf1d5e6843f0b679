import { ConfigError, ValidationError } from './errors.js';

/**
 * String-format definitions.
 *
 * Templates reference values as `{name}`; `{{` and `}}` produce literal
 * braces. Environment variables are written `$VAR` or `${VAR}` and expand
 * like a shell would, except that unset variables are left as written.
 */

export type TemplateVariables = Readonly<Record<string, string>>;

const PLACEHOLDER_PATTERN = /\{\{|\}\}|\{([A-Za-z_][\w.-]*)\}/g;
const ENV_PATTERN = /\$(?:\{([A-Za-z_]\w*)\}|([A-Za-z_]\w*))/g;

export interface ExpandOptions {
  /** Throw on an unknown placeholder instead of leaving it in place */
  strict?: boolean;
  /** Label used in error messages */
  context?: string;
}

/**
 * Substitute `{name}` placeholders from `variables`.
 */
export function expandTemplate(
  template: string,
  variables: TemplateVariables,
  options: ExpandOptions = {}
): string {
  return template.replace(PLACEHOLDER_PATTERN, (match: string, name: string | undefined) => {
    if (match === '{{') return '{';
    if (match === '}}') return '}';
    if (name !== undefined && Object.prototype.hasOwnProperty.call(variables, name)) {
      return variables[name] ?? match;
    }
    if (options.strict) {
      throw new ConfigError(
        `Unknown definition "{${name}}" in ${options.context ?? 'template'} "${template}"`,
        { template, name }
      );
    }
    return match;
  });
}

/**
 * Expand `$VAR` and `${VAR}` references from `env`; unset variables stay as written.
 */
export function expandEnvironment(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(ENV_PATTERN, (match: string, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare;
    const resolved = name !== undefined ? env[name] : undefined;
    return resolved ?? match;
  });
}

/**
 * Resolve definitions that reference each other until nothing changes.
 *
 * Environment variables are expanded once per value before substitution.
 * Placeholders naming something that is not a definition are kept, so that
 * values such as `{fullVersion}` survive until install time.
 */
export function resolveDefinitions(
  definitions: Readonly<Record<string, string>>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [key, value] of Object.entries(definitions)) {
    resolved[key] = expandEnvironment(value, env);
  }

  const maxPasses = Object.keys(resolved).length + 1;
  for (let pass = 0; pass <= maxPasses; pass++) {
    let changed = false;
    for (const [key, value] of Object.entries(resolved)) {
      const next = expandTemplate(value, resolved);
      if (next !== value) {
        resolved[key] = next;
        changed = true;
      }
    }
    if (!changed) {
      break;
    }
  }

  // At a fixed point, a placeholder that still names a definition is a cycle
  const unresolved = Object.entries(resolved)
    .filter(([, value]) => referencedNames(value).some(name => Object.prototype.hasOwnProperty.call(resolved, name)))
    .map(([key]) => key);
  if (unresolved.length > 0) {
    throw new ConfigError(`Definitions reference each other in a cycle: ${unresolved.join(', ')}`, { unresolved });
  }
  return resolved;
}

function referencedNames(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    if (match[1] !== undefined) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Parse `key=value` entries given with `-D/--define`.
 * Only the first `=` separates key from value.
 */
export function parseDefineArguments(entries: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new ValidationError(`Definition "${entry}" must have the form key=value`, { entry });
    }
    result[entry.slice(0, separator)] = entry.slice(separator + 1);
  }
  return result;
}
