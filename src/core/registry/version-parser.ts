import type { PackageDefinition, PackageVersion } from '../../types/index.js';
import { VersionParseError } from '../../utils/errors.js';

/**
 * Parse a version string with the package's `version-regex` list.
 *
 * Expressions are tried in order and must match from the start of the
 * string. Named groups of the first match become version attributes;
 * groups that did not participate fall back to `default-version-values`.
 * `fullVersion` is always the string as given.
 */
export function parsePackageVersion(
  packageName: string,
  versionString: string,
  definition: Pick<PackageDefinition, 'version-regex' | 'default-version-values'>
): PackageVersion {
  const expressions = definition['version-regex'];

  for (const expression of expressions) {
    const match = new RegExp(expression, 'y').exec(versionString);
    if (!match) {
      continue;
    }

    const version: PackageVersion = {
      ...(definition['default-version-values'] ?? {}),
      fullVersion: versionString
    };
    for (const [attribute, value] of Object.entries(match.groups ?? {})) {
      if (value !== undefined) {
        version[attribute] = value;
      }
    }
    version.fullVersion = versionString;
    return version;
  }

  throw new VersionParseError(packageName, versionString, expressions);
}
