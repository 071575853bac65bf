/**
 * Version Key Utilities
 *
 * Formats, parses and validates the {version}-{buildType} keys that name
 * installation directories. Keys compare by exact string match only.
 */

import { BUILD_TYPES, DEFAULT_BUILD_TYPE, fail, ok } from './types.js';
import type { BuildType, Outcome, VersionKey } from './types.js';
import { InvalidArgumentError } from './errors.js';

/**
 * Accepted version tokens. No path separators, no leading dot or dash.
 */
export const VERSION_TOKEN_PATTERN = /^[0-9A-Za-z][0-9A-Za-z._+-]*$/;

/**
 * Check whether a string is one of the known build types.
 */
export function isBuildType(value: string): value is BuildType {
  return BUILD_TYPES.some((buildType) => buildType === value);
}

/**
 * Format a key as its installation directory name.
 *
 * @returns {version}-{buildType}
 */
export function formatKey(key: VersionKey): string {
  return `${key.version}-${key.buildType}`;
}

export function keysEqual(a: VersionKey, b: VersionKey): boolean {
  return a.version === b.version && a.buildType === b.buildType;
}

/**
 * Parse an installation directory name back into a key.
 *
 * The build type is everything after the last hyphen, so versions that
 * contain hyphens themselves (e.g. "10.0.0-rc1") still round-trip.
 *
 * @param name - Directory name such as "9.0.0-Release"
 * @returns Parsed key or null if the name doesn't follow the pattern
 */
export function parseKeyName(name: string): VersionKey | null {
  const separator = name.lastIndexOf('-');
  if (separator <= 0) {
    return null;
  }
  const version = name.slice(0, separator);
  const buildType = name.slice(separator + 1);
  if (!VERSION_TOKEN_PATTERN.test(version) || !isBuildType(buildType)) {
    return null;
  }
  return { version, buildType };
}

/**
 * Build a key from command-line tokens.
 *
 * @param version - Version argument, possibly missing
 * @param buildType - Build type argument; defaults to Release when missing
 */
export function parseVersionKey(
  version: string | undefined,
  buildType: string | undefined
): Outcome<VersionKey, InvalidArgumentError> {
  if (version === undefined || version.trim() === '') {
    return fail(
      new InvalidArgumentError(
        'You must specify a library version',
        'Usage: llvmswitch VERSION [BUILDTYPE]'
      )
    );
  }

  if (!VERSION_TOKEN_PATTERN.test(version)) {
    return fail(
      new InvalidArgumentError(
        `Invalid version "${version}"`,
        'Versions may contain letters, digits, ".", "_", "+" and "-", and must start with a letter or digit.'
      )
    );
  }

  const type = buildType ?? DEFAULT_BUILD_TYPE;
  if (!isBuildType(type)) {
    return fail(InvalidArgumentError.unknownBuildType(type));
  }

  return ok({ version, buildType: type });
}
