/**
 * Core Types for llvmswitch
 *
 * Version keys, installed versions, activation state and the outcome type
 * every component operation returns.
 */

/**
 * CMake build types an installation can be built with
 */
export const BUILD_TYPES = ['Release', 'Debug', 'RelWithDebInfo', 'MinSizeRel'] as const;

export type BuildType = (typeof BUILD_TYPES)[number];

/**
 * Build type used when none is given on the command line
 */
export const DEFAULT_BUILD_TYPE: BuildType = 'Release';

/**
 * Identifies one installation
 */
export interface VersionKey {
  /** Release number as typed by the user, e.g. "9.0.0" */
  version: string;
  buildType: BuildType;
}

/**
 * An installation that satisfies the layout invariant
 */
export interface InstalledVersion {
  key: VersionKey;
  /** Directory name: {version}-{buildType} */
  name: string;
  /** Absolute installation root */
  root: string;
  /** Absolute path to root/bin/<query executable> */
  queryExecutable: string;
}

/**
 * Request to build and install a version
 */
export interface BuildRequest {
  key: VersionKey;
  /** Overrides where the fetcher downloads sources from */
  sourceArchiveLocation?: string;
}

/**
 * State of the redirection artifact as seen by currentActive()
 */
export type ActiveState =
  | { kind: 'none' }
  | { kind: 'active'; key: VersionKey; target: string }
  | { kind: 'dangling'; key: VersionKey; target: string }
  | { kind: 'unmanaged'; target: string };

/**
 * Result of a component operation: a value, or a typed failure
 */
export type Outcome<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
