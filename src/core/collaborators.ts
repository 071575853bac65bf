/**
 * External Collaborator Contracts
 *
 * The Builder only knows these two interfaces. Downloading, unpacking and
 * compiling belong to the implementations in src/toolchain.
 */

import type { BuildError, FetchError } from './errors.js';
import type { BuildType, Outcome, VersionKey } from './types.js';

export interface FetchOptions {
  /** Overrides the configured download location */
  sourceArchiveLocation?: string;
}

export interface SourceFetcher {
  /**
   * Obtain a source tree for a version.
   *
   * @returns Absolute path of the unpacked source tree
   */
  fetch(version: string, options?: FetchOptions): Promise<Outcome<string, FetchError>>;

  /**
   * Remove everything fetch() left on disk for this source tree.
   */
  discard(sourceTree: string): Promise<void>;
}

export interface SourceBuilder {
  /**
   * Configure, compile and install a source tree into `destination`.
   */
  build(
    sourceTree: string,
    buildType: BuildType,
    destination: string,
    key: VersionKey
  ): Promise<Outcome<void, BuildError>>;
}
