/**
 * Builder
 *
 * Produces a new installation: fetch sources, build them into the store's
 * destination for the key, then check the result against the layout
 * invariant. A failed build never leaves a destination directory behind,
 * and every failure comes back as an Outcome.
 * The active link is never touched here.
 */

import { rm } from 'node:fs/promises';

import type { SourceBuilder, SourceFetcher } from './collaborators.js';
import {
  AlreadyInstalledError,
  BuildError,
  type FetchError,
  type PermissionDeniedError,
} from './errors.js';
import { fail, ok } from './types.js';
import type { BuildRequest, InstalledVersion, Outcome, VersionKey } from './types.js';
import type { InstallationStore } from '../store/store.js';

export interface InstallOptions {
  /** Discard the fetched source tree afterwards (default: true) */
  cleanup?: boolean;
}

export type InstallFailure =
  | AlreadyInstalledError
  | PermissionDeniedError
  | FetchError
  | BuildError;

/**
 * Progress stages reported while installing
 */
export type InstallStage = 'fetch' | 'build' | 'verify' | 'cleanup';

export interface BuilderOptions {
  store: InstallationStore;
  fetcher: SourceFetcher;
  builder: SourceBuilder;
  onStage?: (stage: InstallStage, request: BuildRequest) => void;
}

export class Builder {
  private readonly store: InstallationStore;
  private readonly fetcher: SourceFetcher;
  private readonly sourceBuilder: SourceBuilder;
  private readonly onStage: ((stage: InstallStage, request: BuildRequest) => void) | undefined;

  constructor(options: BuilderOptions) {
    this.store = options.store;
    this.fetcher = options.fetcher;
    this.sourceBuilder = options.builder;
    this.onStage = options.onStage;
  }

  async install(
    request: BuildRequest,
    options: InstallOptions = {}
  ): Promise<Outcome<InstalledVersion, InstallFailure>> {
    const { key } = request;
    const { cleanup = true } = options;
    const destination = this.store.resolvePath(key);

    // Re-installing requires an explicit remove; the version may be active
    if (await this.store.exists(key)) {
      return fail(new AlreadyInstalledError(key, destination));
    }

    // The versions root must be writable before anything is downloaded
    let writable: Outcome<void, PermissionDeniedError>;
    try {
      writable = await this.store.ensureWritable();
    } catch (error) {
      return fail(unexpectedFailure(error, key, `Cannot prepare ${this.store.root}`));
    }
    if (!writable.ok) {
      return writable;
    }

    this.onStage?.('fetch', request);
    const fetched = await this.fetcher.fetch(key.version, {
      sourceArchiveLocation: request.sourceArchiveLocation,
    });
    if (!fetched.ok) {
      return fetched;
    }

    try {
      this.onStage?.('build', request);
      const built = await this.sourceBuilder.build(fetched.value, key.buildType, destination, key);
      if (!built.ok) {
        await rm(destination, { recursive: true, force: true });
        return built;
      }

      this.onStage?.('verify', request);
      const installed = await this.store.get(key);
      if (!installed) {
        await rm(destination, { recursive: true, force: true });
        return fail(
          new BuildError(
            `The build reported success but ${destination} has no bin/${this.store.queryExecutableName}`,
            key,
            `Check that the build installs ${this.store.queryExecutableName}, then run 'llvmswitch install ${key.version} ${key.buildType}' again.`
          )
        );
      }

      return ok(installed);
    } catch (error) {
      await rm(destination, { recursive: true, force: true });
      return fail(unexpectedFailure(error, key, `Installing ${key.version}-${key.buildType} failed`));
    } finally {
      if (cleanup) {
        this.onStage?.('cleanup', request);
        await this.fetcher.discard(fetched.value);
      }
    }
  }
}

/**
 * Wrap an error thrown by a collaborator or the filesystem.
 */
function unexpectedFailure(error: unknown, key: VersionKey, context: string): BuildError {
  const cause = error instanceof Error ? error : new Error(String(error));
  return new BuildError(`${context}: ${cause.message}`, key, undefined, cause);
}
