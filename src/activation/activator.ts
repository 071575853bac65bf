/**
 * Activator
 *
 * Makes one installation the target of the well-known llvm-config
 * location. The platform mechanism (symlink or generated shim) lives in
 * subclasses; replacement is always write-to-temp then rename-over, so a
 * concurrent invoker sees either the old target or the new one.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm } from 'node:fs/promises';
import { basename, dirname, join, relative, sep } from 'node:path';

import { fail, ok } from '../core/types.js';
import type { ActiveState, InstalledVersion, Outcome, VersionKey } from '../core/types.js';
import { parseKeyName } from '../core/version-key.js';
import { NotInstalledError, PermissionDeniedError, isPermissionError } from '../core/errors.js';
import type { InstallationStore } from '../store/store.js';

/**
 * Capability shared by every platform variant
 */
export interface Activator {
  /** Fixed location of the redirection artifact */
  readonly linkPath: string;

  activate(
    key: VersionKey
  ): Promise<Outcome<InstalledVersion, NotInstalledError | PermissionDeniedError>>;

  currentActive(): Promise<ActiveState>;
}

export abstract class RedirectionActivator implements Activator {
  constructor(
    protected readonly store: InstallationStore,
    readonly linkPath: string
  ) {}

  /**
   * Create the artifact for `executable` at `tempPath`.
   */
  protected abstract writeArtifact(tempPath: string, executable: string): Promise<void>;

  /**
   * Read the executable path the current artifact redirects to.
   *
   * @returns The target, null when no artifact exists, or undefined when
   *   something exists but isn't an artifact this variant recognizes
   */
  protected abstract readTarget(): Promise<string | null | undefined>;

  async activate(
    key: VersionKey
  ): Promise<Outcome<InstalledVersion, NotInstalledError | PermissionDeniedError>> {
    const installed = await this.store.get(key);
    if (!installed) {
      return fail(new NotInstalledError(key));
    }

    const tempPath = join(
      dirname(this.linkPath),
      `.${basename(this.linkPath)}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`
    );

    try {
      await mkdir(dirname(this.linkPath), { recursive: true });
      await this.writeArtifact(tempPath, installed.queryExecutable);
      await rename(tempPath, this.linkPath);
    } catch (error) {
      await rm(tempPath, { force: true });
      if (isPermissionError(error)) {
        return fail(
          new PermissionDeniedError(`Permission denied writing ${this.linkPath}`, this.linkPath)
        );
      }
      throw error;
    }

    return ok(installed);
  }

  async currentActive(): Promise<ActiveState> {
    const target = await this.readTarget();
    if (target === null) {
      return { kind: 'none' };
    }
    if (target === undefined) {
      return { kind: 'unmanaged', target: this.linkPath };
    }

    const key = this.keyForTarget(target);
    if (!key) {
      return { kind: 'unmanaged', target };
    }
    if (await this.store.exists(key)) {
      return { kind: 'active', key, target };
    }
    return { kind: 'dangling', key, target };
  }

  /**
   * Map root/{version}-{buildType}/bin/<exe> back to its key.
   */
  private keyForTarget(target: string): VersionKey | null {
    const parts = relative(this.store.root, target).split(sep);
    if (parts.length !== 3) {
      return null;
    }
    const [name, bin, executable] = parts;
    if (name === undefined || bin !== 'bin' || executable !== this.store.queryExecutableName) {
      return null;
    }
    return parseKeyName(name);
  }
}
