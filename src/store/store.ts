/**
 * Installation Store
 *
 * Single source of truth for which library versions are installed and
 * where they live. Each installation is a {version}-{buildType}
 * directory under the versions root.
 */

import { access, constants, mkdir, readdir, rm, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { fail, ok } from '../core/types.js';
import type { InstalledVersion, Outcome, VersionKey } from '../core/types.js';
import { formatKey, parseKeyName } from '../core/version-key.js';
import { NotInstalledError, PermissionDeniedError, isPermissionError } from '../core/errors.js';

/**
 * Options for constructing an InstallationStore
 */
export interface InstallationStoreOptions {
  /** Directory holding one subdirectory per installed version */
  root: string;
  /** File name of the configuration-query executable inside bin/ */
  queryExecutable: string;
}

export class InstallationStore {
  readonly root: string;
  readonly queryExecutableName: string;

  constructor(options: InstallationStoreOptions) {
    this.root = resolve(options.root);
    this.queryExecutableName = options.queryExecutable;
  }

  /**
   * List every valid installation, ordered by directory name.
   *
   * Entries that don't parse as a key or don't satisfy the layout
   * invariant are left out; a missing versions root lists nothing.
   */
  async list(): Promise<InstalledVersion[]> {
    let names: string[];
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      names = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT' || err.code === 'ENOTDIR') {
        return [];
      }
      throw err;
    }

    names.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    const versions: InstalledVersion[] = [];
    for (const name of names) {
      const key = parseKeyName(name);
      if (key && (await this.exists(key))) {
        versions.push(this.describe(key));
      }
    }
    return versions;
  }

  /**
   * Resolve the installation root for a key. Does not touch the filesystem.
   */
  resolvePath(key: VersionKey): string {
    return join(this.root, formatKey(key));
  }

  /**
   * Resolve the configuration-query executable for a key.
   */
  resolveQueryExecutable(key: VersionKey): string {
    return join(this.resolvePath(key), 'bin', this.queryExecutableName);
  }

  /**
   * Check the layout invariant: root/bin/<query executable> is a file.
   */
  async exists(key: VersionKey): Promise<boolean> {
    try {
      const info = await stat(this.resolveQueryExecutable(key));
      return info.isFile();
    } catch {
      return false;
    }
  }

  /**
   * Get an installation if it is present and valid.
   */
  async get(key: VersionKey): Promise<InstalledVersion | undefined> {
    if (!(await this.exists(key))) {
      return undefined;
    }
    return this.describe(key);
  }

  /**
   * Create the versions root if needed and check that it can be written.
   *
   * @returns PermissionDenied when the root can't be created or written
   * @throws Other filesystem errors, e.g. when the root is a regular file
   */
  async ensureWritable(): Promise<Outcome<void, PermissionDeniedError>> {
    try {
      await mkdir(this.root, { recursive: true });
      await access(this.root, constants.W_OK);
    } catch (error) {
      if (isPermissionError(error)) {
        return fail(new PermissionDeniedError(`Permission denied writing ${this.root}`, this.root));
      }
      throw error;
    }
    return ok(undefined);
  }

  /**
   * Recursively delete an installation.
   *
   * Leaves the active link alone even when it points at this version.
   *
   * @returns The removed installation, NotInstalled if it wasn't valid,
   *   or PermissionDenied if the directory couldn't be deleted
   */
  async remove(
    key: VersionKey
  ): Promise<Outcome<InstalledVersion, NotInstalledError | PermissionDeniedError>> {
    const installed = await this.get(key);
    if (!installed) {
      return fail(new NotInstalledError(key));
    }

    try {
      await rm(installed.root, { recursive: true, force: true });
    } catch (error) {
      if (isPermissionError(error)) {
        return fail(
          new PermissionDeniedError(`Permission denied removing ${installed.root}`, installed.root)
        );
      }
      throw error;
    }

    return ok(installed);
  }

  private describe(key: VersionKey): InstalledVersion {
    return {
      key,
      name: formatKey(key),
      root: this.resolvePath(key),
      queryExecutable: this.resolveQueryExecutable(key),
    };
  }
}
