/**
 * Symlink Activator (macOS, Linux)
 *
 * The well-known llvm-config path is a symlink to the selected
 * installation's bin/llvm-config.
 */

import { readlink, symlink } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { RedirectionActivator } from './activator.js';

export class SymlinkActivator extends RedirectionActivator {
  protected async writeArtifact(tempPath: string, executable: string): Promise<void> {
    await symlink(executable, tempPath);
  }

  protected async readTarget(): Promise<string | null | undefined> {
    try {
      const target = await readlink(this.linkPath);
      return resolve(dirname(this.linkPath), target);
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        return null;
      }
      // EINVAL: a regular file sits where the symlink belongs
      if (err.code === 'EINVAL') {
        return undefined;
      }
      throw err;
    }
  }
}
