/**
 * Shim Activator (Windows)
 *
 * Windows symlinks need Developer Mode or elevation, so the well-known
 * location is a generated .cmd script that forwards its arguments to the
 * selected installation's llvm-config.exe. The exit code of the last
 * command is the exit code of the script.
 */

import { readFile, writeFile } from 'node:fs/promises';

import { RedirectionActivator } from './activator.js';

const SHIM_TARGET_PATTERN = /^"([^"]+)" %\*$/m;

/**
 * Render the shim script for an executable.
 */
export function renderShim(executable: string): string {
  return `@echo off\r\n"${executable}" %*\r\n`;
}

/**
 * Extract the executable path from a shim script.
 *
 * @returns The path, or null when the script wasn't generated by renderShim
 */
export function parseShim(content: string): string | null {
  const match = SHIM_TARGET_PATTERN.exec(content.replace(/\r/g, ''));
  return match?.[1] ?? null;
}

export class ShimActivator extends RedirectionActivator {
  protected async writeArtifact(tempPath: string, executable: string): Promise<void> {
    await writeFile(tempPath, renderShim(executable), 'utf-8');
  }

  protected async readTarget(): Promise<string | null | undefined> {
    let content: string;
    try {
      content = await readFile(this.linkPath, 'utf-8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        return null;
      }
      if (err.code === 'EISDIR') {
        return undefined;
      }
      throw err;
    }
    return parseShim(content) ?? undefined;
  }
}
