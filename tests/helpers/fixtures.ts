/**
 * Test fixtures: temp directories and fake installations.
 */

import { chmod, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import type { VersionKey } from '../../src/core/types.js';

/**
 * Create a unique temp directory.
 */
export async function createTempDir(label: string): Promise<string> {
  const dir = join(tmpdir(), `llvmswitch-${label}-${randomUUID()}`);
  await mkdir(dir, { recursive: true });
  return dir;
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Script standing in for llvm-config: prints the version, or echoes its
 * arguments after the version when given any.
 */
export function fakeQueryScript(version: string): string {
  return `#!/bin/sh\nif [ "$#" -eq 0 ]; then echo "${version}"; else echo "${version} $*"; fi\n`;
}

/**
 * Lay out root/{version}-{buildType}/bin/<executable> with a runnable script.
 *
 * @returns Path of the fake executable
 */
export async function createFakeInstall(
  versionsRoot: string,
  key: VersionKey,
  executable = 'llvm-config'
): Promise<string> {
  const binDir = join(versionsRoot, `${key.version}-${key.buildType}`, 'bin');
  await mkdir(binDir, { recursive: true });
  const path = join(binDir, executable);
  await writeFile(path, fakeQueryScript(key.version), 'utf-8');
  await chmod(path, 0o755);
  return path;
}
