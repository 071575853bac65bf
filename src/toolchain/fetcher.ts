/**
 * Tarball Fetcher
 *
 * Downloads the LLVM, clang and optional runtime source tarballs for a
 * release with curl, unpacks them with tar, and assembles a single source
 * tree with clang under tools/ and the runtimes under projects/.
 */

import { mkdir, mkdtemp, rename, rm } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

import type { FetchOptions, SourceFetcher } from '../core/collaborators.js';
import { FetchError } from '../core/errors.js';
import { fail, ok } from '../core/types.js';
import type { Outcome } from '../core/types.js';
import { CommandError, type CommandRunner } from '../exec/executor.js';
import {
  parseRelease,
  releaseComponents,
  tarballFilename,
  tarballUrl,
  type LlvmRelease,
  type TarballComponent,
} from './release.js';

/**
 * Default release server
 */
export const DEFAULT_DOWNLOAD_BASE_URL = 'https://releases.llvm.org';

/**
 * Where each optional component goes inside the llvm source tree
 */
const COMPONENT_DESTINATIONS: Record<Exclude<TarballComponent, 'llvm'>, string> = {
  clang: join('tools', 'clang'),
  'compiler-rt': join('projects', 'compiler-rt'),
  libcxx: join('projects', 'libcxx'),
};

export interface TarballFetcherOptions {
  runner: CommandRunner;
  /** Scratch directory; each fetch gets its own subdirectory */
  workDir: string;
  platform?: NodeJS.Platform;
  downloadBaseUrl?: string;
  /** Stream curl/tar output to the terminal */
  showProgress?: boolean;
}

export class TarballFetcher implements SourceFetcher {
  private readonly runner: CommandRunner;
  private readonly workDir: string;
  private readonly platform: NodeJS.Platform;
  private readonly downloadBaseUrl: string;
  private readonly showProgress: boolean;

  constructor(options: TarballFetcherOptions) {
    this.runner = options.runner;
    this.workDir = resolve(options.workDir);
    this.platform = options.platform ?? process.platform;
    this.downloadBaseUrl = options.downloadBaseUrl ?? DEFAULT_DOWNLOAD_BASE_URL;
    this.showProgress = options.showProgress ?? false;
  }

  async fetch(version: string, options: FetchOptions = {}): Promise<Outcome<string, FetchError>> {
    const release = parseRelease(version, this.platform);
    if (!release) {
      return fail(
        new FetchError(
          `Unsupported LLVM version "${version}"`,
          version,
          'Use a release number such as 3.4, 3.4.2 or 9.0.0 (2.6 is the oldest supported release).'
        )
      );
    }

    for (const tool of ['curl', 'tar']) {
      if (!(await this.runner.succeeds(tool, ['--version']))) {
        return fail(
          new FetchError(
            `${tool} is required to download the sources`,
            version,
            `Please ensure ${tool} is installed and available in the system PATH.`
          )
        );
      }
    }

    let versionDir: string | undefined;
    try {
      // One directory per fetch: concurrent installs of a version never share a tree
      await mkdir(this.workDir, { recursive: true });
      versionDir = await mkdtemp(join(this.workDir, `${release.version}-`));
      const sourceTree = join(versionDir, 'llvm-src');

      const baseUrl = options.sourceArchiveLocation ?? this.downloadBaseUrl;
      for (const component of releaseComponents(release)) {
        await this.downloadAndUnpack(release, component, versionDir, baseUrl);
      }

      for (const component of releaseComponents(release)) {
        if (component === 'llvm') continue;
        const destination = join(sourceTree, COMPONENT_DESTINATIONS[component]);
        await mkdir(dirname(destination), { recursive: true });
        await rename(join(versionDir, `${component}-src`), destination);
      }

      return ok(sourceTree);
    } catch (error) {
      if (versionDir !== undefined) {
        await rm(versionDir, { recursive: true, force: true });
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      return fail(
        new FetchError(
          `Failed to fetch LLVM ${release.version} sources: ${cause.message}`,
          version,
          error instanceof CommandError
            ? 'Check your network connection and that the release exists on the download server.'
            : `Check that the work directory ${this.workDir} is writable.`,
          cause
        )
      );
    }
  }

  async discard(sourceTree: string): Promise<void> {
    await rm(dirname(sourceTree), { recursive: true, force: true });
  }

  private async downloadAndUnpack(
    release: LlvmRelease,
    component: TarballComponent,
    versionDir: string,
    baseUrl: string
  ): Promise<void> {
    const url = tarballUrl(release, component, baseUrl);
    const filename = tarballFilename(release, component);
    if (url === null || filename === null) {
      return;
    }

    const archive = join(versionDir, filename);
    const destination = join(versionDir, `${component}-src`);

    await this.runner.run('curl', ['-f', '-L', url, '-o', archive], {
      inheritOutput: this.showProgress,
    });

    await mkdir(destination, { recursive: true });
    await this.runner.run('tar', ['-xf', archive, '-C', destination, '--strip-components=1']);
    await rm(archive, { force: true });
  }
}
