/**
 * CMake Builder
 *
 * Configures, compiles and installs an LLVM source tree with CMake.
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import type { SourceBuilder } from '../core/collaborators.js';
import { BuildError } from '../core/errors.js';
import { fail, ok } from '../core/types.js';
import type { BuildType, Outcome, VersionKey } from '../core/types.js';
import { CommandError, type CommandRunner } from '../exec/executor.js';

export interface CMakeBuilderOptions {
  runner: CommandRunner;
  platform?: NodeJS.Platform;
  /** Force a CMake generator instead of detecting one */
  generator?: string;
  /** Stream compiler output to the terminal */
  showProgress?: boolean;
  /** Per-step timeout in milliseconds */
  timeout?: number;
}

export class CMakeBuilder implements SourceBuilder {
  private readonly runner: CommandRunner;
  private readonly platform: NodeJS.Platform;
  private readonly generator: string | undefined;
  private readonly showProgress: boolean;
  private readonly timeout: number | undefined;

  constructor(options: CMakeBuilderOptions) {
    this.runner = options.runner;
    this.platform = options.platform ?? process.platform;
    this.generator = options.generator;
    this.showProgress = options.showProgress ?? false;
    this.timeout = options.timeout;
  }

  async build(
    sourceTree: string,
    buildType: BuildType,
    destination: string,
    key: VersionKey
  ): Promise<Outcome<void, BuildError>> {
    if (!(await this.runner.succeeds('cmake', ['--version']))) {
      return fail(
        new BuildError(
          'cmake is required for the build process',
          key,
          'Please ensure cmake is installed and available in the system PATH.'
        )
      );
    }

    const buildDir = join(sourceTree, 'build');
    const generator = await this.selectGenerator();
    const runOptions = { cwd: buildDir, inheritOutput: this.showProgress, timeout: this.timeout };

    try {
      await mkdir(buildDir, { recursive: true });
      await this.runner.run(
        'cmake',
        [
          `-DCMAKE_INSTALL_PREFIX=${destination}`,
          `-DCMAKE_BUILD_TYPE=${buildType}`,
          '-DLLVM_ENABLE_EH=true',
          '-DLLVM_ENABLE_RTTI=true',
          '-DLLVM_INCLUDE_TESTS=false',
          '-G',
          generator,
          '..',
        ],
        runOptions
      );
      await this.runner.run('cmake', ['--build', '.'], runOptions);
      await this.runner.run('cmake', ['--build', '.', '--target', 'install'], runOptions);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return fail(
        new BuildError(
          `Build of ${key.version}-${buildType} failed: ${cause.message}`,
          key,
          error instanceof CommandError
            ? 'Re-run with --verbose and --no-cleanup to inspect the build directory.'
            : `Check that ${buildDir} can be created.`,
          cause
        )
      );
    }

    return ok(undefined);
  }

  /**
   * Pick the CMake generator.
   *
   * Ninja when available outside Windows; on Windows, NMake unless MinGW
   * g++ is on PATH; Unix Makefiles otherwise.
   */
  async selectGenerator(): Promise<string> {
    if (this.generator) {
      return this.generator;
    }
    if (this.platform === 'win32') {
      return (await this.runner.succeeds('g++', ['-v'])) ? 'MinGW Makefiles' : 'NMake Makefiles';
    }
    if (await this.runner.succeeds('ninja', ['--version'])) {
      return 'Ninja';
    }
    return 'Unix Makefiles';
  }
}
