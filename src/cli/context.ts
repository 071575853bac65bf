/**
 * Command Context
 *
 * Wires the configuration into the store, activator and builder that the
 * command handlers use.
 */

import { createActivator, type Activator } from '../activation/index.js';
import { loadConfig } from '../config/resolver.js';
import type { ResolvedConfig } from '../config/types.js';
import { Builder, type InstallStage } from '../core/builder.js';
import { CommandExecutor } from '../exec/executor.js';
import { InstallationStore } from '../store/store.js';
import { CMakeBuilder } from '../toolchain/cmake.js';
import { TarballFetcher } from '../toolchain/fetcher.js';

/**
 * Options shared by every command
 */
export interface GlobalOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

export interface CommandContext {
  config: ResolvedConfig;
  store: InstallationStore;
  activator: Activator;
}

/**
 * Load configuration and build the store and activator.
 *
 * @throws ConfigError if the configuration can't be loaded
 */
export async function createContext(options: GlobalOptions): Promise<CommandContext> {
  const config = await loadConfig({ configPath: options.config });
  const store = new InstallationStore({
    root: config.versionsRoot,
    queryExecutable: config.queryExecutable,
  });
  const activator = createActivator(config.platform, store, config.linkPath);
  return { config, store, activator };
}

/**
 * Build the Builder with the tarball fetcher and CMake collaborators.
 */
export function createBuilder(
  context: CommandContext,
  options: GlobalOptions,
  onStage?: (stage: InstallStage) => void
): Builder {
  const { config, store } = context;
  const runner = new CommandExecutor({ verbose: options.verbose });
  // Tool output streams to the terminal in human mode only
  const showProgress = !options.json;

  return new Builder({
    store,
    fetcher: new TarballFetcher({
      runner,
      workDir: config.build.workDir,
      platform: config.platform,
      downloadBaseUrl: config.build.downloadBaseUrl,
      showProgress,
    }),
    builder: new CMakeBuilder({
      runner,
      platform: config.platform,
      generator: config.build.generator,
      showProgress,
      timeout: config.build.timeout,
    }),
    onStage,
  });
}

/**
 * Factories the command handlers obtain their collaborators from.
 * Tests pass their own to run handlers against in-process fakes.
 */
export interface CommandServices {
  createContext(options: GlobalOptions): Promise<CommandContext>;
  createBuilder(
    context: CommandContext,
    options: GlobalOptions,
    onStage?: (stage: InstallStage) => void
  ): Builder;
}

export const defaultServices: CommandServices = { createContext, createBuilder };
