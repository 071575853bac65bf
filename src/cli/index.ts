#!/usr/bin/env node
import { Command } from 'commander';

import packageJson from '../../package.json' with { type: 'json' };
import { BUILD_TYPES } from '../core/types.js';
import { installCommand, type InstallCommandOptions } from './commands/install.js';
import { listCommand } from './commands/list.js';
import { removeCommand } from './commands/remove.js';
import { selectCommand } from './commands/select.js';
import type { GlobalOptions } from './context.js';

const BUILD_TYPE_DESC = `Build type (${BUILD_TYPES.join(', ')}), default Release`;

/**
 * Options accepted by the bare `llvmswitch [VERSION] [BUILDTYPE]` form
 */
interface RootOptions extends GlobalOptions {
  list?: boolean;
  remove?: boolean;
}

/**
 * Build the command-line program.
 *
 * Every action stores its exit code in `process.exitCode`.
 */
export function createProgram(): Command {
  const program = new Command();

  /**
   * Merge root-level --config/--json/--verbose into subcommand options.
   * Supports both positions:
   *   llvmswitch --json install 9.0.0
   *   llvmswitch install 9.0.0 --json
   */
  function withGlobalOpts<T extends GlobalOptions>(opts: T): T {
    const globalOpts = program.opts<GlobalOptions>();
    return {
      ...opts,
      config: opts.config ?? globalOpts.config,
      json: opts.json === true || globalOpts.json === true,
      verbose: opts.verbose === true || globalOpts.verbose === true,
    };
  }

  program
    .name('llvmswitch')
    .description('Install LLVM/Clang versions side by side and select the active llvm-config')
    .version(packageJson.version)
    .argument('[version]', 'Library version to select (or remove with --remove)')
    .argument('[buildtype]', BUILD_TYPE_DESC)
    .option('--list', 'List installed library versions')
    .option('--remove', 'Remove an installed library version')
    .option('--config <file>', 'Configuration file (default: ~/.llvmswitch.yaml)')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Print external commands before execution')
    .action(async (version: string | undefined, buildType: string | undefined, opts: RootOptions) => {
      if (opts.list) {
        process.exitCode = await listCommand(opts);
      } else if (opts.remove) {
        process.exitCode = await removeCommand(version, buildType, opts);
      } else {
        process.exitCode = await selectCommand(version, buildType, opts);
      }
    });

  program
    .command('install')
    .description('Download, build and install a library version')
    .argument('<version>', 'Library version, e.g. 9.0.0')
    .argument('[buildtype]', BUILD_TYPE_DESC)
    .option('--no-cleanup', "Don't remove build files after installing")
    .option('--mirror <url>', 'Download sources from this release server')
    .option('--config <file>', 'Configuration file (default: ~/.llvmswitch.yaml)')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Print external commands before execution')
    .action(async (version: string, buildType: string | undefined, opts: InstallCommandOptions) => {
      process.exitCode = await installCommand(version, buildType, withGlobalOpts(opts));
    });

  return program;
}

await createProgram().parseAsync();
