/**
 * Install Command Handler
 *
 * Fetches, builds and installs a library version into the versions root.
 * Does not change which version is active.
 */

import { formatKey, parseVersionKey } from '../../core/version-key.js';
import type { InstallStage } from '../../core/builder.js';
import { createOutput } from '../output.js';
import { defaultServices, type CommandServices, type GlobalOptions } from '../context.js';
import { handleError } from './handle-error.js';

/**
 * Options for the install command
 */
export interface InstallCommandOptions extends GlobalOptions {
  /** False when --no-cleanup is given */
  cleanup?: boolean;
  /** Release server root overriding the configured one */
  mirror?: string;
}

const STAGE_MESSAGES: Record<InstallStage, string> = {
  fetch: 'Downloading sources...',
  build: 'Building...',
  verify: 'Verifying installation layout...',
  cleanup: 'Removing build files...',
};

/**
 * Execute the install command.
 *
 * @returns Process exit code
 */
export async function installCommand(
  version: string | undefined,
  buildType: string | undefined,
  options: InstallCommandOptions,
  services: CommandServices = defaultServices
): Promise<number> {
  const output = createOutput('install', options);

  try {
    const parsed = parseVersionKey(version, buildType);
    if (!parsed.ok) {
      return handleError(output, parsed.error);
    }
    const key = parsed.value;

    const context = await services.createContext(options);
    const builder = services.createBuilder(context, options, (stage) => output.info(STAGE_MESSAGES[stage]));

    output.info(`Installing ${formatKey(key)} into ${context.store.resolvePath(key)}`);
    const result = await builder.install(
      { key, sourceArchiveLocation: options.mirror },
      { cleanup: options.cleanup !== false && context.config.build.cleanup }
    );
    if (!result.ok) {
      return handleError(output, result.error);
    }

    output.installed(result.value);
    output.flush();
    return 0;
  } catch (error) {
    return handleError(output, error);
  }
}
