/**
 * List Command Handler
 *
 * Prints installed versions and marks the active one. A dangling or
 * foreign llvm-config is reported as a warning, not a failure.
 */

import { createOutput } from '../output.js';
import { defaultServices, type CommandServices, type GlobalOptions } from '../context.js';
import { handleError } from './handle-error.js';

/**
 * Execute the list command.
 *
 * @returns Process exit code
 */
export async function listCommand(
  options: GlobalOptions,
  services: CommandServices = defaultServices
): Promise<number> {
  const output = createOutput('list', options);

  try {
    const { store, activator } = await services.createContext(options);
    const [versions, active] = await Promise.all([store.list(), activator.currentActive()]);

    output.versionList(versions, active, activator.linkPath);
    output.flush();
    return 0;
  } catch (error) {
    return handleError(output, error);
  }
}
