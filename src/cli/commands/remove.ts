/**
 * Remove Command Handler
 *
 * Deletes an installed version. If it was active, llvm-config is left
 * dangling and `--list` reports it.
 */

import { keysEqual, parseVersionKey } from '../../core/version-key.js';
import { createOutput } from '../output.js';
import { defaultServices, type CommandServices, type GlobalOptions } from '../context.js';
import { handleError } from './handle-error.js';

/**
 * Execute the remove command.
 *
 * @returns Process exit code
 */
export async function removeCommand(
  version: string | undefined,
  buildType: string | undefined,
  options: GlobalOptions,
  services: CommandServices = defaultServices
): Promise<number> {
  const output = createOutput('remove', options);

  try {
    const parsed = parseVersionKey(version, buildType);
    if (!parsed.ok) {
      return handleError(output, parsed.error);
    }
    const key = parsed.value;

    const { store, activator } = await services.createContext(options);
    const active = await activator.currentActive();

    const result = await store.remove(key);
    if (!result.ok) {
      return handleError(output, result.error);
    }

    output.removed(result.value);
    if (active.kind === 'active' && keysEqual(active.key, key)) {
      output.warning(`${activator.linkPath} still points at the removed version; select another version.`);
    }
    output.flush();
    return 0;
  } catch (error) {
    return handleError(output, error);
  }
}
