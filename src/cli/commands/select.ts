/**
 * Select Command Handler
 *
 * Points the well-known llvm-config at an installed version.
 */

import { parseVersionKey } from '../../core/version-key.js';
import { createOutput } from '../output.js';
import { defaultServices, type CommandServices, type GlobalOptions } from '../context.js';
import { handleError } from './handle-error.js';

/**
 * Execute the select (activate) command.
 *
 * @returns Process exit code
 */
export async function selectCommand(
  version: string | undefined,
  buildType: string | undefined,
  options: GlobalOptions,
  services: CommandServices = defaultServices
): Promise<number> {
  const output = createOutput('select', options);

  try {
    const parsed = parseVersionKey(version, buildType);
    if (!parsed.ok) {
      return handleError(output, parsed.error);
    }

    const { activator } = await services.createContext(options);
    const result = await activator.activate(parsed.value);
    if (!result.ok) {
      return handleError(output, result.error);
    }

    output.activated(result.value, activator.linkPath);
    output.flush();
    return 0;
  } catch (error) {
    return handleError(output, error);
  }
}
