/**
 * Activation Module
 *
 * Picks the redirection mechanism for the running platform once, at startup.
 */

import type { InstallationStore } from '../store/store.js';
import type { Activator } from './activator.js';
import { ShimActivator } from './shim.js';
import { SymlinkActivator } from './symlink.js';

export * from './activator.js';
export * from './shim.js';
export * from './symlink.js';

export function createActivator(
  platform: NodeJS.Platform,
  store: InstallationStore,
  linkPath: string
): Activator {
  if (platform === 'win32') {
    return new ShimActivator(store, linkPath);
  }
  return new SymlinkActivator(store, linkPath);
}
