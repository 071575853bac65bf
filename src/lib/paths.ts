/**
 * Path Utilities
 *
 * Provides path expansion and the per-platform default locations for the
 * versions root, the llvm-config redirection and the configuration file.
 */

import { homedir, tmpdir } from 'node:os';
import { isAbsolute, join, resolve, win32 } from 'node:path';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~ or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  // Expand ~ to home directory
  if (expanded.startsWith('~')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  // Expand environment variables (Windows-style %VAR% and Unix-style $VAR)
  expanded = expanded.replace(/%([^%]+)%/g, (_, varName: string) => {
    return process.env[varName] ?? '';
  });
  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, varName: string) => {
      return process.env[varName] ?? '';
    }
  );

  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Name of the configuration-query executable inside an installation's bin directory.
 */
export function getDefaultQueryExecutable(platform: NodeJS.Platform): string {
  return platform === 'win32' ? 'llvm-config.exe' : 'llvm-config';
}

/**
 * Get the default directory holding one subdirectory per installed version.
 *
 * @returns /usr/local/llvm, or %LOCALAPPDATA%\llvmswitch\versions on Windows
 */
export function getDefaultVersionsRoot(platform: NodeJS.Platform): string {
  if (platform === 'win32') {
    return win32.join(getWindowsAppDir(), 'versions');
  }
  return '/usr/local/llvm';
}

/**
 * Get the default location of the llvm-config redirection artifact.
 *
 * @returns /usr/local/bin/llvm-config (symlink), or a .cmd shim on Windows
 */
export function getDefaultLinkPath(platform: NodeJS.Platform): string {
  if (platform === 'win32') {
    return win32.join(getWindowsAppDir(), 'bin', 'llvm-config.cmd');
  }
  return '/usr/local/bin/llvm-config';
}

/**
 * Get the default configuration file path: ~/.llvmswitch.yaml
 */
export function getDefaultConfigPath(): string {
  return join(homedir(), '.llvmswitch.yaml');
}

/**
 * Get the default scratch directory for downloads and builds.
 */
export function getDefaultWorkDir(): string {
  return join(tmpdir(), 'llvmswitch-build');
}

function getWindowsAppDir(): string {
  const base = process.env['LOCALAPPDATA'] ?? win32.join(homedir(), 'AppData', 'Local');
  return win32.join(base, 'llvmswitch');
}
