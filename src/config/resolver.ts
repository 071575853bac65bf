/**
 * Configuration Resolver
 *
 * Locates the optional configuration file, validates it, and applies
 * per-platform defaults and path expansion.
 */

import { access } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { ConfigError } from '../core/errors.js';
import {
  expandPath,
  getDefaultConfigPath,
  getDefaultLinkPath,
  getDefaultQueryExecutable,
  getDefaultVersionsRoot,
  getDefaultWorkDir,
} from '../lib/paths.js';
import { DEFAULT_DOWNLOAD_BASE_URL } from '../toolchain/fetcher.js';
import { ConfigLoadError, loadYamlFile } from './loader.js';
import type { LlvmSwitchConfig, ResolvedConfig } from './types.js';
import { validateConfig } from './validator.js';

/**
 * Environment variable naming a configuration file
 */
export const CONFIG_ENV_VAR = 'LLVMSWITCH_CONFIG';

/**
 * Options for locating and resolving configuration
 */
export interface ResolveOptions {
  /** Explicit --config path; must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Apply defaults to a validated configuration.
 *
 * @param config - Validated configuration (empty when no file is used)
 * @param basePath - Directory relative paths are resolved against
 * @param platform - Platform whose defaults apply
 */
export function resolveConfig(
  config: LlvmSwitchConfig,
  basePath: string,
  platform: NodeJS.Platform
): ResolvedConfig {
  const build = config.build ?? {};
  const versionsRoot = expandPath(
    config.versions_root ?? getDefaultVersionsRoot(platform),
    basePath
  );

  return {
    platform,
    versionsRoot,
    linkPath: expandPath(config.link_path ?? getDefaultLinkPath(platform), basePath),
    queryExecutable: config.query_executable ?? getDefaultQueryExecutable(platform),
    build: {
      workDir: expandPath(build.work_dir ?? getDefaultWorkDir(), basePath),
      generator: build.generator,
      cleanup: build.cleanup ?? true,
      downloadBaseUrl: build.download_base_url ?? DEFAULT_DOWNLOAD_BASE_URL,
      timeout: build.timeout_minutes === undefined ? undefined : build.timeout_minutes * 60_000,
    },
  };
}

/**
 * Find, load, validate and resolve the configuration.
 *
 * Lookup order: explicit path, $LLVMSWITCH_CONFIG, ~/.llvmswitch.yaml.
 * Only the default location may be absent.
 *
 * @throws ConfigError if a named file is missing or any file is invalid
 */
export async function loadConfig(options: ResolveOptions = {}): Promise<ResolvedConfig> {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;

  const named = options.configPath ?? env[CONFIG_ENV_VAR];
  let configPath: string | undefined;
  if (named) {
    configPath = resolve(named);
  } else if (await fileExists(getDefaultConfigPath())) {
    configPath = getDefaultConfigPath();
  }

  if (!configPath) {
    return resolveConfig({}, process.cwd(), platform);
  }

  let raw: unknown;
  try {
    raw = await loadYamlFile(configPath);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      throw new ConfigError(
        error.message,
        error.reason === 'not-found' ? 'CONFIG_NOT_FOUND' : 'CONFIG_INVALID',
        'Ensure the configuration file exists and is readable YAML.',
        configPath
      );
    }
    throw error;
  }

  const validation = validateConfig(raw);
  if (!validation.valid) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}`,
      'CONFIG_INVALID',
      'Fix the fields listed below.',
      configPath,
      validation.errors.map(({ path, message }) => ({ path, message }))
    );
  }

  return {
    ...resolveConfig(validation.config, dirname(configPath), platform),
    configPath,
  };
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
