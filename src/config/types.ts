/**
 * Configuration Types for llvmswitch
 *
 * The optional YAML configuration file and the resolved configuration with
 * platform defaults applied.
 */

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root configuration object parsed from ~/.llvmswitch.yaml
 */
export interface LlvmSwitchConfig {
  /** Directory holding one {version}-{buildType} subdirectory per installation */
  versions_root?: string;
  /** Location of the llvm-config symlink (or .cmd shim on Windows) */
  link_path?: string;
  /** File name of the configuration-query executable inside bin/ */
  query_executable?: string;
  build?: BuildSettingsConfig;
}

/**
 * Settings for fetching and building new versions
 */
export interface BuildSettingsConfig {
  /** Scratch directory for downloads and build trees */
  work_dir?: string;
  /** CMake generator to use instead of detecting one */
  generator?: string;
  /** Remove downloaded sources after installing. Default: true */
  cleanup?: boolean;
  /** Release server root. Default: https://releases.llvm.org */
  download_base_url?: string;
  /** Timeout for each cmake step, in minutes */
  timeout_minutes?: number;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Fully resolved configuration ready for execution
 */
export interface ResolvedConfig {
  platform: NodeJS.Platform;
  /** Absolute versions root */
  versionsRoot: string;
  /** Absolute path of the redirection artifact */
  linkPath: string;
  queryExecutable: string;
  build: {
    workDir: string;
    generator?: string;
    cleanup: boolean;
    downloadBaseUrl: string;
    /** Milliseconds, if configured */
    timeout?: number;
  };
  /** Absolute path of the configuration file, if one was loaded */
  configPath?: string;
}
