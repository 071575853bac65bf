/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import type { ErrorCode, LlvmSwitchError } from '../core/errors.js';
import type { ActiveState, InstalledVersion } from '../core/types.js';
import { formatKey, keysEqual } from '../core/version-key.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  versions?: VersionInfo[];
  active?: ActiveInfo;
  installed?: VersionInfo;
  removed?: VersionInfo;
  error?: ErrorOutput;
}

/**
 * Installation information for list/install/remove output
 */
export interface VersionInfo {
  name: string;
  version: string;
  buildType: string;
  root: string;
  active?: boolean;
}

/**
 * Redirection state for JSON output
 */
export interface ActiveInfo {
  state: ActiveState['kind'];
  name?: string;
  target?: string;
  linkPath: string;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * Marker printed in front of the active entry in --list
 */
export const ACTIVE_MARKER = '*';

/**
 * Render list lines: `* NAME` for the active entry, `  NAME` for the rest.
 */
export function formatVersionLines(versions: InstalledVersion[], active: ActiveState): string[] {
  return versions.map((installed) => {
    const isActive = active.kind === 'active' && keysEqual(active.key, installed.key);
    return `${isActive ? ACTIVE_MARKER : ' '} ${installed.name}`;
  });
}

function toVersionInfo(installed: InstalledVersion, active?: boolean): VersionInfo {
  return {
    name: installed.name,
    version: installed.key.version,
    buildType: installed.key.buildType,
    root: installed.root,
    ...(active === undefined ? {} : { active }),
  };
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * CLI-specific output formatter.
 *
 * In JSON mode, output is collected and emitted as a single JSON object
 * at flush.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private result: CommandResult;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`✓ ${message}`);
    }
  }

  /**
   * Print an error message and mark the result as failed.
   */
  error(message: string, error?: LlvmSwitchError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`✗ ${message}`);
      if (error?.suggestion) {
        console.error(`  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      suggestion: error?.suggestion,
    };
  }

  /**
   * Print configuration validation errors.
   */
  validationError(message: string, errors: Array<{ path: string; message: string }>, error: LlvmSwitchError): void {
    this.error(message, error);

    if (this.mode === 'human') {
      for (const err of errors) {
        console.error(`  - ${err.path}: ${err.message}`);
      }
    }

    this.result.error = {
      code: error.code,
      message,
      suggestion: error.suggestion,
      details: { errors },
    };
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(message);
    }
  }

  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`⚠ ${message}`);
    }
  }

  // ===========================================================================
  // Version Output
  // ===========================================================================

  /**
   * Print the installed versions with the active one marked.
   */
  versionList(versions: InstalledVersion[], active: ActiveState, linkPath: string): void {
    if (this.mode === 'human') {
      if (versions.length === 0) {
        this.info('There are no library versions currently installed.');
      } else {
        this.info('Installed library versions:');
        for (const line of formatVersionLines(versions, active)) {
          console.log(line);
        }
      }

      if (active.kind === 'dangling') {
        this.warning(
          `${linkPath} points at ${formatKey(active.key)}, which is no longer installed.`
        );
      } else if (active.kind === 'unmanaged') {
        this.warning(`${linkPath} is not managed by llvmswitch (${active.target}).`);
      }
    }

    this.result.versions = versions.map((installed) =>
      toVersionInfo(installed, active.kind === 'active' && keysEqual(active.key, installed.key))
    );
    this.result.active = {
      state: active.kind,
      ...('key' in active ? { name: formatKey(active.key) } : {}),
      ...('target' in active ? { target: active.target } : {}),
      linkPath,
    };
  }

  installed(installed: InstalledVersion): void {
    this.success(`Library installed to: ${installed.root}`);
    this.result.installed = toVersionInfo(installed);
  }

  removed(installed: InstalledVersion): void {
    this.success(`Removed \`${installed.root}\`.`);
    this.result.removed = toVersionInfo(installed);
  }

  activated(installed: InstalledVersion, linkPath: string): void {
    this.success(`Set ${linkPath} to point to \`${installed.queryExecutable}\`.`);
    this.result.active = {
      state: 'active',
      name: installed.name,
      target: installed.queryExecutable,
      linkPath,
    };
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}
