/**
 * Error Types for llvmswitch
 *
 * Custom error classes with error codes for structured error handling.
 * Components return these inside an Outcome; only the CLI turns them
 * into exit codes.
 */

import { BUILD_TYPES, type VersionKey } from './types.js';

/**
 * Error codes for all llvmswitch errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'INVALID_ARGUMENT'
  | 'NOT_INSTALLED'
  | 'ALREADY_INSTALLED'
  | 'FETCH_FAILED'
  | 'BUILD_FAILED'
  | 'PERMISSION_DENIED'
  | 'OPERATION_FAILED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID: 1,
  INVALID_ARGUMENT: 2,
  NOT_INSTALLED: 3,
  ALREADY_INSTALLED: 4,
  FETCH_FAILED: 5,
  BUILD_FAILED: 6,
  PERMISSION_DENIED: 7,
  OPERATION_FAILED: 8,
};

/**
 * Base error class for all llvmswitch errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class LlvmSwitchError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'LlvmSwitchError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, LlvmSwitchError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for configuration file issues.
 */
export class ConfigError extends LlvmSwitchError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * A bad build type token or a missing required argument.
 */
export class InvalidArgumentError extends LlvmSwitchError {
  constructor(message: string, suggestion?: string) {
    super(message, 'INVALID_ARGUMENT', suggestion);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }

  static unknownBuildType(token: string): InvalidArgumentError {
    return new InvalidArgumentError(
      `Invalid build type "${token}"`,
      `Valid build types: ${BUILD_TYPES.join(', ')}`
    );
  }
}

export class NotInstalledError extends LlvmSwitchError {
  constructor(public readonly key: VersionKey) {
    super(
      `The library version ${key.version}-${key.buildType} is not currently installed`,
      'NOT_INSTALLED',
      `Run 'llvmswitch install ${key.version} ${key.buildType}' first, or 'llvmswitch --list' to see what is installed.`
    );
    this.name = 'NotInstalledError';
    Object.setPrototypeOf(this, NotInstalledError.prototype);
  }
}

export class AlreadyInstalledError extends LlvmSwitchError {
  constructor(
    public readonly key: VersionKey,
    public readonly root: string
  ) {
    super(
      `The library version ${key.version}-${key.buildType} is already installed at ${root}`,
      'ALREADY_INSTALLED',
      `Remove it first with 'llvmswitch --remove ${key.version} ${key.buildType}'.`
    );
    this.name = 'AlreadyInstalledError';
    Object.setPrototypeOf(this, AlreadyInstalledError.prototype);
  }
}

/**
 * Source download or unpacking failed, or the version has no known release.
 */
export class FetchError extends LlvmSwitchError {
  constructor(
    message: string,
    public readonly version: string,
    suggestion?: string,
    public override readonly cause?: Error
  ) {
    super(message, 'FETCH_FAILED', suggestion);
    this.name = 'FetchError';
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

/**
 * Configure, compile or install failed, or produced an incomplete layout.
 */
export class BuildError extends LlvmSwitchError {
  constructor(
    message: string,
    public readonly key: VersionKey,
    suggestion?: string,
    public override readonly cause?: Error
  ) {
    super(message, 'BUILD_FAILED', suggestion);
    this.name = 'BuildError';
    Object.setPrototypeOf(this, BuildError.prototype);
  }
}

export class PermissionDeniedError extends LlvmSwitchError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(
      message,
      'PERMISSION_DENIED',
      'Re-run with elevated privileges (sudo, or an Administrator prompt on Windows).'
    );
    this.name = 'PermissionDeniedError';
    Object.setPrototypeOf(this, PermissionDeniedError.prototype);
  }
}

/**
 * Check if an error is an LlvmSwitchError.
 */
export function isLlvmSwitchError(error: unknown): error is LlvmSwitchError {
  return error instanceof LlvmSwitchError;
}

/**
 * Check if a filesystem error means the caller lacks privileges.
 */
export function isPermissionError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  return code === 'EACCES' || code === 'EPERM';
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isLlvmSwitchError(error)) {
    return error.exitCode;
  }
  return EXIT_CODES.OPERATION_FAILED;
}
