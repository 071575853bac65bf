/**
 * Verbose Output Helpers
 *
 * Formats external commands for --verbose CLI output.
 * Used by CommandExecutor to print commands to stderr before execution.
 */

/**
 * Prefix for verbose command output lines.
 */
const PREFIX = '[$] ';

/**
 * ANSI SGR 90 — bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0 — reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Quote one argument for display when it contains whitespace or quotes.
 */
export function quoteArg(arg: string): string {
  if (arg === '') {
    return '""';
  }
  if (!/[\s"']/.test(arg)) {
    return arg;
  }
  return `"${arg.replace(/(["\\])/g, '\\$1')}"`;
}

/**
 * Format a command line for verbose output.
 *
 * Produces `[$] command arg1 arg2`, followed by `    (in <cwd>)` when a
 * working directory is given, optionally wrapped in ANSI gray.
 *
 * @param command - Executable name or path
 * @param args - Arguments passed to the executable
 * @param cwd - Working directory, if any
 * @param ansi - Whether to wrap output in ANSI gray escape codes
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(
  command: string,
  args: readonly string[],
  cwd: string | undefined,
  ansi: boolean
): string {
  let body = `${PREFIX}${[command, ...args].map(quoteArg).join(' ')}\n`;
  if (cwd) {
    body += `    (in ${cwd})\n`;
  }

  if (ansi) {
    return `${ANSI_GRAY}${body}${ANSI_RESET}`;
  }

  return body;
}
