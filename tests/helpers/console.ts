/**
 * Capture console output during a test.
 */

export interface CapturedConsole {
  log: string[];
  error: string[];
  warn: string[];
  restore(): void;
}

export function captureConsole(): CapturedConsole {
  const original = { log: console.log, error: console.error, warn: console.warn };
  const captured: CapturedConsole = {
    log: [],
    error: [],
    warn: [],
    restore: () => {
      console.log = original.log;
      console.error = original.error;
      console.warn = original.warn;
    },
  };

  console.log = (...args: unknown[]): void => {
    captured.log.push(args.map(String).join(' '));
  };
  console.error = (...args: unknown[]): void => {
    captured.error.push(args.map(String).join(' '));
  };
  console.warn = (...args: unknown[]): void => {
    captured.warn.push(args.map(String).join(' '));
  };

  return captured;
}
