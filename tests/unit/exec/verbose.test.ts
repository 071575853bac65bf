/**
 * Unit tests for verbose output helpers
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { formatCommand, quoteArg, supportsAnsi } from '../../../src/exec/verbose.js';

describe('quoteArg', () => {
  it('should leave plain arguments alone', () => {
    assert.strictEqual(quoteArg('--build'), '--build');
    assert.strictEqual(quoteArg('-DCMAKE_BUILD_TYPE=Release'), '-DCMAKE_BUILD_TYPE=Release');
  });

  it('should quote arguments with whitespace', () => {
    assert.strictEqual(quoteArg('Unix Makefiles'), '"Unix Makefiles"');
  });

  it('should escape embedded quotes and backslashes', () => {
    assert.strictEqual(quoteArg('say "hi"'), '"say \\"hi\\""');
    assert.strictEqual(quoteArg('C:\\Program Files'), '"C:\\\\Program Files"');
  });

  it('should show empty arguments', () => {
    assert.strictEqual(quoteArg(''), '""');
  });
});

describe('formatCommand', () => {
  it('should produce the exact plain format', () => {
    assert.strictEqual(
      formatCommand('cmake', ['-G', 'Unix Makefiles', '..'], undefined, false),
      '[$] cmake -G "Unix Makefiles" ..\n'
    );
  });

  it('should add the working directory on its own line', () => {
    assert.strictEqual(
      formatCommand('cmake', ['--build', '.'], '/tmp/llvm-src/build', false),
      '[$] cmake --build .\n    (in /tmp/llvm-src/build)\n'
    );
  });

  it('should wrap in ANSI gray when enabled', () => {
    assert.strictEqual(formatCommand('tar', ['--version'], undefined, true), '\x1b[90m[$] tar --version\n\x1b[0m');
  });
});

describe('supportsAnsi', () => {
  it('should follow whether stderr is a TTY', () => {
    assert.strictEqual(supportsAnsi(), Boolean(process.stderr.isTTY));
  });
});
