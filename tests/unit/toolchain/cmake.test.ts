/**
 * Unit tests for CMakeBuilder
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { CMakeBuilder } from '../../../src/toolchain/cmake.js';
import { BuildError } from '../../../src/core/errors.js';
import type { VersionKey } from '../../../src/core/types.js';
import { createTempDir, removeTempDir } from '../../helpers/fixtures.js';
import { FakeRunner } from '../../helpers/fake-runner.js';

const DEBUG_9: VersionKey = { version: '9.0.0', buildType: 'Debug' };

describe('CMakeBuilder', () => {
  let sourceTree: string;
  let runner: FakeRunner;

  beforeEach(async () => {
    sourceTree = await createTempDir('cmake');
    runner = new FakeRunner();
  });

  afterEach(async () => {
    await removeTempDir(sourceTree);
  });

  describe('selectGenerator', () => {
    it('should prefer Ninja when available', async () => {
      runner.available.add('ninja');
      const builder = new CMakeBuilder({ runner, platform: 'linux' });
      assert.strictEqual(await builder.selectGenerator(), 'Ninja');
    });

    it('should fall back to Unix Makefiles', async () => {
      const builder = new CMakeBuilder({ runner, platform: 'darwin' });
      assert.strictEqual(await builder.selectGenerator(), 'Unix Makefiles');
    });

    it('should use NMake on Windows without g++', async () => {
      runner.available.add('ninja');
      const builder = new CMakeBuilder({ runner, platform: 'win32' });
      assert.strictEqual(await builder.selectGenerator(), 'NMake Makefiles');
    });

    it('should use MinGW Makefiles on Windows with g++', async () => {
      runner.available.add('g++');
      const builder = new CMakeBuilder({ runner, platform: 'win32' });
      assert.strictEqual(await builder.selectGenerator(), 'MinGW Makefiles');
    });

    it('should honor a configured generator', async () => {
      runner.available.add('ninja');
      const builder = new CMakeBuilder({ runner, platform: 'linux', generator: 'Unix Makefiles' });
      assert.strictEqual(await builder.selectGenerator(), 'Unix Makefiles');
    });
  });

  describe('build', () => {
    it('should fail when cmake is missing', async () => {
      runner.available.delete('cmake');
      const builder = new CMakeBuilder({ runner, platform: 'linux' });

      const result = await builder.build(sourceTree, 'Debug', '/opt/llvm/9.0.0-Debug', DEBUG_9);

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.ok(result.error instanceof BuildError);
        assert.strictEqual(result.error.message, 'cmake is required for the build process');
      }
      assert.deepStrictEqual(runner.calls, []);
    });

    it('should configure, build and install into the destination', async () => {
      const builder = new CMakeBuilder({ runner, platform: 'linux', timeout: 60_000 });

      const result = await builder.build(sourceTree, 'Debug', '/opt/llvm/9.0.0-Debug', DEBUG_9);

      assert.deepStrictEqual(result, { ok: true, value: undefined });
      assert.deepStrictEqual(runner.commandLines(), [
        [
          'cmake',
          '-DCMAKE_INSTALL_PREFIX=/opt/llvm/9.0.0-Debug',
          '-DCMAKE_BUILD_TYPE=Debug',
          '-DLLVM_ENABLE_EH=true',
          '-DLLVM_ENABLE_RTTI=true',
          '-DLLVM_INCLUDE_TESTS=false',
          '-G',
          'Unix Makefiles',
          '..',
        ],
        ['cmake', '--build', '.'],
        ['cmake', '--build', '.', '--target', 'install'],
      ]);
      const buildDir = join(sourceTree, 'build');
      for (const call of runner.calls) {
        assert.deepStrictEqual(call.options, { cwd: buildDir, inheritOutput: false, timeout: 60_000 });
      }
      assert.ok((await stat(buildDir)).isDirectory());
    });

    it('should turn a failing step into BuildFailure', async () => {
      runner.failOn = ['cmake', '--build', '.'];
      const builder = new CMakeBuilder({ runner, platform: 'linux' });

      const result = await builder.build(sourceTree, 'Debug', '/opt/llvm/9.0.0-Debug', DEBUG_9);

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.ok(result.error instanceof BuildError);
        assert.deepStrictEqual(result.error.key, DEBUG_9);
        assert.ok(result.error.message.startsWith('Build of 9.0.0-Debug failed: '));
      }
      assert.strictEqual(runner.calls.length, 2);
    });

    it('should turn a filesystem error into BuildFailure', async () => {
      const notADirectory = join(sourceTree, 'file');
      await writeFile(notADirectory, 'not a directory');
      const builder = new CMakeBuilder({ runner, platform: 'linux' });

      const result = await builder.build(notADirectory, 'Debug', '/opt/llvm/9.0.0-Debug', DEBUG_9);

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.ok(result.error instanceof BuildError);
        assert.strictEqual(result.error.code, 'BUILD_FAILED');
        assert.ok(result.error.message.startsWith('Build of 9.0.0-Debug failed: '));
        assert.ok(result.error.cause instanceof Error);
        assert.strictEqual(result.error.suggestion, `Check that ${join(notADirectory, 'build')} can be created.`);
      }
      assert.deepStrictEqual(runner.calls, []);
    });
  });
});
