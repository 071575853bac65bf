/**
 * Unit tests for Builder
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { chmod, mkdir, readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { Builder, type InstallStage } from '../../../src/core/builder.js';
import {
  AlreadyInstalledError,
  BuildError,
  FetchError,
  PermissionDeniedError,
} from '../../../src/core/errors.js';
import type { VersionKey } from '../../../src/core/types.js';
import { InstallationStore } from '../../../src/store/store.js';
import { FakeFetcher, FakeSourceBuilder } from '../../helpers/fake-collaborators.js';
import { createFakeInstall, createTempDir, fakeQueryScript, removeTempDir } from '../../helpers/fixtures.js';

const RELEASE_9: VersionKey = { version: '9.0.0', buildType: 'Release' };

describe('Builder', () => {
  let tempDir: string;
  let root: string;
  let workDir: string;
  let store: InstallationStore;

  beforeEach(async () => {
    tempDir = await createTempDir('builder');
    root = join(tempDir, 'versions');
    workDir = join(tempDir, 'work');
    store = new InstallationStore({ root, queryExecutable: 'llvm-config' });
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should install into the store path and report the installation', async () => {
    const fetcher = new FakeFetcher(workDir);
    const sourceBuilder = new FakeSourceBuilder('complete');
    const builder = new Builder({ store, fetcher, builder: sourceBuilder });

    const result = await builder.install({ key: RELEASE_9 });

    assert.strictEqual(result.ok, true);
    if (result.ok) {
      assert.strictEqual(result.value.name, '9.0.0-Release');
      assert.strictEqual(result.value.root, join(root, '9.0.0-Release'));
    }
    assert.deepStrictEqual(sourceBuilder.calls, [
      {
        sourceTree: join(workDir, '9.0.0', 'llvm-src'),
        buildType: 'Release',
        destination: join(root, '9.0.0-Release'),
      },
    ]);
    assert.strictEqual(await store.exists(RELEASE_9), true);
    assert.deepStrictEqual((await store.list()).map((v) => v.name), ['9.0.0-Release']);
  });

  it('should pass the source archive location to the fetcher', async () => {
    const fetcher = new FakeFetcher(workDir);
    const builder = new Builder({ store, fetcher, builder: new FakeSourceBuilder('complete') });

    await builder.install({ key: RELEASE_9, sourceArchiveLocation: 'https://mirror.example/llvm' });

    assert.deepStrictEqual(fetcher.fetched, [
      { version: '9.0.0', options: { sourceArchiveLocation: 'https://mirror.example/llvm' } },
    ]);
  });

  it('should refuse to reinstall and leave the existing installation untouched', async () => {
    const executable = await createFakeInstall(root, RELEASE_9);
    await writeFile(join(root, '9.0.0-Release', 'marker.txt'), 'in use');
    const fetcher = new FakeFetcher(workDir);
    const sourceBuilder = new FakeSourceBuilder('complete');
    const builder = new Builder({ store, fetcher, builder: sourceBuilder });

    const result = await builder.install({ key: RELEASE_9 });

    assert.strictEqual(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof AlreadyInstalledError);
    }
    assert.strictEqual(fetcher.fetched.length, 0);
    assert.strictEqual(sourceBuilder.calls.length, 0);
    assert.deepStrictEqual((await readdir(join(root, '9.0.0-Release'))).sort(), ['bin', 'marker.txt']);
    assert.strictEqual(await readFile(executable, 'utf-8'), fakeQueryScript('9.0.0'));
  });

  it('should return FetchFailure without building', async () => {
    const failure = new FetchError('network unreachable', '9.0.0');
    const sourceBuilder = new FakeSourceBuilder('complete');
    const builder = new Builder({ store, fetcher: new FakeFetcher(workDir, failure), builder: sourceBuilder });

    const result = await builder.install({ key: RELEASE_9 });

    assert.deepStrictEqual(result, { ok: false, error: failure });
    assert.strictEqual(sourceBuilder.calls.length, 0);
  });

  it('should remove the partial destination when the build fails', async () => {
    const builder = new Builder({
      store,
      fetcher: new FakeFetcher(workDir),
      builder: new FakeSourceBuilder('fail-after-partial-write'),
    });

    const result = await builder.install({ key: RELEASE_9 });

    assert.strictEqual(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof BuildError);
      assert.strictEqual(result.error.message, 'compile error');
    }
    await assert.rejects(() => stat(join(root, '9.0.0-Release')), { code: 'ENOENT' });
    assert.strictEqual(await store.exists(RELEASE_9), false);
  });

  it('should treat a successful build without llvm-config as a BuildFailure', async () => {
    const builder = new Builder({
      store,
      fetcher: new FakeFetcher(workDir),
      builder: new FakeSourceBuilder('succeed-without-layout'),
    });

    const result = await builder.install({ key: RELEASE_9 });

    assert.strictEqual(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof BuildError);
      assert.strictEqual(
        result.error.message,
        `The build reported success but ${join(root, '9.0.0-Release')} has no bin/llvm-config`
      );
    }
    await assert.rejects(() => stat(join(root, '9.0.0-Release')), { code: 'ENOENT' });
  });

  it('should clean up and return unexpected errors as BuildFailure', async () => {
    const fetcher = new FakeFetcher(workDir);
    const builder = new Builder({ store, fetcher, builder: new FakeSourceBuilder('throw') });

    const result = await builder.install({ key: RELEASE_9 });

    assert.strictEqual(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof BuildError);
      assert.strictEqual(result.error.message, 'Installing 9.0.0-Release failed: disk full');
      assert.strictEqual(result.error.cause?.message, 'disk full');
    }

    await assert.rejects(() => stat(join(root, '9.0.0-Release')), { code: 'ENOENT' });
    assert.deepStrictEqual(fetcher.discarded, [join(workDir, '9.0.0', 'llvm-src')]);
  });

  it('should discard the source tree unless cleanup is disabled', async () => {
    const kept = new FakeFetcher(workDir);
    await new Builder({ store, fetcher: kept, builder: new FakeSourceBuilder('complete') }).install(
      { key: RELEASE_9 },
      { cleanup: false }
    );
    assert.deepStrictEqual(kept.discarded, []);

    const debug: VersionKey = { version: '9.0.0', buildType: 'Debug' };
    const discarded = new FakeFetcher(workDir);
    await new Builder({ store, fetcher: discarded, builder: new FakeSourceBuilder('complete') }).install({
      key: debug,
    });
    assert.deepStrictEqual(discarded.discarded, [join(workDir, '9.0.0', 'llvm-src')]);
  });

  it('should report stages in order', async () => {
    const stages: InstallStage[] = [];
    const builder = new Builder({
      store,
      fetcher: new FakeFetcher(workDir),
      builder: new FakeSourceBuilder('complete'),
      onStage: (stage) => stages.push(stage),
    });

    await builder.install({ key: RELEASE_9 });

    assert.deepStrictEqual(stages, ['fetch', 'build', 'verify', 'cleanup']);
  });

  it('should create a missing versions root before fetching', async () => {
    const builder = new Builder({ store, fetcher: new FakeFetcher(workDir), builder: new FakeSourceBuilder('complete') });

    const result = await builder.install({ key: RELEASE_9 });

    assert.strictEqual(result.ok, true);
    assert.ok((await stat(root)).isDirectory());
  });

  it(
    'should report PermissionDenied for an unwritable versions root without fetching',
    { skip: process.platform === 'win32' || process.getuid?.() === 0 },
    async () => {
      await mkdir(root, { recursive: true });
      await chmod(root, 0o555);
      const fetcher = new FakeFetcher(workDir);
      const builder = new Builder({ store, fetcher, builder: new FakeSourceBuilder('complete') });

      try {
        const result = await builder.install({ key: RELEASE_9 });

        assert.strictEqual(result.ok, false);
        if (!result.ok) {
          assert.ok(result.error instanceof PermissionDeniedError);
          assert.strictEqual(result.error.path, root);
          assert.strictEqual(result.error.exitCode, 7);
        }
        assert.deepStrictEqual(fetcher.fetched, []);
      } finally {
        await chmod(root, 0o755);
      }
    }
  );

  it('should report a versions root that is a file as BuildFailure without fetching', async () => {
    await writeFile(join(tempDir, 'versions'), 'not a directory');
    const fetcher = new FakeFetcher(workDir);
    const builder = new Builder({ store, fetcher, builder: new FakeSourceBuilder('complete') });

    const result = await builder.install({ key: RELEASE_9 });

    assert.strictEqual(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof BuildError);
      assert.ok(result.error.message.startsWith(`Cannot prepare ${root}: `));
    }
    assert.deepStrictEqual(fetcher.fetched, []);
  });
});
