import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { silentLogger } from '@ghidra-dmg/utils';
import { StagingTree, withStagingTree } from './staging.js';

describe('StagingTree', () => {
  it('should lay out the bundle under the root', () => {
    const tree = new StagingTree('/stage');

    assert.strictEqual(tree.appPath, '/stage/Ghidra.app');
    assert.strictEqual(tree.infoPlistPath, '/stage/Ghidra.app/Contents/Info.plist');
    assert.strictEqual(tree.launcherPath, '/stage/Ghidra.app/Contents/MacOS/ghidra');
    assert.strictEqual(tree.iconPath, '/stage/Ghidra.app/Contents/Resources/Ghidra.icns');
    assert.strictEqual(tree.applicationsLinkPath, '/stage/Applications');
    assert.strictEqual(tree.jdkPath, '/stage/Ghidra.app/Contents/Resources/jdk');
    assert.strictEqual(tree.releasePath('11.0.3'), '/stage/Ghidra.app/Contents/Resources/ghidra_11.0.3_PUBLIC');
  });
});

describe('withStagingTree', () => {
  let parentDir: string;

  beforeEach(async () => {
    parentDir = await mkdtemp(join(tmpdir(), 'ghidra-dmg-staging-test-'));
  });

  afterEach(async () => {
    await rm(parentDir, { recursive: true, force: true });
  });

  it('should remove the tree after success', async () => {
    const result = await withStagingTree(
      async (tree) => {
        await writeFile(join(tree.root, 'file'), 'content');
        assert.deepStrictEqual(await readdir(parentDir), [tree.root.slice(parentDir.length + 1)]);
        return 42;
      },
      { parentDir, logger: silentLogger() }
    );

    assert.strictEqual(result, 42);
    assert.deepStrictEqual(await readdir(parentDir), []);
  });

  it('should remove the tree when the callback throws', async () => {
    await assert.rejects(
      withStagingTree(
        async (tree) => {
          await writeFile(join(tree.root, 'file'), 'content');
          throw new Error('step failed');
        },
        { parentDir, logger: silentLogger() }
      ),
      /step failed/
    );

    assert.deepStrictEqual(await readdir(parentDir), []);
  });

  it('should give every build its own tree', async () => {
    const roots: string[] = [];
    const options = { parentDir, logger: silentLogger() };
    await withStagingTree(async (tree) => {
      roots.push(tree.root);
    }, options);
    await withStagingTree(async (tree) => {
      roots.push(tree.root);
    }, options);

    assert.notStrictEqual(roots[0], roots[1]);
  });
});
