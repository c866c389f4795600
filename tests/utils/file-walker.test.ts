import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import { walkFiles, type FileFilter } from '../../src/utils/file-walker.js';
import { makeTempDir, removeDir, createTree } from '../test-helpers.js';

async function walked(dir: string, filter?: FileFilter): Promise<string[]> {
  const files: string[] = [];
  for await (const file of walkFiles(dir, filter)) {
    files.push(file);
  }
  return files.sort();
}

describe('walkFiles', () => {
  let root: string;
  let linked: string;

  before(async () => {
    root = await makeTempDir('walker');
    await createTree(root, ['a.txt', 'sub/b.jar', 'sub/deep/c.txt', 'empty/']);

    linked = await makeTempDir('walker-links');
    await createTree(linked, ['real/x.jar']);
    await fs.symlink(path.join(linked, 'real'), path.join(linked, 'real/back'), 'dir');
    await fs.symlink(path.join(linked, 'real/x.jar'), path.join(linked, 'alias.jar'));
    await fs.symlink(path.join(linked, 'nowhere'), path.join(linked, 'broken.jar'));
  });

  after(async () => {
    await removeDir(root);
    await removeDir(linked);
  });

  it('yields files at every depth', async () => {
    assert.deepEqual(await walked(root), [
      path.join(root, 'a.txt'),
      path.join(root, 'sub/b.jar'),
      path.join(root, 'sub/deep/c.txt'),
    ]);
  });

  it('yields only files accepted by the filter', async () => {
    assert.deepEqual(
      await walked(root, file => file.endsWith('.txt')),
      [path.join(root, 'a.txt'), path.join(root, 'sub/deep/c.txt')]
    );
  });

  it('follows links once and ignores broken ones', async () => {
    assert.deepEqual(await walked(linked), [path.join(linked, 'alias.jar'), path.join(linked, 'real/x.jar')]);
  });
});
