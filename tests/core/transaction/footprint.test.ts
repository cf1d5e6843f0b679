import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, symlink } from 'fs/promises';
import { join } from 'path';
import { extractFootprint, resolveFootprintPath } from '../../../src/core/transaction/footprint.js';
import { makeTempDir, removeTempDir, writeTree } from '../../test-helpers.js';

describe('extractFootprint', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('footprint');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('lists regular files only, relative to the install root', async () => {
    await writeTree(root, {
      'bin/tool': '#!/bin/sh\n',
      'lib/libtool.so.1': '',
      'share/doc/README': 'docs'
    });
    await mkdir(join(root, 'share', 'empty'), { recursive: true });
    await symlink('libtool.so.1', join(root, 'lib', 'libtool.so'));

    assert.deepEqual(await extractFootprint(root), ['bin/tool', 'lib/libtool.so.1', 'share/doc/README']);
  });

  it('is empty for an empty install', async () => {
    assert.deepEqual(await extractFootprint(root), []);
  });
});

describe('resolveFootprintPath', () => {
  it('joins and normalizes under the prefix', () => {
    assert.equal(resolveFootprintPath('/sw/el9/zlib/1.3', 'lib/./libz.so'), '/sw/el9/zlib/1.3/lib/libz.so');
  });
});
