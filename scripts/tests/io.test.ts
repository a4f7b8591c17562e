import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'node:path';
import test from 'node:test';

import {
  commitWrites,
  getRunOptions,
  listFiles,
  prepareJsonWrite,
  prepareTextWrite,
  stableText
} from '../lib/io.js';
import { withTempCwd, writeFixtureFile } from './test_fs.js';

test('getRunOptions detects --check', () => {
  assert.deepEqual(getRunOptions(['--family', 'xg24', '--check']), { check: true });
  assert.deepEqual(getRunOptions(['--family', 'xg24']), { check: false });
});

test('stableText adds a single trailing newline', () => {
  assert.equal(stableText('a'), 'a\n');
  assert.equal(stableText('a\n'), 'a\n');
});

test('prepared writes are only committed when content changes', async () => {
  await withTempCwd('pinctrl-io-', async (root) => {
    const file = path.join(root, 'out', 'xg24-pinctrl.h');

    const first = await prepareTextWrite(file, 'one');
    assert.deepEqual(first, { filePath: file, next: 'one\n', changed: true });
    assert.equal(await fs.pathExists(file), false);
    await commitWrites([first], { check: false });
    assert.equal(await fs.readFile(file, 'utf8'), 'one\n');

    assert.equal((await prepareTextWrite(file, 'one\n')).changed, false);

    const second = await prepareTextWrite(file, 'two');
    assert.equal(second.changed, true);
    await commitWrites([second], { check: true });
    assert.equal(await fs.readFile(file, 'utf8'), 'one\n');
  });
});

test('prepareJsonWrite renders indented JSON', async () => {
  await withTempCwd('pinctrl-io-', async (root) => {
    const file = path.join(root, 'model.json');
    await commitWrites([await prepareJsonWrite(file, { family: 'xg24' })], { check: false });
    assert.equal(await fs.readFile(file, 'utf8'), '{\n  "family": "xg24"\n}\n');
  });
});

test('prepareTextWrite rejects a directory target', async () => {
  await withTempCwd('pinctrl-io-', async (root) => {
    await fs.ensureDir(path.join(root, 'out', 'model.json'));
    await assert.rejects(prepareTextWrite(path.join(root, 'out', 'model.json'), '{}'), /out\/model\.json is a directory/);
  });
});

test('listFiles returns sorted absolute matches', async () => {
  await withTempCwd('pinctrl-io-', async (root) => {
    await writeFixtureFile(root, 'svd/B.svd', '<device/>');
    await writeFixtureFile(root, 'svd/A.svd', '<device/>');
    await writeFixtureFile(root, 'svd/notes.txt', 'x');

    assert.deepEqual(await listFiles(path.join(root, 'svd'), '*.svd'), [
      path.join(root, 'svd', 'A.svd'),
      path.join(root, 'svd', 'B.svd')
    ]);
    assert.deepEqual(await listFiles(path.join(root, 'missing'), '*.svd'), []);
  });
});
