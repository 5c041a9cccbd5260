import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { ReplaceRequest } from '../../../lib/replace/apply.js';
import { previewReplacement } from '../../../lib/replace/preview.js';
import { ErrorCode, McpError } from '../../../lib/errors.js';
import { withSearchFixture } from '../fixtures/search-fixture.js';

const ALPHA_TO_OMEGA: ReplaceRequest = {
  query: 'alpha',
  caseSensitive: false,
  useRegex: false,
  wholeWord: false,
  replacement: 'omega',
};

void describe('previewReplacement', () => {
  withSearchFixture((getRoot) => {
    void it('returns a unified diff without touching the file', async () => {
      const root = getRoot();
      const filePath = path.join(root, 'a.txt');

      const preview = await previewReplacement(filePath, root, ALPHA_TO_OMEGA);

      assert.strictEqual(preview.path, filePath);
      assert.strictEqual(preview.relativePath, 'a.txt');
      assert.strictEqual(preview.count, 2);
      const lines = preview.diff.split('\n');
      for (const expected of [
        '--- a.txt',
        '+++ a.txt',
        '@@ -1,3 +1,3 @@',
        '-alpha',
        '-beta alpha',
        '+omega',
        '+beta omega',
        ' gamma',
      ]) {
        assert.ok(lines.includes(expected), `missing diff line: ${expected}`);
      }
      assert.strictEqual(
        await fs.readFile(filePath, 'utf-8'),
        'alpha\nbeta alpha\ngamma\n'
      );
    });

    void it('returns an empty diff when nothing matches', async () => {
      const root = getRoot();
      const preview = await previewReplacement(
        path.join(root, 'a.txt'),
        root,
        { ...ALPHA_TO_OMEGA, query: 'delta' }
      );

      assert.strictEqual(preview.count, 0);
      assert.strictEqual(preview.diff, '');
    });

    void it('returns an empty diff when the replacement equals the match', async () => {
      const root = getRoot();
      const preview = await previewReplacement(
        path.join(root, 'b.txt'),
        root,
        { ...ALPHA_TO_OMEGA, replacement: 'alpha' }
      );

      assert.strictEqual(preview.count, 1);
      assert.strictEqual(preview.diff, '');
    });

    void it('honours the context size', async () => {
      const root = getRoot();
      const preview = await previewReplacement(
        path.join(root, 'a.txt'),
        root,
        ALPHA_TO_OMEGA,
        { context: 0 }
      );

      const lines = preview.diff.split('\n');
      assert.ok(lines.includes('+beta omega'));
      assert.ok(!lines.includes(' gamma'));
    });

    void it('uses the path relative to the root in nested directories', async () => {
      const root = getRoot();
      await fs.mkdir(path.join(root, 'src'));
      const filePath = path.join(root, 'src', 'c.txt');
      await fs.writeFile(filePath, 'alpha\n');

      const preview = await previewReplacement(filePath, root, ALPHA_TO_OMEGA);

      assert.strictEqual(preview.relativePath, path.join('src', 'c.txt'));
      assert.ok(preview.diff.split('\n').includes(`--- ${path.join('src', 'c.txt')}`));
    });

    void it('rejects files that are not valid UTF-8', async () => {
      const root = getRoot();
      const filePath = path.join(root, 'binary.bin');
      await fs.writeFile(filePath, Buffer.from([0xff, 0xfe, 0x00, 0x61]));

      await assert.rejects(
        previewReplacement(filePath, root, ALPHA_TO_OMEGA),
        (error: unknown) =>
          error instanceof McpError && error.code === ErrorCode.E_INVALID_INPUT
      );
    });
  });
});
