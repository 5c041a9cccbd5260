import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ErrorCode } from '../../lib/errors.js';
import {
  PreviewReplaceOutputSchema,
  ReplaceOutputSchema,
  SearchStateOutputSchema,
  ToolErrorResponseSchema,
} from '../../schemas.js';
import {
  createInProcessGrep,
  withSearchFixture,
} from '../lib/fixtures/search-fixture.js';
import { createToolHarness, type ToolHarness } from '../shared/diagnostics-env.js';

async function searchFor(
  root: string,
  query: string,
  replaceText: string
): Promise<ToolHarness> {
  const harness = createToolHarness({
    root,
    runProcess: createInProcessGrep().runProcess,
  });
  await harness.call('search', { query, replaceText });
  return harness;
}

async function read(root: string, name: string): Promise<string> {
  return await fs.readFile(path.join(root, name), 'utf-8');
}

/** Links `root/link.txt` to a file holding "alpha" in a separate temp dir. */
async function withOutsideLink(
  root: string,
  fn: (outsideFile: string, link: string) => Promise<void>
): Promise<void> {
  const outsideDir = await fs.mkdtemp(
    path.join(os.tmpdir(), 'workspace-search-outside-')
  );
  try {
    const outsideFile = path.join(outsideDir, 'outside.txt');
    await fs.writeFile(outsideFile, 'alpha\n');
    const link = path.join(root, 'link.txt');
    await fs.symlink(outsideFile, link);
    await fn(outsideFile, link);
  } finally {
    await fs.rm(outsideDir, { recursive: true, force: true });
  }
}

void describe('replace_all tool', () => {
  withSearchFixture((getRoot) => {
    void it('rewrites every result file and rescans', async () => {
      const root = getRoot();
      const { call } = await searchFor(root, 'alpha', 'omega');

      const result = await call('replace_all');

      assert.deepStrictEqual(ReplaceOutputSchema.parse(result.structuredContent), {
        ok: true,
        filesChanged: 2,
        replacementsCount: 3,
        failures: [],
      });
      assert.strictEqual(result.content[0]?.text, 'Replaced 3 occurrences in 2 files.');
      assert.strictEqual(await read(root, 'a.txt'), 'omega\nbeta omega\ngamma\n');
      assert.strictEqual(await read(root, 'b.txt'), 'omega\n');

      const state = SearchStateOutputSchema.parse(
        (await call('search_state')).structuredContent
      );
      assert.strictEqual(state.totalMatches, 0);
      assert.deepStrictEqual(state.lastReplaceResult, {
        filesChanged: 2,
        replacementsCount: 3,
        failures: [],
      });
    });

    void it('reports an error without a root', async () => {
      const { call } = createToolHarness({
        runProcess: createInProcessGrep().runProcess,
      });

      const result = await call('replace_all');

      assert.strictEqual(result.isError, true);
      const sc = ToolErrorResponseSchema.parse(result.structuredContent);
      assert.strictEqual(sc.error.code, ErrorCode.E_NO_ROOT);
      assert.strictEqual(sc.error.message, 'No search root is active');
    });
  });
});

void describe('replace_in_file tool', () => {
  withSearchFixture((getRoot) => {
    void it('rewrites only the named file', async () => {
      const root = getRoot();
      const { call } = await searchFor(root, 'alpha', 'omega');

      const result = await call('replace_in_file', { path: 'b.txt' });

      assert.strictEqual(result.content[0]?.text, 'Replaced 1 occurrence in 1 file.');
      assert.strictEqual(await read(root, 'b.txt'), 'omega\n');
      assert.strictEqual(await read(root, 'a.txt'), 'alpha\nbeta alpha\ngamma\n');
    });

    void it('accepts an absolute path', async () => {
      const root = getRoot();
      const { call } = await searchFor(root, 'alpha', 'omega');

      const result = await call('replace_in_file', {
        path: path.join(root, 'a.txt'),
      });

      assert.strictEqual(result.structuredContent['replacementsCount'], 2);
    });

    void it('lists a path outside the root as a failure', async () => {
      const root = getRoot();
      const { call } = await searchFor(root, 'alpha', 'omega');
      const outside = path.resolve(root, '..', 'x.txt');

      const result = await call('replace_in_file', { path: '../x.txt' });

      assert.strictEqual(result.isError, undefined);
      assert.deepStrictEqual(result.structuredContent['failures'], [
        { path: outside, error: 'Path is outside the search root' },
      ]);
      assert.strictEqual(
        result.content[0]?.text,
        [
          'Replaced 0 occurrences in 0 files.',
          'Note: 1 file could not be updated.',
          `  ${outside}: Path is outside the search root`,
        ].join('\n')
      );
    });

    void it('does not write through a symlink leading outside the root', async () => {
      if (process.platform === 'win32') return;
      const root = getRoot();
      await withOutsideLink(root, async (outsideFile, link) => {
        const { call } = await searchFor(root, 'alpha', 'omega');

        const result = await call('replace_in_file', { path: 'link.txt' });

        assert.deepStrictEqual(result.structuredContent['failures'], [
          { path: link, error: 'Path is outside the search root' },
        ]);
        assert.strictEqual(result.structuredContent['replacementsCount'], 0);
        assert.strictEqual(await fs.readFile(outsideFile, 'utf-8'), 'alpha\n');
      });
    });

    void it('requires a path', async () => {
      const { call } = await searchFor(getRoot(), 'alpha', 'omega');

      const result = await call('replace_in_file', {});

      assert.strictEqual(result.isError, true);
      const sc = ToolErrorResponseSchema.parse(result.structuredContent);
      assert.strictEqual(sc.error.code, ErrorCode.E_INVALID_INPUT);
    });
  });
});

void describe('preview_replace tool', () => {
  withSearchFixture((getRoot) => {
    void it('previews every result file without writing', async () => {
      const root = getRoot();
      const { call } = await searchFor(root, 'alpha', 'omega');

      const result = await call('preview_replace');

      const sc = PreviewReplaceOutputSchema.parse(result.structuredContent);
      assert.strictEqual(sc.totalReplacements, 3);
      assert.strictEqual(sc.truncated, false);
      assert.deepStrictEqual(
        sc.files.map((file) => [file.relativePath, file.count]),
        [
          ['a.txt', 2],
          ['b.txt', 1],
        ]
      );
      assert.ok(sc.files[1]?.diff.split('\n').includes('+omega'));
      assert.strictEqual(
        result.content[0]?.text.split('\n')[0],
        '3 replacements in 2 files (preview, nothing written)'
      );
      assert.strictEqual(await read(root, 'a.txt'), 'alpha\nbeta alpha\ngamma\n');
      assert.strictEqual(await read(root, 'b.txt'), 'alpha\n');
    });

    void it('previews a single file', async () => {
      const { call } = await searchFor(getRoot(), 'alpha', 'omega');

      const result = await call('preview_replace', { path: 'b.txt' });

      const sc = PreviewReplaceOutputSchema.parse(result.structuredContent);
      assert.deepStrictEqual(
        sc.files.map((file) => file.relativePath),
        ['b.txt']
      );
      assert.strictEqual(sc.totalReplacements, 1);
    });

    void it('caps the number of files', async () => {
      const { call } = await searchFor(getRoot(), 'alpha', 'omega');

      const result = await call('preview_replace', { maxFiles: 1 });

      const sc = PreviewReplaceOutputSchema.parse(result.structuredContent);
      assert.strictEqual(sc.files.length, 1);
      assert.strictEqual(sc.truncated, true);
    });

    void it('records unreadable files as failures', async () => {
      const root = getRoot();
      const { call } = await searchFor(root, 'alpha', 'omega');

      const result = await call('preview_replace', { path: 'missing.txt' });

      const sc = PreviewReplaceOutputSchema.parse(result.structuredContent);
      assert.deepStrictEqual(sc.files, []);
      assert.strictEqual(sc.failures.length, 1);
      assert.strictEqual(sc.failures[0]?.path, path.join(root, 'missing.txt'));
      assert.match(sc.failures[0]?.error ?? '', /ENOENT/);
    });

    void it('skips files above the coordinator size limit', async () => {
      const root = getRoot();
      const { call } = createToolHarness({
        root,
        runProcess: createInProcessGrep().runProcess,
        maxFileSize: 4,
      });
      await call('search', { query: 'alpha', replaceText: 'omega' });

      const result = await call('preview_replace');

      const sc = PreviewReplaceOutputSchema.parse(result.structuredContent);
      const a = path.join(root, 'a.txt');
      const b = path.join(root, 'b.txt');
      assert.deepStrictEqual(sc.files, []);
      assert.deepStrictEqual(sc.failures, [
        { path: a, error: `File too large: ${a} (23 bytes > 4 bytes)` },
        { path: b, error: `File too large: ${b} (6 bytes > 4 bytes)` },
      ]);
    });

    void it('rejects a symlink leading outside the root', async () => {
      if (process.platform === 'win32') return;
      const root = getRoot();
      await withOutsideLink(root, async () => {
        const { call } = await searchFor(root, 'alpha', 'omega');

        const result = await call('preview_replace', { path: 'link.txt' });

        assert.strictEqual(result.isError, true);
        const sc = ToolErrorResponseSchema.parse(result.structuredContent);
        assert.strictEqual(sc.error.code, ErrorCode.E_ACCESS_DENIED);
        assert.strictEqual(sc.error.path, 'link.txt');
      });
    });

    void it('rejects a path outside the root', async () => {
      const { call } = await searchFor(getRoot(), 'alpha', 'omega');

      const result = await call('preview_replace', { path: '../x.txt' });

      assert.strictEqual(result.isError, true);
      const sc = ToolErrorResponseSchema.parse(result.structuredContent);
      assert.strictEqual(sc.error.code, ErrorCode.E_ACCESS_DENIED);
      assert.strictEqual(sc.error.path, '../x.txt');
    });
  });
});
