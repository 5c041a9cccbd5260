import { realpathSync } from 'node:fs';
import * as os from 'node:os';
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { runProcess } from '../../../lib/search/executor.js';

const cwd = realpathSync(os.tmpdir());

function runNode(script: string): ReturnType<typeof runProcess> {
  return runProcess(process.execPath, ['-e', script], cwd);
}

void describe('runProcess', () => {
  void it('captures stdout, stderr and the exit code', async () => {
    const result = await runNode(
      "process.stdout.write('out'); process.stderr.write('err'); process.exitCode = 3;"
    );
    assert.deepStrictEqual(result, { stdout: 'out', stderr: 'err', exitCode: 3 });
  });

  void it('reports silent streams as undefined', async () => {
    const result = await runNode('');
    assert.deepStrictEqual(result, {
      stdout: undefined,
      stderr: undefined,
      exitCode: 0,
    });
  });

  void it('drains output larger than a pipe buffer', async () => {
    const result = await runNode(
      "process.stdout.write('x'.repeat(1024 * 1024)); process.stderr.write('y'.repeat(256 * 1024));"
    );
    assert.strictEqual(result.exitCode, 0);
    assert.strictEqual(result.stdout?.length, 1024 * 1024);
    assert.strictEqual(result.stderr?.length, 256 * 1024);
  });

  void it('decodes multi-byte characters split across chunks', async () => {
    const result = await runNode(
      "process.stdout.write('é'.repeat(100000));"
    );
    assert.strictEqual(result.stdout, 'é'.repeat(100000));
  });

  void it('runs in the given working directory', async () => {
    const result = await runNode('process.stdout.write(process.cwd());');
    assert.strictEqual(result.stdout, cwd);
  });

  void it('reports -1 when the executable cannot be spawned', async () => {
    const result = await runProcess(
      'workspace-search-missing-executable',
      ['--version'],
      cwd
    );
    assert.strictEqual(result.exitCode, -1);
    assert.strictEqual(result.stdout, undefined);
    assert.match(result.stderr ?? '', /ENOENT/);
  });

  void it('reports -1 with the signal name when the child is killed', async () => {
    if (process.platform === 'win32') return;
    const result = await runNode("process.kill(process.pid, 'SIGTERM');");
    assert.strictEqual(result.exitCode, -1);
    assert.strictEqual(result.stderr, 'Process terminated by signal SIGTERM');
  });
});
