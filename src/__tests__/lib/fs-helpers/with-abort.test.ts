import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { withAbort } from '../../../lib/fs-helpers.js';

void describe('withAbort', () => {
  void it('passes the value through without a signal', async () => {
    assert.strictEqual(await withAbort(Promise.resolve(3)), 3);
  });

  void it('rejects with the abort reason when it is an Error', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop scanning'));

    await assert.rejects(
      withAbort(Promise.resolve('ok'), controller.signal),
      /stop scanning/
    );
  });

  void it('rejects a pending operation once the signal fires', async () => {
    const controller = new AbortController();
    const wrapped = withAbort(new Promise<void>(() => {}), controller.signal);

    controller.abort('not an error');

    await assert.rejects(wrapped, (error: unknown) => {
      assert.ok(error instanceof Error);
      assert.strictEqual(error.name, 'AbortError');
      assert.strictEqual(error.message, 'Operation aborted');
      return true;
    });
  });

  void it('keeps the original rejection when not aborted', async () => {
    const controller = new AbortController();
    await assert.rejects(
      withAbort(Promise.reject(new Error('read failed')), controller.signal),
      /read failed/
    );
  });
});
