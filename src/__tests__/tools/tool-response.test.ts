import assert from 'node:assert/strict';
import { it } from 'node:test';

import { SearchCoordinator } from '../../lib/coordinator/search-coordinator.js';
import { ErrorCode, McpError } from '../../lib/errors.js';
import { ToolErrorResponseSchema } from '../../schemas.js';
import { buildToolErrorResponse, buildToolResponse, registerAllTools } from '../../tools.js';
import { createNamedToolCapture } from '../shared/diagnostics-env.js';

void it('buildToolResponse pairs the text with structured content', () => {
  const structured = { ok: true, value: 123 };
  const result = buildToolResponse('human text', structured);

  assert.deepStrictEqual(result.content, [{ type: 'text', text: 'human text' }]);
  assert.deepStrictEqual(result.structuredContent, structured);
});

void it('buildToolErrorResponse produces a schema-valid error payload', () => {
  const result = buildToolErrorResponse(
    new Error('boom'),
    ErrorCode.E_INVALID_PATTERN,
    '/workspace/a.txt'
  );

  assert.strictEqual(result.isError, true);
  assert.strictEqual(ToolErrorResponseSchema.safeParse(result.structuredContent).success, true);
  assert.strictEqual(result.structuredContent.error.code, ErrorCode.E_INVALID_PATTERN);
  assert.strictEqual(result.structuredContent.error.path, '/workspace/a.txt');
  assert.strictEqual(
    result.content[0]?.type === 'text' ? result.content[0].text.split('\n')[0] : undefined,
    'Error [E_INVALID_PATTERN]: boom'
  );
});

void it('buildToolErrorResponse keeps the code of a classified error', () => {
  const result = buildToolErrorResponse(
    new McpError(ErrorCode.E_NO_ROOT, 'No search root is active'),
    ErrorCode.E_UNKNOWN
  );

  assert.strictEqual(result.structuredContent.error.code, ErrorCode.E_NO_ROOT);
  assert.strictEqual(result.structuredContent.error.path, undefined);
});

void it('registers every search tool', () => {
  const { fakeServer, names } = createNamedToolCapture();
  registerAllTools(fakeServer, { coordinator: new SearchCoordinator() });

  assert.deepStrictEqual(names().sort(), [
    'clear_search',
    'preview_replace',
    'replace_all',
    'replace_in_file',
    'search',
    'search_state',
  ]);
});

void it('rejects tool calls before notifications/initialized', async () => {
  const { fakeServer, getHandler } = createNamedToolCapture();
  registerAllTools(fakeServer, {
    coordinator: new SearchCoordinator(),
    isInitialized: () => false,
  });

  for (const name of ['search', 'replace_all', 'clear_search']) {
    const result = await getHandler(name)({});
    const typed = result as {
      isError?: boolean;
      structuredContent?: { error?: { code?: string; message?: string } };
    };
    assert.strictEqual(typed.isError, true);
    assert.strictEqual(typed.structuredContent?.error?.code, ErrorCode.E_INVALID_INPUT);
    assert.match(typed.structuredContent?.error?.message ?? '', /notifications\/initialized/);
  }
});

void it('runs tool calls once initialized', async () => {
  let initialized = false;
  const { fakeServer, getHandler } = createNamedToolCapture();
  const coordinator = new SearchCoordinator();
  registerAllTools(fakeServer, {
    coordinator,
    isInitialized: () => initialized,
  });

  initialized = true;
  const result = (await getHandler('search_state')({})) as {
    isError?: boolean;
    structuredContent?: { ok?: boolean };
  };

  assert.strictEqual(result.isError, undefined);
  assert.strictEqual(result.structuredContent?.ok, true);
  coordinator.close();
});
