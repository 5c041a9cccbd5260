import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  classifyError,
  createDetailedError,
  ErrorCode,
  formatDetailedError,
  formatUnknownErrorMessage,
  getSuggestion,
  isNodeError,
  McpError,
  NODE_ERROR_CODE_MAP,
} from '../../lib/errors.js';

void describe('isNodeError', () => {
  void it('accepts an Error carrying a string code', () => {
    const error = Object.assign(new Error('test'), { code: 'ENOENT' });
    assert.strictEqual(isNodeError(error), true);
  });

  void it('rejects plain errors and non-errors', () => {
    assert.strictEqual(isNodeError(new Error('test')), false);
    assert.strictEqual(isNodeError({ code: 'ENOENT' }), false);
    assert.strictEqual(isNodeError('ENOENT'), false);
    assert.strictEqual(isNodeError(undefined), false);
  });

  void it('rejects a numeric code', () => {
    const error = Object.assign(new Error('test'), { code: 123 });
    assert.strictEqual(isNodeError(error), false);
  });
});

void describe('classifyError', () => {
  void it('maps Node error codes', () => {
    assert.strictEqual(NODE_ERROR_CODE_MAP['ENOENT'], ErrorCode.E_NOT_FOUND);
    const error = Object.assign(new Error('denied'), { code: 'EACCES' });
    assert.strictEqual(classifyError(error), ErrorCode.E_PERMISSION_DENIED);
  });

  void it('uses the code of an McpError', () => {
    const error = new McpError(ErrorCode.E_NO_ROOT, 'no root');
    assert.strictEqual(classifyError(error), ErrorCode.E_NO_ROOT);
  });

  void it('falls back to the message for ENOENT text', () => {
    const error = new Error('ENOENT: no such file or directory');
    assert.strictEqual(classifyError(error), ErrorCode.E_NOT_FOUND);
  });

  void it('returns E_UNKNOWN otherwise', () => {
    assert.strictEqual(classifyError(new Error('boom')), ErrorCode.E_UNKNOWN);
    assert.strictEqual(classifyError(42), ErrorCode.E_UNKNOWN);
  });
});

void describe('createDetailedError', () => {
  void it('carries code, path, suggestion and details of an McpError', () => {
    const error = new McpError(
      ErrorCode.E_TOO_LARGE,
      'File too large',
      '/root/big.txt',
      { size: 10 }
    );
    const detailed = createDetailedError(error);
    assert.deepStrictEqual(detailed, {
      code: ErrorCode.E_TOO_LARGE,
      message: 'File too large',
      suggestion: getSuggestion(ErrorCode.E_TOO_LARGE),
      path: '/root/big.txt',
      details: { size: 10 },
    });
  });

  void it('prefers an explicit path', () => {
    const error = new McpError(ErrorCode.E_NOT_FOUND, 'missing', '/a');
    assert.strictEqual(createDetailedError(error, '/b').path, '/b');
  });
});

void describe('formatDetailedError', () => {
  void it('renders code, message, path and suggestion lines', () => {
    const text = formatDetailedError({
      code: ErrorCode.E_NOT_FOUND,
      message: 'missing',
      path: '/x',
      suggestion: 'Check it.',
    });
    assert.strictEqual(
      text,
      'Error [E_NOT_FOUND]: missing\nPath: /x\nSuggestion: Check it.'
    );
  });
});

void describe('formatUnknownErrorMessage', () => {
  void it('handles errors, strings and other values', () => {
    assert.strictEqual(formatUnknownErrorMessage(new Error('boom')), 'boom');
    assert.strictEqual(formatUnknownErrorMessage('plain'), 'plain');
    assert.strictEqual(formatUnknownErrorMessage(7), '7');
  });
});
