import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ErrorCode, McpError } from '../../../lib/errors.js';
import {
  applyReplacement,
  buildReplaceRegex,
  type ReplaceRequest,
} from '../../../lib/replace/apply.js';

function request(patch: Partial<ReplaceRequest>): ReplaceRequest {
  return {
    query: 'alpha',
    caseSensitive: false,
    useRegex: false,
    wholeWord: false,
    replacement: 'omega',
    ...patch,
  };
}

void describe('applyReplacement', () => {
  void it('replaces every occurrence case-insensitively by default', () => {
    assert.deepStrictEqual(
      applyReplacement('Alpha alpha ALPHA', request({})),
      { content: 'omega omega omega', count: 3 }
    );
  });

  void it('respects case sensitivity', () => {
    assert.deepStrictEqual(
      applyReplacement('Alpha alpha ALPHA', request({ caseSensitive: true })),
      { content: 'Alpha omega ALPHA', count: 1 }
    );
  });

  void it('treats metacharacters literally outside regex mode', () => {
    assert.deepStrictEqual(
      applyReplacement('a.b axb', request({ query: 'a.b', replacement: 'X' })),
      { content: 'X axb', count: 1 }
    );
  });

  void it('inserts the replacement verbatim in literal mode', () => {
    assert.deepStrictEqual(
      applyReplacement('x', request({ query: 'x', replacement: '$&$1' })),
      { content: '$&$1', count: 1 }
    );
  });

  void it('expands capture groups in regex mode', () => {
    assert.deepStrictEqual(
      applyReplacement(
        'user@host',
        request({
          query: '(\\w+)@(\\w+)',
          useRegex: true,
          replacement: '$2 at $1',
        })
      ),
      { content: 'host at user', count: 1 }
    );
  });

  void it('limits literal whole-word matches to standalone words', () => {
    assert.deepStrictEqual(
      applyReplacement(
        'cat concat cat.',
        request({ query: 'cat', wholeWord: true, replacement: 'dog' })
      ),
      { content: 'dog concat dog.', count: 2 }
    );
  });

  void it('applies whole-word to the whole regex alternation', () => {
    assert.deepStrictEqual(
      applyReplacement(
        'foo food bar barn',
        request({
          query: 'foo|bar',
          useRegex: true,
          wholeWord: true,
          replacement: 'X',
        })
      ),
      { content: 'X food X barn', count: 2 }
    );
  });

  void it('anchors ^ and $ at line boundaries', () => {
    assert.deepStrictEqual(
      applyReplacement(
        'alpha\nbeta\nbeta2',
        request({ query: '^beta', useRegex: true, replacement: 'X' })
      ),
      { content: 'alpha\nX\nX2', count: 2 }
    );
  });

  void it('trims the query before matching', () => {
    assert.deepStrictEqual(applyReplacement('alpha', request({ query: ' alpha ' })), {
      content: 'omega',
      count: 1,
    });
  });

  void it('deletes matches for an empty replacement', () => {
    assert.deepStrictEqual(
      applyReplacement('beta alpha', request({ replacement: '' })),
      { content: 'beta ', count: 1 }
    );
  });

  void it('counts matches even when the text does not change', () => {
    assert.deepStrictEqual(
      applyReplacement('alpha', request({ replacement: 'alpha' })),
      { content: 'alpha', count: 1 }
    );
  });

  void it('leaves content alone for a blank query', () => {
    assert.deepStrictEqual(applyReplacement('alpha', request({ query: '' })), {
      content: 'alpha',
      count: 0,
    });
    assert.deepStrictEqual(applyReplacement('  ', request({ query: '  ' })), {
      content: '  ',
      count: 0,
    });
  });

  void it('leaves content alone for an invalid regex', () => {
    assert.deepStrictEqual(
      applyReplacement('al(pha', request({ query: 'al(pha', useRegex: true })),
      { content: 'al(pha', count: 0 }
    );
  });

  void it('refuses a regex with catastrophic backtracking', () => {
    assert.throws(
      () => applyReplacement('aaaa', request({ query: '(a+)+$', useRegex: true })),
      (error: unknown) =>
        error instanceof McpError &&
        error.code === ErrorCode.E_INVALID_PATTERN &&
        error.message === 'Unsafe regex pattern: (a+)+$'
    );
  });

  void it('matches whole words that start or end with non-ASCII letters', () => {
    assert.deepStrictEqual(
      applyReplacement(
        'un café noir, cafés',
        request({ query: 'café', wholeWord: true, replacement: 'thé' })
      ),
      { content: 'un thé noir, cafés', count: 1 }
    );
  });

  void it('falls back to ASCII boundaries for a pattern invalid under u', () => {
    assert.deepStrictEqual(
      applyReplacement(
        'foo-bar foo-barx',
        request({
          query: 'foo\\-bar',
          useRegex: true,
          wholeWord: true,
          replacement: 'X',
        })
      ),
      { content: 'X foo-barx', count: 1 }
    );
  });

  void it('returns zero when nothing matches', () => {
    assert.deepStrictEqual(applyReplacement('gamma', request({})), {
      content: 'gamma',
      count: 0,
    });
  });

  void it('does not rematch inside inserted text', () => {
    assert.deepStrictEqual(
      applyReplacement('alpha', request({ replacement: 'alpha alpha' })),
      { content: 'alpha alpha', count: 1 }
    );
  });
});

void describe('buildReplaceRegex', () => {
  void it('compiles with global and multiline flags', () => {
    const regex = buildReplaceRegex(request({ caseSensitive: true }));
    assert.ok(regex);
    assert.strictEqual(regex.flags, 'gm');
    assert.strictEqual(regex.source, 'alpha');
  });

  void it('adds the u flag in whole-word mode', () => {
    const regex = buildReplaceRegex(request({ wholeWord: true }));
    assert.ok(regex);
    assert.strictEqual(regex.flags, 'gimu');
  });

  void it('returns undefined for a blank query', () => {
    assert.strictEqual(buildReplaceRegex(request({ query: ' ' })), undefined);
  });
});
