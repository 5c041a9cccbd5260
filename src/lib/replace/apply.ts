import safeRegex from 'safe-regex2';

import type { MatchOptions } from '../../config/types.js';
import { ErrorCode, McpError } from '../errors.js';
import {
  buildAsciiWordPattern,
  buildRegexFlags,
  buildSearchPattern,
  isBlankQuery,
  normalizeQuery,
} from '../search/pattern.js';

export type ReplaceRequest = Pick<
  MatchOptions,
  'query' | 'caseSensitive' | 'useRegex' | 'wholeWord'
> & {
  readonly replacement: string;
};

export interface ReplacementResult {
  content: string;
  count: number;
}

function compileRegex(source: string, flags: string): RegExp | undefined {
  try {
    return new RegExp(source, flags);
  } catch {
    return undefined;
  }
}

function compileMatcher(
  query: string,
  request: Omit<ReplaceRequest, 'replacement'>
): RegExp | undefined {
  const flags = buildRegexFlags(request.caseSensitive);
  if (!request.wholeWord) {
    return compileRegex(buildSearchPattern(query, request), flags);
  }

  // Some patterns grep accepts are invalid under the u flag; those keep ASCII \b.
  return (
    compileRegex(buildSearchPattern(query, request), `${flags}u`) ??
    compileRegex(buildAsciiWordPattern(query, request), flags)
  );
}

/**
 * Compiles the matcher a replace run uses. Returns `undefined` for a blank
 * query or a pattern that does not compile. Throws `E_INVALID_PATTERN` for a
 * regex that could backtrack catastrophically.
 */
export function buildReplaceRegex(
  request: Omit<ReplaceRequest, 'replacement'>
): RegExp | undefined {
  if (isBlankQuery(request.query)) return undefined;

  const query = normalizeQuery(request.query);
  const regex = compileMatcher(query, request);
  if (!regex) return undefined;

  if (request.useRegex && !safeRegex(query)) {
    throw new McpError(
      ErrorCode.E_INVALID_PATTERN,
      `Unsafe regex pattern: ${query}`
    );
  }
  return regex;
}

export function applyCompiledReplacement(
  content: string,
  regex: RegExp,
  replacement: string,
  useRegex: boolean
): ReplacementResult {
  const count = Array.from(content.matchAll(regex)).length;
  if (count === 0) return { content, count };

  // Regex mode expands $1-style templates; literal mode inserts text as is.
  const next = useRegex
    ? content.replace(regex, replacement)
    : content.replace(regex, () => replacement);
  return { content: next, count };
}

export function applyReplacement(
  content: string,
  request: ReplaceRequest
): ReplacementResult {
  const regex = buildReplaceRegex(request);
  if (!regex) return { content, count: 0 };
  return applyCompiledReplacement(
    content,
    regex,
    request.replacement,
    request.useRegex
  );
}
