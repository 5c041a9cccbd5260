import type { MatchOptions } from '../../config/types.js';

const REGEX_METACHARACTERS = /[.*+?^${}()|[\]\\]/g;

export type PatternOptions = Pick<MatchOptions, 'useRegex' | 'wholeWord'>;

export interface FileFilter {
  /** Glob patterns a backend should treat as include filters. */
  readonly includeGlobs: readonly string[];
  /** Bare directory prefixes usable as search roots. */
  readonly directories: readonly string[];
  /** Every token in its original order. */
  readonly tokens: readonly string[];
}

export function escapeRegExp(value: string): string {
  return value.replace(REGEX_METACHARACTERS, '\\$&');
}

export function normalizeQuery(query: string): string {
  return query.trim();
}

export function isBlankQuery(query: string): boolean {
  return normalizeQuery(query).length === 0;
}

// grep -w word constituents: letters, digits and underscore, in any script.
const WORD_CHAR = '[\\p{L}\\p{M}\\p{N}_]';

function wrapWord(source: string, options: PatternOptions): string {
  return options.useRegex ? `(?:${source})` : source;
}

/**
 * Builds the regex source matching `query` under the given options. Literal
 * queries are escaped. Whole-word mode wraps the result in Unicode-aware
 * boundaries, in line with the `-w` flag the backends receive, and must be
 * compiled with the `u` flag.
 */
export function buildSearchPattern(
  query: string,
  options: PatternOptions
): string {
  const source = options.useRegex ? query : escapeRegExp(query);
  if (!options.wholeWord) return source;
  return `(?<!${WORD_CHAR})${wrapWord(source, options)}(?!${WORD_CHAR})`;
}

/** Whole-word source using ASCII `\b`, for patterns invalid under `u`. */
export function buildAsciiWordPattern(
  query: string,
  options: PatternOptions
): string {
  const source = options.useRegex ? query : escapeRegExp(query);
  return `\\b${wrapWord(source, options)}\\b`;
}

export function buildRegexFlags(caseSensitive: boolean): string {
  return caseSensitive ? 'gm' : 'gim';
}

export function splitFileFilter(fileFilter: string): string[] {
  return fileFilter
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

// "src/" and "lib" are directories; "*.ts", "README.md" and "src/**" are globs.
export function isDirectoryToken(token: string): boolean {
  if (token.endsWith('/')) return true;
  return !token.includes('*') && !token.includes('.');
}

export function parseFileFilter(fileFilter: string): FileFilter {
  const tokens = splitFileFilter(fileFilter);
  const includeGlobs: string[] = [];
  const directories: string[] = [];

  for (const token of tokens) {
    if (isDirectoryToken(token)) {
      directories.push(token);
    } else {
      includeGlobs.push(token);
    }
  }

  return { includeGlobs, directories, tokens };
}
