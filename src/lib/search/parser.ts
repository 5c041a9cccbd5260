import * as path from 'node:path';

import type { FileResult, LineMatch } from '../../config/types.js';

interface ParsedLine {
  relativePath: string;
  lineNumber: number;
  lineContent: string;
}

interface MutableFileResult {
  path: string;
  relativePath: string;
  matches: LineMatch[];
}

export interface CappedResults {
  results: FileResult[];
  totalMatches: number;
  truncated: boolean;
}

const LINE_NUMBER_PATTERN = /^[0-9]+$/;

function findPathSeparator(line: string): number {
  for (let index = 0; index < line.length; index++) {
    if (line[index] === ':' && (index === 0 || line[index - 1] !== '\\')) {
      return index;
    }
  }
  return -1;
}

// Drops a leading "./" and unescapes "\:" inside file names.
function normalizeRelativePath(raw: string): string {
  return path.normalize(raw.replaceAll('\\:', ':'));
}

export function parseGrepLine(line: string): ParsedLine | undefined {
  const pathEnd = findPathSeparator(line);
  if (pathEnd <= 0) return undefined;

  const numberEnd = line.indexOf(':', pathEnd + 1);
  if (numberEnd === -1) return undefined;

  const numberText = line.slice(pathEnd + 1, numberEnd);
  if (!LINE_NUMBER_PATTERN.test(numberText)) return undefined;
  const lineNumber = Number.parseInt(numberText, 10);
  if (lineNumber < 1) return undefined;

  return {
    relativePath: normalizeRelativePath(line.slice(0, pathEnd)),
    lineNumber,
    lineContent: line.slice(numberEnd + 1),
  };
}

/**
 * Parses `path:line:content` output into per-file results. Files appear in the
 * order they were first seen and matches in the order they were printed.
 * Lines that do not fit the format are dropped.
 */
export function parseGrepOutput(output: string, root: string): FileResult[] {
  const byPath = new Map<string, MutableFileResult>();

  for (const rawLine of output.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.length === 0) continue;

    const parsed = parseGrepLine(line);
    if (!parsed) continue;

    const absolutePath = path.isAbsolute(parsed.relativePath)
      ? parsed.relativePath
      : path.join(root, parsed.relativePath);

    let entry = byPath.get(absolutePath);
    if (!entry) {
      entry = {
        path: absolutePath,
        relativePath: parsed.relativePath,
        matches: [],
      };
      byPath.set(absolutePath, entry);
    }
    entry.matches.push({
      lineNumber: parsed.lineNumber,
      lineContent: parsed.lineContent,
    });
  }

  return [...byPath.values()];
}

/** Keeps at most `maxMatches` line matches, preserving file and line order. */
export function capResults(
  results: readonly FileResult[],
  maxMatches: number
): CappedResults {
  const capped: FileResult[] = [];
  let remaining = maxMatches;
  let truncated = false;

  for (const result of results) {
    if (remaining <= 0) {
      truncated = true;
      break;
    }
    if (result.matches.length <= remaining) {
      capped.push(result);
      remaining -= result.matches.length;
      continue;
    }
    capped.push({ ...result, matches: result.matches.slice(0, remaining) });
    remaining = 0;
    truncated = true;
  }

  return {
    results: capped,
    totalMatches: maxMatches - remaining,
    truncated,
  };
}
