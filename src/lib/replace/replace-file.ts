import * as fs from 'node:fs/promises';

import type { ReplaceFailure, ReplaceOutcome } from '../../config/types.js';
import { MAX_REPLACE_FAILURES, MAX_TEXT_FILE_SIZE } from '../constants.js';
import { ErrorCode, formatUnknownErrorMessage, McpError } from '../errors.js';
import { atomicWriteFile, decodeUtf8Strict } from '../fs-helpers.js';
import { isRealPathWithinRoot, normalizePath } from '../path-utils.js';
import {
  applyCompiledReplacement,
  buildReplaceRegex,
  type ReplaceRequest,
} from './apply.js';

export interface ReplaceFileOptions {
  maxFileSize?: number;
}

export interface FileReplaceResult {
  path: string;
  count: number;
  error?: string;
}

/**
 * Reads a file a replace may rewrite. Rejects non-files, files above
 * `maxFileSize` and content that is not valid UTF-8.
 */
export async function readReplaceableText(
  filePath: string,
  options: ReplaceFileOptions = {}
): Promise<string> {
  const { maxFileSize = MAX_TEXT_FILE_SIZE } = options;

  const stats = await fs.stat(filePath);
  if (!stats.isFile()) {
    throw new McpError(ErrorCode.E_NOT_FILE, `Not a file: ${filePath}`, filePath);
  }
  if (stats.size > maxFileSize) {
    throw new McpError(
      ErrorCode.E_TOO_LARGE,
      `File too large: ${filePath} (${stats.size} bytes > ${maxFileSize} bytes)`,
      filePath,
      { size: stats.size, maxFileSize }
    );
  }

  const buffer = await fs.readFile(filePath);
  const text = decodeUtf8Strict(buffer);
  if (text === undefined) {
    throw new McpError(
      ErrorCode.E_INVALID_INPUT,
      `File is not valid UTF-8: ${filePath}`,
      filePath
    );
  }
  return text;
}

async function replaceWithRegex(
  filePath: string,
  regex: RegExp,
  request: ReplaceRequest,
  options: ReplaceFileOptions
): Promise<FileReplaceResult> {
  try {
    const content = await readReplaceableText(filePath, options);
    const result = applyCompiledReplacement(
      content,
      regex,
      request.replacement,
      request.useRegex
    );
    if (result.count > 0 && result.content !== content) {
      await atomicWriteFile(filePath, result.content, { encoding: 'utf-8' });
    }
    return { path: filePath, count: result.count };
  } catch (error) {
    return {
      path: filePath,
      count: 0,
      error: formatUnknownErrorMessage(error),
    };
  }
}

/**
 * Rewrites every match in one file. Never throws: a file that cannot be read,
 * decoded or written, or a pattern refused as unsafe, reports zero
 * replacements and the reason.
 */
export async function replaceInFile(
  filePath: string,
  request: ReplaceRequest,
  options: ReplaceFileOptions = {}
): Promise<FileReplaceResult> {
  let regex: RegExp | undefined;
  try {
    regex = buildReplaceRegex(request);
  } catch (error) {
    return { path: filePath, count: 0, error: formatUnknownErrorMessage(error) };
  }
  if (!regex) return { path: filePath, count: 0 };
  return await replaceWithRegex(filePath, regex, request, options);
}

function recordFailure(failures: ReplaceFailure[], failure: ReplaceFailure): void {
  if (failures.length >= MAX_REPLACE_FAILURES) return;
  failures.push(failure);
}

function uniquePaths(files: readonly string[]): string[] {
  return [...new Set(files.map((file) => normalizePath(file)))];
}

/**
 * Replaces across `files` one at a time. Duplicates are processed once.
 * Paths outside `root`, including symlinks resolving outside it, are skipped.
 * Files already rewritten stay rewritten when a later one fails.
 */
export async function replaceInFiles(
  files: readonly string[],
  root: string,
  request: ReplaceRequest,
  options: ReplaceFileOptions = {}
): Promise<ReplaceOutcome> {
  const failures: ReplaceFailure[] = [];
  let filesChanged = 0;
  let replacementsCount = 0;
  const targets = uniquePaths(files);

  let regex: RegExp | undefined;
  try {
    regex = buildReplaceRegex(request);
  } catch (error) {
    const message = formatUnknownErrorMessage(error);
    for (const target of targets) {
      recordFailure(failures, { path: target, error: message });
    }
    return { filesChanged, replacementsCount, failures };
  }
  if (!regex) return { filesChanged, replacementsCount, failures };

  for (const target of targets) {
    if (!(await isRealPathWithinRoot(target, root))) {
      recordFailure(failures, {
        path: target,
        error: 'Path is outside the search root',
      });
      continue;
    }

    const result = await replaceWithRegex(target, regex, request, options);
    if (result.error !== undefined) {
      recordFailure(failures, { path: result.path, error: result.error });
    }
    if (result.count > 0) {
      filesChanged++;
      replacementsCount += result.count;
    }
  }

  return { filesChanged, replacementsCount, failures };
}
