import * as path from 'node:path';

import { createTwoFilesPatch } from 'diff';

import { applyReplacement, type ReplaceRequest } from './apply.js';
import { readReplaceableText, type ReplaceFileOptions } from './replace-file.js';

const DEFAULT_CONTEXT_LINES = 3;

export interface ReplacePreview {
  path: string;
  relativePath: string;
  count: number;
  /** Unified diff; empty when nothing would change. */
  diff: string;
}

export interface PreviewOptions extends ReplaceFileOptions {
  context?: number;
}

export async function previewReplacement(
  filePath: string,
  root: string,
  request: ReplaceRequest,
  options: PreviewOptions = {}
): Promise<ReplacePreview> {
  const relativePath = path.relative(root, filePath);
  const original = await readReplaceableText(filePath, options);
  const { content, count } = applyReplacement(original, request);

  if (count === 0 || content === original) {
    return { path: filePath, relativePath, count, diff: '' };
  }

  const diff = createTwoFilesPatch(
    relativePath,
    relativePath,
    original,
    content,
    undefined,
    undefined,
    { context: options.context ?? DEFAULT_CONTEXT_LINES }
  );
  return { path: filePath, relativePath, count, diff };
}
