import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { z } from 'zod';

import { joinLines, pluralize } from '../config/formatting.js';
import type { SearchCoordinator } from '../lib/coordinator/search-coordinator.js';
import {
  ErrorCode,
  formatUnknownErrorMessage,
  McpError,
} from '../lib/errors.js';
import { isRealPathWithinRoot, resolveAgainstRoot } from '../lib/path-utils.js';
import { previewReplacement } from '../lib/replace/preview.js';
import {
  PreviewReplaceInputSchema,
  PreviewReplaceOutputSchema,
} from '../schemas.js';
import {
  buildToolErrorResponse,
  buildToolResponse,
  executeToolWithDiagnostics,
  READ_ONLY_TOOL_ANNOTATIONS,
  type ToolContract,
  type ToolExtra,
  type ToolRegistrationOptions,
  type ToolResponse,
  type ToolResult,
  withValidatedArgs,
  wrapToolHandler,
} from './shared.js';

type PreviewArgs = z.infer<typeof PreviewReplaceInputSchema>;
type PreviewOutput = z.infer<typeof PreviewReplaceOutputSchema>;

export const PREVIEW_REPLACE_TOOL: ToolContract = {
  name: 'preview_replace',
  title: 'Preview Replace',
  description:
    'Show unified diffs of what replace_in_file or replace_all would change, without writing. ' +
    'Uses the current search options and replaceText.',
  inputSchema: PreviewReplaceInputSchema,
  outputSchema: PreviewReplaceOutputSchema,
  annotations: READ_ONLY_TOOL_ANNOTATIONS,
} as const;

async function resolveTargets(
  coordinator: SearchCoordinator,
  args: PreviewArgs
): Promise<{ root: string; files: string[]; truncated: boolean }> {
  const { root, results } = coordinator.getState();
  if (root === undefined) {
    throw new McpError(ErrorCode.E_NO_ROOT, 'No search root is active');
  }

  if (args.path !== undefined) {
    const target = resolveAgainstRoot(args.path, root);
    if (!(await isRealPathWithinRoot(target, root))) {
      throw new McpError(
        ErrorCode.E_ACCESS_DENIED,
        `Path is outside the search root: ${args.path}`,
        args.path
      );
    }
    return { root, files: [target], truncated: false };
  }

  const files = results.map((result) => result.path);
  return {
    root,
    files: files.slice(0, args.maxFiles),
    truncated: files.length > args.maxFiles,
  };
}

async function handlePreviewReplace(
  coordinator: SearchCoordinator,
  args: PreviewArgs
): Promise<ToolResponse<PreviewOutput>> {
  const { root, files, truncated } = await resolveTargets(coordinator, args);
  const request = coordinator.getReplaceRequest();

  const previews: PreviewOutput['files'] = [];
  const failures: PreviewOutput['failures'] = [];
  let totalReplacements = 0;

  for (const file of files) {
    if (!(await isRealPathWithinRoot(file, root))) {
      failures.push({ path: file, error: 'Path is outside the search root' });
      continue;
    }
    try {
      const preview = await previewReplacement(file, root, request, {
        maxFileSize: coordinator.fileSizeLimit,
        ...(args.context !== undefined ? { context: args.context } : {}),
      });
      if (preview.count === 0) continue;
      previews.push(preview);
      totalReplacements += preview.count;
    } catch (error) {
      failures.push({ path: file, error: formatUnknownErrorMessage(error) });
    }
  }

  const text = joinLines([
    `${pluralize(totalReplacements, 'replacement')} in ${pluralize(previews.length, 'file')} (preview, nothing written)`,
    ...previews.map((preview) => preview.diff),
    ...failures.map((failure) => `Failed: ${failure.path}: ${failure.error}`),
  ]);

  return buildToolResponse(text, {
    ok: true,
    files: previews,
    totalReplacements,
    truncated,
    failures,
  });
}

export function registerPreviewReplaceTool(
  server: McpServer,
  options: ToolRegistrationOptions
): void {
  const handler = (
    args: PreviewArgs,
    _extra: ToolExtra
  ): Promise<ToolResult<PreviewOutput>> =>
    executeToolWithDiagnostics({
      toolName: 'preview_replace',
      ...(args.path !== undefined ? { context: { path: args.path } } : {}),
      run: () => handlePreviewReplace(options.coordinator, args),
      onError: (error) =>
        buildToolErrorResponse(error, ErrorCode.E_UNKNOWN, args.path),
    });

  const wrappedHandler = wrapToolHandler(handler, {
    guard: options.isInitialized,
  });

  server.registerTool(
    'preview_replace',
    { ...PREVIEW_REPLACE_TOOL },
    withValidatedArgs(PreviewReplaceInputSchema, wrappedHandler)
  );
}
