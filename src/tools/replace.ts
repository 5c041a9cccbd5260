import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { z } from 'zod';

import type { ReplaceOutcome } from '../config/types.js';
import { ErrorCode } from '../lib/errors.js';
import {
  ReplaceAllInputSchema,
  ReplaceInFileInputSchema,
  ReplaceOutputSchema,
} from '../schemas.js';
import {
  buildToolErrorResponse,
  buildToolResponse,
  DESTRUCTIVE_WRITE_TOOL_ANNOTATIONS,
  executeToolWithDiagnostics,
  type ToolContract,
  type ToolExtra,
  type ToolRegistrationOptions,
  type ToolResponse,
  type ToolResult,
  withValidatedArgs,
  wrapToolHandler,
} from './shared.js';
import {
  buildReplacePayload,
  formatReplaceOutcome,
} from './shared/search-formatting.js';

type ReplaceOutput = z.infer<typeof ReplaceOutputSchema>;

export const REPLACE_IN_FILE_TOOL: ToolContract = {
  name: 'replace_in_file',
  title: 'Replace In File',
  description:
    'Replace every match of the current search in one file with the current replaceText. ' +
    'Set both with the search tool first; run preview_replace to check the result. ' +
    'The file is rewritten atomically and the search re-runs when anything changed.',
  inputSchema: ReplaceInFileInputSchema,
  outputSchema: ReplaceOutputSchema,
  annotations: DESTRUCTIVE_WRITE_TOOL_ANNOTATIONS,
} as const;

export const REPLACE_ALL_TOOL: ToolContract = {
  name: 'replace_all',
  title: 'Replace All',
  description:
    'Replace every match of the current search in every file of the current results. ' +
    'Files are processed one at a time; a failure in one file does not undo the others.',
  inputSchema: ReplaceAllInputSchema,
  outputSchema: ReplaceOutputSchema,
  annotations: DESTRUCTIVE_WRITE_TOOL_ANNOTATIONS,
} as const;

async function respondWithOutcome(
  options: ToolRegistrationOptions,
  run: () => Promise<ReplaceOutcome>
): Promise<ToolResponse<ReplaceOutput>> {
  const outcome = await run();
  // The rescan a successful replace schedules should land before we answer.
  await options.coordinator.whenIdle();
  return buildToolResponse(
    formatReplaceOutcome(outcome),
    buildReplacePayload(outcome)
  );
}

function completionMessage(
  label: string,
  result: ToolResult<ReplaceOutput>
): string {
  if (result.isError) return `${label} • failed`;
  const sc = result.structuredContent;
  if (!sc.ok) return `${label} • failed`;
  return `${label} • ${sc.replacementsCount} replacements`;
}

export function registerReplaceInFileTool(
  server: McpServer,
  options: ToolRegistrationOptions
): void {
  const handler = (
    args: z.infer<typeof ReplaceInFileInputSchema>,
    _extra: ToolExtra
  ): Promise<ToolResult<ReplaceOutput>> =>
    executeToolWithDiagnostics({
      toolName: 'replace_in_file',
      context: { path: args.path },
      run: () =>
        respondWithOutcome(options, () =>
          options.coordinator.replaceInFile(args.path)
        ),
      onError: (error) =>
        buildToolErrorResponse(error, ErrorCode.E_UNKNOWN, args.path),
    });

  const wrappedHandler = wrapToolHandler(handler, {
    guard: options.isInitialized,
    progressMessage: (args) => `replace_in_file: ${args.path}`,
    completionMessage: (_args, result) =>
      completionMessage('replace_in_file', result),
  });

  server.registerTool(
    'replace_in_file',
    { ...REPLACE_IN_FILE_TOOL },
    withValidatedArgs(ReplaceInFileInputSchema, wrappedHandler)
  );
}

export function registerReplaceAllTool(
  server: McpServer,
  options: ToolRegistrationOptions
): void {
  const handler = (
    _args: z.infer<typeof ReplaceAllInputSchema>,
    _extra: ToolExtra
  ): Promise<ToolResult<ReplaceOutput>> =>
    executeToolWithDiagnostics({
      toolName: 'replace_all',
      run: () =>
        respondWithOutcome(options, () => options.coordinator.replaceAll()),
      onError: (error) => buildToolErrorResponse(error, ErrorCode.E_UNKNOWN),
    });

  const wrappedHandler = wrapToolHandler(handler, {
    guard: options.isInitialized,
    progressMessage: () => 'replace_all',
    completionMessage: (_args, result) =>
      completionMessage('replace_all', result),
  });

  server.registerTool(
    'replace_all',
    { ...REPLACE_ALL_TOOL },
    withValidatedArgs(ReplaceAllInputSchema, wrappedHandler)
  );
}
