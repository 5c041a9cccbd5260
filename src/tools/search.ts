import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { z } from 'zod';

import type { MatchOptions } from '../config/types.js';
import { ErrorCode } from '../lib/errors.js';
import {
  SearchInputSchema,
  SearchStateInputSchema,
  SearchStateOutputSchema,
} from '../schemas.js';
import {
  buildToolErrorResponse,
  buildToolResponse,
  executeToolWithDiagnostics,
  IDEMPOTENT_WRITE_TOOL_ANNOTATIONS,
  READ_ONLY_TOOL_ANNOTATIONS,
  type ToolContract,
  type ToolExtra,
  type ToolRegistrationOptions,
  type ToolResponse,
  type ToolResult,
  withValidatedArgs,
  wrapToolHandler,
} from './shared.js';
import {
  buildStatePayload,
  buildStateText,
} from './shared/search-formatting.js';

type SearchArgs = z.infer<typeof SearchInputSchema>;
type SearchStateOutput = z.infer<typeof SearchStateOutputSchema>;

const STATE_TEXT_MAX_LINES = 200;

export const SEARCH_TOOL: ToolContract = {
  name: 'search',
  title: 'Search',
  description:
    'Search every file under the active root for a query and return matches grouped by file. ' +
    'Only the options you pass change; the rest keep their previous values. ' +
    'Uses git grep inside a repository and grep elsewhere. ' +
    '`fileFilter` takes comma-separated globs ("*.ts") or directory prefixes ("src/").',
  inputSchema: SearchInputSchema,
  outputSchema: SearchStateOutputSchema,
  annotations: IDEMPOTENT_WRITE_TOOL_ANNOTATIONS,
} as const;

export const SEARCH_STATE_TOOL: ToolContract = {
  name: 'search_state',
  title: 'Search State',
  description:
    'Return the current search state: options, results, errors and the last replace outcome. ' +
    'Does not start a scan.',
  inputSchema: SearchStateInputSchema,
  outputSchema: SearchStateOutputSchema,
  annotations: READ_ONLY_TOOL_ANNOTATIONS,
} as const;

function extractOptionPatch(args: SearchArgs): Partial<MatchOptions> {
  const patch: { -readonly [K in keyof MatchOptions]?: MatchOptions[K] } = {};
  if (args.query !== undefined) patch.query = args.query;
  if (args.caseSensitive !== undefined) {
    patch.caseSensitive = args.caseSensitive;
  }
  if (args.useRegex !== undefined) patch.useRegex = args.useRegex;
  if (args.wholeWord !== undefined) patch.wholeWord = args.wholeWord;
  if (args.fileFilter !== undefined) patch.fileFilter = args.fileFilter;
  return patch;
}

async function handleSearch(
  args: SearchArgs,
  options: ToolRegistrationOptions
): Promise<ToolResponse<SearchStateOutput>> {
  const { coordinator } = options;
  const patch = extractOptionPatch(args);

  if (args.replaceText !== undefined) {
    coordinator.setReplaceText(args.replaceText);
  }
  if (Object.keys(patch).length > 0) {
    coordinator.setOptions(patch);
  }
  if (args.refresh) {
    coordinator.refresh();
  } else if (args.immediate) {
    coordinator.flush();
  }
  if (args.wait) {
    await coordinator.whenIdle();
  }

  const state = coordinator.getState();
  return buildToolResponse(
    buildStateText(state, args.maxResultsInText),
    buildStatePayload(state, { includeResults: true })
  );
}

export function registerSearchTool(
  server: McpServer,
  options: ToolRegistrationOptions
): void {
  const handler = (
    args: SearchArgs,
    _extra: ToolExtra
  ): Promise<ToolResult<SearchStateOutput>> =>
    executeToolWithDiagnostics({
      toolName: 'search',
      run: () => handleSearch(args, options),
      onError: (error) => buildToolErrorResponse(error, ErrorCode.E_UNKNOWN),
    });

  const wrappedHandler = wrapToolHandler(handler, {
    guard: options.isInitialized,
    progressMessage: (args) => `search: ${JSON.stringify(args.query ?? '')}`,
    completionMessage: (_args, result) => {
      if (result.isError) return 'search • failed';
      const sc = result.structuredContent;
      if (!sc.ok) return 'search • failed';
      return `search • ${sc.totalMatches} matches`;
    },
  });

  server.registerTool(
    'search',
    { ...SEARCH_TOOL },
    withValidatedArgs(SearchInputSchema, wrappedHandler)
  );
}

export function registerSearchStateTool(
  server: McpServer,
  options: ToolRegistrationOptions
): void {
  const handler = (
    args: z.infer<typeof SearchStateInputSchema>,
    _extra: ToolExtra
  ): Promise<ToolResult<SearchStateOutput>> =>
    executeToolWithDiagnostics({
      toolName: 'search_state',
      run: () => {
        const state = options.coordinator.getState();
        return buildToolResponse(
          buildStateText(state, args.includeResults ? STATE_TEXT_MAX_LINES : 0),
          buildStatePayload(state, { includeResults: args.includeResults })
        );
      },
      onError: (error) => buildToolErrorResponse(error, ErrorCode.E_UNKNOWN),
    });

  const wrappedHandler = wrapToolHandler(handler, {
    guard: options.isInitialized,
  });

  server.registerTool(
    'search_state',
    { ...SEARCH_STATE_TOOL },
    withValidatedArgs(SearchStateInputSchema, wrappedHandler)
  );
}
