import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { z } from 'zod';

import { ErrorCode } from '../lib/errors.js';
import { ClearSearchInputSchema, SearchStateOutputSchema } from '../schemas.js';
import {
  buildToolErrorResponse,
  buildToolResponse,
  executeToolWithDiagnostics,
  IDEMPOTENT_WRITE_TOOL_ANNOTATIONS,
  type ToolContract,
  type ToolExtra,
  type ToolRegistrationOptions,
  type ToolResult,
  withValidatedArgs,
  wrapToolHandler,
} from './shared.js';
import { buildStatePayload } from './shared/search-formatting.js';

export const CLEAR_SEARCH_TOOL: ToolContract = {
  name: 'clear_search',
  title: 'Clear Search',
  description:
    'Reset the query, file filter, replacement text, results and last replace outcome. ' +
    'Other match options are kept.',
  inputSchema: ClearSearchInputSchema,
  outputSchema: SearchStateOutputSchema,
  annotations: IDEMPOTENT_WRITE_TOOL_ANNOTATIONS,
} as const;

export function registerClearSearchTool(
  server: McpServer,
  options: ToolRegistrationOptions
): void {
  const handler = (
    _args: z.infer<typeof ClearSearchInputSchema>,
    _extra: ToolExtra
  ): Promise<ToolResult<z.infer<typeof SearchStateOutputSchema>>> =>
    executeToolWithDiagnostics({
      toolName: 'clear_search',
      run: () => {
        options.coordinator.clear();
        const state = options.coordinator.getState();
        return buildToolResponse(
          'Search cleared',
          buildStatePayload(state, { includeResults: false })
        );
      },
      onError: (error) => buildToolErrorResponse(error, ErrorCode.E_UNKNOWN),
    });

  const wrappedHandler = wrapToolHandler(handler, {
    guard: options.isInitialized,
  });

  server.registerTool(
    'clear_search',
    { ...CLEAR_SEARCH_TOOL },
    withValidatedArgs(ClearSearchInputSchema, wrappedHandler)
  );
}
