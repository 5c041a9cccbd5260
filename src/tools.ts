import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { registerClearSearchTool } from './tools/clear-search.js';
import { registerPreviewReplaceTool } from './tools/preview-replace.js';
import {
  registerReplaceAllTool,
  registerReplaceInFileTool,
} from './tools/replace.js';
import {
  registerSearchStateTool,
  registerSearchTool,
} from './tools/search.js';
import type { ToolRegistrationOptions } from './tools/shared.js';

export {
  buildToolErrorResponse,
  buildToolResponse,
  type ToolRegistrationOptions,
} from './tools/shared.js';

export function registerAllTools(
  server: McpServer,
  options: ToolRegistrationOptions
): void {
  registerSearchTool(server, options);
  registerSearchStateTool(server, options);
  registerReplaceInFileTool(server, options);
  registerReplaceAllTool(server, options);
  registerPreviewReplaceTool(server, options);
  registerClearSearchTool(server, options);
}
