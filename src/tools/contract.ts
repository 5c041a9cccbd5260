import type { ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';

import type { ZodType } from 'zod';

/** Static description of one search tool, spread into `registerTool`. */
export interface ToolContract {
  name: string;
  title: string;
  description: string;
  inputSchema: ZodType;
  outputSchema?: ZodType;
  annotations?: ToolAnnotations;
}
