import type {
  ContentBlock,
  ProgressNotificationParams,
} from '@modelcontextprotocol/sdk/types.js';

import { z } from 'zod';

import {
  createDetailedError,
  ErrorCode,
  formatDetailedError,
  getSuggestion,
  McpError,
} from '../lib/errors.js';
import type { SearchCoordinator } from '../lib/coordinator/search-coordinator.js';
import { withToolDiagnostics } from '../lib/observability.js';
import type { ToolErrorResponseSchema } from '../schemas.js';

export { type ToolContract } from './contract.js';

export const READ_ONLY_TOOL_ANNOTATIONS = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: false,
} as const;

export const DESTRUCTIVE_WRITE_TOOL_ANNOTATIONS = {
  readOnlyHint: false,
  destructiveHint: true,
  openWorldHint: false,
} as const;

export const IDEMPOTENT_WRITE_TOOL_ANNOTATIONS = {
  readOnlyHint: false,
  idempotentHint: true,
  openWorldHint: false,
} as const;

export interface ToolRegistrationOptions {
  coordinator: SearchCoordinator;
  isInitialized?: () => boolean;
}

function buildContentBlock<T>(
  text: string,
  structuredContent: T
): { content: ContentBlock[]; structuredContent: T } {
  return {
    content: [{ type: 'text', text }],
    structuredContent,
  };
}

function resolveDetailedError(
  error: unknown,
  defaultCode: ErrorCode,
  path?: string
): ReturnType<typeof createDetailedError> {
  const detailed = createDetailedError(error, path);
  if (detailed.code === ErrorCode.E_UNKNOWN) {
    detailed.code = defaultCode;
    detailed.suggestion = getSuggestion(defaultCode);
  }
  return detailed;
}

export function buildToolResponse<T>(
  text: string,
  structuredContent: T
): {
  content: ContentBlock[];
  structuredContent: T;
} {
  return buildContentBlock(text, structuredContent);
}

export type ToolResponse<T> = ReturnType<typeof buildToolResponse<T>> &
  Record<string, unknown>;

type ToolErrorStructuredContent = z.infer<typeof ToolErrorResponseSchema>;

interface ToolErrorResponse extends Record<string, unknown> {
  content: ContentBlock[];
  structuredContent: ToolErrorStructuredContent;
  isError: true;
}

export type ToolResult<T> = ToolResponse<T> | ToolErrorResponse;

function parseToolArgs<Schema extends z.ZodType>(
  schema: Schema,
  args: unknown
): z.infer<Schema> {
  const candidate = args === undefined ? {} : args;
  const parsed = schema.safeParse(candidate);
  if (parsed.success) {
    return parsed.data;
  }

  throw new McpError(
    ErrorCode.E_INVALID_INPUT,
    `Invalid tool arguments: ${parsed.error.message}`,
    undefined,
    { errors: z.treeifyError(parsed.error) },
    parsed.error
  );
}

export function withValidatedArgs<Args, Result>(
  schema: z.ZodType<Args>,
  handler: (args: Args, extra: ToolExtra) => Promise<ToolResult<Result>>
): (args: unknown, extra?: ToolExtra) => Promise<ToolResult<Result>> {
  return async (args, extra) => {
    let normalizedArgs: Args;
    try {
      normalizedArgs = parseToolArgs(schema, args);
    } catch (error) {
      return buildToolErrorResponse(error, ErrorCode.E_INVALID_INPUT);
    }
    return handler(normalizedArgs, extra ?? {});
  };
}

type ProgressToken = string | number;

export interface ToolExtra {
  signal?: AbortSignal;
  _meta?: {
    progressToken?: ProgressToken | undefined;
  };
  sendNotification?: (notification: {
    method: 'notifications/progress';
    params: ProgressNotificationParams;
  }) => Promise<void>;
}

function canSendProgress(extra: ToolExtra): extra is ToolExtra & {
  _meta: { progressToken: ProgressToken };
  sendNotification: NonNullable<ToolExtra['sendNotification']>;
} {
  return (
    extra._meta?.progressToken !== undefined &&
    extra.sendNotification !== undefined
  );
}

async function reportProgress(
  extra: ToolExtra,
  progress: { current: number; total?: number; message?: string }
): Promise<void> {
  if (!canSendProgress(extra)) return;
  try {
    await extra.sendNotification({
      method: 'notifications/progress',
      params: {
        progressToken: extra._meta.progressToken,
        progress: progress.current,
        ...(progress.total !== undefined ? { total: progress.total } : {}),
        ...(progress.message !== undefined
          ? { message: progress.message }
          : {}),
      },
    });
  } catch (error) {
    console.error('Failed to send progress notification:', error);
  }
}

const NOT_INITIALIZED_ERROR = new McpError(
  ErrorCode.E_INVALID_INPUT,
  'Client not initialized; wait for notifications/initialized'
);

async function withToolErrorHandling<T>(
  run: () => Promise<ToolResponse<T>>,
  onError: (error: unknown) => ToolResult<T>
): Promise<ToolResult<T>> {
  try {
    return await run();
  } catch (error) {
    return onError(error);
  }
}

interface ToolExecutionOptions<T> {
  toolName: string;
  run: () => ToolResponse<T> | Promise<ToolResponse<T>>;
  onError: (error: unknown) => ToolResult<T>;
  context?: { path?: string };
}

export async function executeToolWithDiagnostics<T>(
  options: ToolExecutionOptions<T>
): Promise<ToolResult<T>> {
  return withToolDiagnostics(
    options.toolName,
    () => withToolErrorHandling(async () => options.run(), options.onError),
    options.context
  );
}

export function buildToolErrorResponse(
  error: unknown,
  defaultCode: ErrorCode,
  path?: string
): ToolErrorResponse {
  const detailed = resolveDetailedError(error, defaultCode, path);
  const text = formatDetailedError(detailed);

  const errorContent: ToolErrorStructuredContent['error'] = {
    code: detailed.code,
    message: detailed.message,
  };
  if (detailed.path !== undefined) {
    errorContent.path = detailed.path;
  }
  if (detailed.suggestion !== undefined) {
    errorContent.suggestion = detailed.suggestion;
  }

  const structuredContent: ToolErrorStructuredContent = {
    ok: false,
    error: errorContent,
  };
  return {
    ...buildContentBlock(text, structuredContent),
    isError: true,
  };
}

/**
 * Wraps a tool handler with the initialization guard and start/finish
 * progress notifications.
 */
export function wrapToolHandler<Args, Result>(
  handler: (args: Args, extra: ToolExtra) => Promise<ToolResult<Result>>,
  options: {
    guard?: (() => boolean) | undefined;
    progressMessage?: (args: Args) => string;
    completionMessage?: (
      args: Args,
      result: ToolResult<Result>
    ) => string | undefined;
  }
): (args: Args, extra: ToolExtra) => Promise<ToolResult<Result>> {
  return async (args, extra) => {
    if (options.guard && !options.guard()) {
      return buildToolErrorResponse(
        NOT_INITIALIZED_ERROR,
        ErrorCode.E_INVALID_INPUT
      );
    }

    const message = options.progressMessage?.(args);
    if (message === undefined || !canSendProgress(extra)) {
      return handler(args, extra);
    }

    await reportProgress(extra, { current: 0, total: 1, message });
    const result = await handler(args, extra);
    await reportProgress(extra, {
      current: 1,
      total: 1,
      message: options.completionMessage?.(args, result) ?? message,
    });
    return result;
  };
}
