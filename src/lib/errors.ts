import { joinLines } from '../config/formatting.js';
import { ErrorCode } from '../config/types.js';

export { ErrorCode };

interface DetailedError {
  code: ErrorCode;
  message: string;
  path?: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof (error as NodeJS.ErrnoException).code === 'string'
  );
}

export const NODE_ERROR_CODE_MAP: Readonly<Record<string, ErrorCode>> = {
  ENOENT: ErrorCode.E_NOT_FOUND,
  EACCES: ErrorCode.E_PERMISSION_DENIED,
  EPERM: ErrorCode.E_PERMISSION_DENIED,
  ENOTDIR: ErrorCode.E_NOT_DIRECTORY,
  EISDIR: ErrorCode.E_NOT_FILE,
  ENAMETOOLONG: ErrorCode.E_INVALID_INPUT,
  EBUSY: ErrorCode.E_PERMISSION_DENIED,
  EEXIST: ErrorCode.E_INVALID_INPUT,
  EINVAL: ErrorCode.E_INVALID_INPUT,
} as const;

export class McpError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public path?: string,
    public details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'McpError';
    Object.setPrototypeOf(this, McpError.prototype);
  }
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorCode, string>> = {
  [ErrorCode.E_ACCESS_DENIED]:
    'The path lies outside the active search root. Use search_state to see the current root.',
  [ErrorCode.E_NOT_FOUND]:
    'Verify the path exists. Run search again to refresh stale results.',
  [ErrorCode.E_NOT_FILE]:
    'The path points to a directory or other non-file. Pass a file from the current results.',
  [ErrorCode.E_NOT_DIRECTORY]:
    'The search root must be a directory.',
  [ErrorCode.E_TOO_LARGE]:
    'The file exceeds the size limit. Raise WORKSPACE_SEARCH_MAX_FILE_SIZE to process it.',
  [ErrorCode.E_INVALID_PATTERN]:
    'The regex pattern is invalid. Check syntax or disable useRegex to search literally.',
  [ErrorCode.E_INVALID_INPUT]:
    'One or more input parameters are invalid. Check the tool documentation for correct usage.',
  [ErrorCode.E_NO_ROOT]:
    'No search root is active. Start the server with a root directory or configure MCP roots.',
  [ErrorCode.E_PERMISSION_DENIED]:
    'Permission denied by the operating system. Check file permissions.',
  [ErrorCode.E_UNKNOWN]:
    'An unexpected error occurred. Check the error message for details.',
} as const;

function getDirectErrorCode(error: unknown): ErrorCode | undefined {
  if (error instanceof McpError) {
    return error.code;
  }
  if (isNodeError(error) && error.code) {
    return NODE_ERROR_CODE_MAP[error.code];
  }
  return undefined;
}

function classifyMessageError(error: unknown): ErrorCode | undefined {
  const message = error instanceof Error ? error.message : String(error);
  if (message.toLowerCase().includes('enoent')) {
    return ErrorCode.E_NOT_FOUND;
  }
  return undefined;
}

export function classifyError(error: unknown): ErrorCode {
  const direct = getDirectErrorCode(error);
  if (direct) return direct;

  const messageCode = classifyMessageError(error);
  return messageCode ?? ErrorCode.E_UNKNOWN;
}

export function formatUnknownErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return String(error);
  } catch {
    return 'Unknown error';
  }
}

export function createDetailedError(
  error: unknown,
  path?: string,
  additionalDetails?: Record<string, unknown>
): DetailedError {
  const code = classifyError(error);
  const detailed: DetailedError = {
    code,
    message: formatUnknownErrorMessage(error),
    suggestion: ERROR_SUGGESTIONS[code],
  };

  const resolvedPath = resolveErrorPath(error, path);
  if (resolvedPath !== undefined) detailed.path = resolvedPath;

  const details = mergeErrorDetails(error, additionalDetails);
  if (details !== undefined) detailed.details = details;

  return detailed;
}

function resolveErrorPath(error: unknown, path?: string): string | undefined {
  if (path) return path;
  if (error instanceof McpError) return error.path;
  return undefined;
}

function mergeErrorDetails(
  error: unknown,
  additionalDetails?: Record<string, unknown>
): Record<string, unknown> | undefined {
  const mcpDetails = error instanceof McpError ? error.details : undefined;
  const mergedDetails: Record<string, unknown> = {
    ...mcpDetails,
    ...additionalDetails,
  };
  if (Object.keys(mergedDetails).length === 0) return undefined;
  return mergedDetails;
}

export function formatDetailedError(error: DetailedError): string {
  const lines: string[] = [`Error [${error.code}]: ${error.message}`];

  if (error.path) {
    lines.push(`Path: ${error.path}`);
  }

  if (error.suggestion) {
    lines.push(`Suggestion: ${error.suggestion}`);
  }

  return joinLines(lines);
}

export function getSuggestion(code: ErrorCode): string {
  return ERROR_SUGGESTIONS[code];
}
