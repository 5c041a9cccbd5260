import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type {
  LoggingLevel,
  LoggingMessageNotificationParams,
} from '@modelcontextprotocol/sdk/types.js';

import type { SearchLogger } from '../config/types.js';
import { formatUnknownErrorMessage } from '../lib/errors.js';

const MCP_LOGGER_NAME = 'workspace-search';

const LOG_LEVEL_ORDER: Record<LoggingLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
  alert: 6,
  emergency: 7,
};

export interface LoggingState {
  minimumLevel: LoggingLevel;
}

export function createLoggingState(
  minimumLevel: LoggingLevel = 'info'
): LoggingState {
  return { minimumLevel };
}

function canSendMcpLogs(server: McpServer): boolean {
  return server.isConnected();
}

export function logToMcp(
  server: McpServer | undefined,
  level: LoggingLevel,
  data: string,
  minLevel: LoggingLevel = 'debug'
): void {
  if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[minLevel]) {
    return;
  }
  if (!server || !canSendMcpLogs(server)) {
    console.error(`[${level}] ${data}`);
    return;
  }

  const params: LoggingMessageNotificationParams = {
    level,
    logger: MCP_LOGGER_NAME,
    data,
  };

  void server.sendLoggingMessage(params).catch((error: unknown) => {
    console.error(
      `Failed to send MCP log: ${level} | ${data}`,
      formatUnknownErrorMessage(error)
    );
  });
}

/** Logger for library code that honours the level set by `logging/setLevel`. */
export function createSearchLogger(
  server: McpServer | undefined,
  loggingState: LoggingState
): SearchLogger {
  return (level, message) => {
    logToMcp(server, level, message, loggingState.minimumLevel);
  };
}
