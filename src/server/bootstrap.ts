import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import {
  SearchCoordinator,
  type SearchCoordinatorOptions,
} from '../lib/coordinator/search-coordinator.js';
import { pkgInfo } from '../pkg-info.js';
import {
  registerMetricsResource,
  registerStateResource,
  registerStateSubscriptions,
} from '../resources.js';
import { registerAllTools } from '../tools.js';
import { createLoggingState, createSearchLogger } from './logging.js';
import { RootsManager } from './roots.js';
import type { ServerOptions } from './types.js';

const { version: SERVER_VERSION, description: SERVER_DESCRIPTION } = pkgInfo;

const SERVER_INSTRUCTIONS =
  'workspace-search: project-wide search and replace over one root directory. ' +
  'Call search with a query (and optional caseSensitive, useRegex, wholeWord, fileFilter, replaceText); ' +
  'it waits for the scan and returns grouped matches. ' +
  'Use preview_replace before replace_in_file or replace_all. ' +
  'Subscribe to search://state for live updates.';

interface ServerRuntime {
  coordinator: SearchCoordinator;
  rootsManager: RootsManager;
  dispose: () => void;
}

/** Process hooks the coordinator runs scans through. */
export type ServerDependencies = Pick<
  SearchCoordinatorOptions,
  'runProcess' | 'isVersionControlled'
>;

const runtimes = new WeakMap<McpServer, ServerRuntime>();

function getRuntime(server: McpServer): ServerRuntime {
  const runtime = runtimes.get(server);
  if (!runtime) {
    throw new Error('Search runtime not initialized for server instance');
  }
  return runtime;
}

export function getCoordinator(server: McpServer): SearchCoordinator {
  return getRuntime(server).coordinator;
}

export function createServer(
  options: ServerOptions = {},
  dependencies: ServerDependencies = {}
): McpServer {
  const server = new McpServer(
    {
      name: 'workspace-search',
      title: 'Workspace Search',
      version: SERVER_VERSION,
      ...(SERVER_DESCRIPTION ? { description: SERVER_DESCRIPTION } : {}),
    },
    {
      capabilities: {
        logging: {},
        resources: { subscribe: true },
        tools: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  const loggingState = createLoggingState('info');
  const logger = createSearchLogger(server, loggingState);
  const coordinator = new SearchCoordinator({
    ...dependencies,
    ...(options.debounceMs !== undefined
      ? { debounceMs: options.debounceMs }
      : {}),
    ...(options.maxResults !== undefined
      ? { maxResults: options.maxResults }
      : {}),
    logger,
  });
  const rootsManager = new RootsManager(options, coordinator, logger);

  server.server.setRequestHandler(SetLevelRequestSchema, (req) => {
    loggingState.minimumLevel = req.params.level;
    return {};
  });

  registerStateResource(server, coordinator);
  registerMetricsResource(server);
  const stopSubscriptions = registerStateSubscriptions(
    server,
    coordinator,
    logger
  );
  registerAllTools(server, {
    coordinator,
    isInitialized: () => rootsManager.isInitialized(),
  });

  runtimes.set(server, {
    coordinator,
    rootsManager,
    dispose: () => {
      stopSubscriptions();
      rootsManager.destroy();
      coordinator.close();
    },
  });

  return server;
}

export async function connectServer(
  server: McpServer,
  transport: Transport
): Promise<void> {
  const { rootsManager, dispose } = getRuntime(server);

  rootsManager.registerHandlers(server);
  rootsManager.applyRoot();
  await server.connect(transport);

  const sdkOnClose = server.server.onclose;
  server.server.onclose = () => {
    dispose();
    sdkOnClose?.();
  };
}

export async function startServer(server: McpServer): Promise<void> {
  await connectServer(server, new StdioServerTransport());
}
