#!/usr/bin/env node
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { CliExitError, parseArgs } from './cli.js';
import { createServer, startServer } from './server/bootstrap.js';

const SHUTDOWN_TIMEOUT_MS = 5000;
let activeServer: McpServer | undefined;
let shutdownStarted = false;

async function shutdown(signal: string): Promise<void> {
  if (shutdownStarted) return;
  shutdownStarted = true;

  const timer = setTimeout(() => {
    process.exit(0);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    if (activeServer) {
      await activeServer.close();
    }
  } catch (error: unknown) {
    console.error(
      `Shutdown error (${signal}):`,
      error instanceof Error ? error.message : String(error)
    );
  } finally {
    clearTimeout(timer);
    process.exit(0);
  }
}

async function main(): Promise<void> {
  const options = await parseArgs();

  if (options.root !== undefined) {
    console.error(`Search root (from CLI): ${options.root}`);
  } else {
    console.error(
      'No root specified via CLI. Will use MCP Roots or the current working directory.'
    );
  }

  const server = createServer(options);
  activeServer = server;
  await startServer(server);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

main().catch((error: unknown) => {
  if (error instanceof CliExitError) {
    if (error.exitCode === 0) {
      console.log(error.message);
    } else {
      console.error(error.message);
    }
    process.exit(error.exitCode);
  }
  console.error(
    'Fatal error:',
    error instanceof Error ? error.message : String(error)
  );
  process.exit(1);
});
