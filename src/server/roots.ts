import * as fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  InitializedNotificationSchema,
  RootsListChangedNotificationSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { z } from 'zod';

import type { SearchLogger } from '../config/types.js';
import type { SearchCoordinator } from '../lib/coordinator/search-coordinator.js';
import { formatUnknownErrorMessage } from '../lib/errors.js';
import { withAbort } from '../lib/fs-helpers.js';
import { normalizePath } from '../lib/path-utils.js';
import type { ServerOptions } from './types.js';

const ROOTS_TIMEOUT_MS = 5000;
const ROOTS_DEBOUNCE_MS = 100;

const RootsResponseSchema = z.object({
  roots: z
    .array(z.object({ uri: z.string(), name: z.string().optional() }))
    .optional(),
});

export function rootUriToPath(uri: string): string | undefined {
  if (!uri.startsWith('file://')) return undefined;
  try {
    return normalizePath(fileURLToPath(uri));
  } catch {
    return undefined;
  }
}

async function isDirectory(
  dirPath: string,
  signal: AbortSignal
): Promise<boolean> {
  try {
    const stats = await withAbort(fs.stat(dirPath), signal);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/** First advertised `file://` root that is an existing directory. */
export async function resolveFirstClientRoot(
  value: unknown,
  signal: AbortSignal
): Promise<string | undefined> {
  const parsed = RootsResponseSchema.safeParse(value);
  if (!parsed.success || !parsed.data.roots) return undefined;

  for (const root of parsed.data.roots) {
    const dirPath = rootUriToPath(root.uri);
    if (dirPath !== undefined && (await isDirectory(dirPath, signal))) {
      return dirPath;
    }
  }
  return undefined;
}

/**
 * Picks the search root: the command-line root, else the first MCP root the
 * client advertises, else the working directory. Root list changes are
 * debounced before being re-read.
 */
export class RootsManager {
  private rootsUpdateTimeout: ReturnType<typeof setTimeout> | undefined;
  private clientRoot: string | undefined;
  private clientInitialized = false;

  constructor(
    private readonly options: ServerOptions,
    private readonly coordinator: SearchCoordinator,
    private readonly logger: SearchLogger
  ) {}

  isInitialized(): boolean {
    return this.clientInitialized;
  }

  destroy(): void {
    if (this.rootsUpdateTimeout) {
      clearTimeout(this.rootsUpdateTimeout);
      this.rootsUpdateTimeout = undefined;
    }
  }

  resolveRoot(): string {
    if (this.options.root !== undefined) return normalizePath(this.options.root);
    return this.clientRoot ?? normalizePath(process.cwd());
  }

  applyRoot(): void {
    const root = this.resolveRoot();
    if (root !== this.coordinator.getState().root) {
      this.logger('info', `Search root: ${root}`);
    }
    this.coordinator.setRoot(root);
  }

  registerHandlers(server: McpServer): void {
    server.server.setNotificationHandler(
      InitializedNotificationSchema,
      async () => {
        this.clientInitialized = true;
        await this.updateRootsFromClient(server);
      }
    );

    server.server.setNotificationHandler(
      RootsListChangedNotificationSchema,
      () => {
        if (!this.clientInitialized) return;
        this.scheduleRootsUpdate(server);
      }
    );
  }

  private scheduleRootsUpdate(server: McpServer): void {
    if (this.rootsUpdateTimeout) {
      this.rootsUpdateTimeout.refresh();
      return;
    }

    this.rootsUpdateTimeout = setTimeout(() => {
      this.rootsUpdateTimeout = undefined;
      void this.updateRootsFromClient(server);
    }, ROOTS_DEBOUNCE_MS);
    this.rootsUpdateTimeout.unref();
  }

  private async updateRootsFromClient(server: McpServer): Promise<void> {
    try {
      if (this.options.root !== undefined) return;

      const clientCapabilities = server.server.getClientCapabilities();
      if (!clientCapabilities?.roots) {
        this.clientRoot = undefined;
        return;
      }

      const rootsResult = await server.server.listRoots(undefined, {
        timeout: ROOTS_TIMEOUT_MS,
      });
      this.clientRoot = await resolveFirstClientRoot(
        rootsResult,
        AbortSignal.timeout(ROOTS_TIMEOUT_MS)
      );
    } catch (error) {
      this.logger(
        'debug',
        `MCP Roots protocol unavailable or failed: ${formatUnknownErrorMessage(error)}`
      );
    } finally {
      this.applyRoot();
    }
  }
}
