import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  type ReadResourceResult,
  SubscribeRequestSchema,
  UnsubscribeRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import type { SearchLogger } from './config/types.js';
import type { SearchCoordinator } from './lib/coordinator/search-coordinator.js';
import { formatUnknownErrorMessage } from './lib/errors.js';
import { listToolMetrics } from './lib/observability.js';
import { buildStatePayload } from './tools/shared/search-formatting.js';

export const STATE_RESOURCE_URI = 'search://state';
const STATE_RESOURCE_NAME = 'search-state';
const STATE_RESOURCE_DESCRIPTION =
  'Live search state: options, grouped results, errors and the last replace outcome. Subscribe to be told when it changes.';

export const METRICS_RESOURCE_URI = 'search://metrics';
const METRICS_RESOURCE_NAME = 'search-metrics';
const METRICS_RESOURCE_DESCRIPTION =
  'Live per-tool call/error/avgDurationMs metrics snapshot.';

export function registerStateResource(
  server: McpServer,
  coordinator: SearchCoordinator
): void {
  server.registerResource(
    STATE_RESOURCE_NAME,
    STATE_RESOURCE_URI,
    {
      title: 'Search State',
      description: STATE_RESOURCE_DESCRIPTION,
      mimeType: 'application/json',
      annotations: {
        audience: ['assistant'],
        priority: 0.7,
      },
    },
    (uri): ReadResourceResult => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: JSON.stringify(
            buildStatePayload(coordinator.getState(), { includeResults: true }),
            null,
            2
          ),
        },
      ],
    })
  );
}

export function registerMetricsResource(server: McpServer): void {
  server.registerResource(
    METRICS_RESOURCE_NAME,
    METRICS_RESOURCE_URI,
    {
      title: 'Tool Metrics',
      description: METRICS_RESOURCE_DESCRIPTION,
      mimeType: 'application/json',
      annotations: {
        audience: ['assistant'],
        priority: 0.3,
      },
    },
    (uri): ReadResourceResult => {
      const snapshot: Record<
        string,
        { calls: number; errors: number; avgDurationMs: number }
      > = {};
      for (const [tool, m] of listToolMetrics()) {
        snapshot[tool] = {
          calls: m.calls,
          errors: m.errors,
          avgDurationMs:
            m.calls > 0
              ? parseFloat((m.totalDurationMs / m.calls).toFixed(2))
              : 0,
        };
      }
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify({ ok: true, metrics: snapshot }, null, 2),
          },
        ],
      };
    }
  );
}

/**
 * Handles resources/subscribe for the state resource and sends
 * notifications/resources/updated after state changes, at most once per
 * microtask turn. Returns a function that stops forwarding.
 */
export function registerStateSubscriptions(
  server: McpServer,
  coordinator: SearchCoordinator,
  logger: SearchLogger
): () => void {
  const subscribed = new Set<string>();
  let notifyScheduled = false;

  server.server.setRequestHandler(SubscribeRequestSchema, (request) => {
    subscribed.add(request.params.uri);
    return {};
  });

  server.server.setRequestHandler(UnsubscribeRequestSchema, (request) => {
    subscribed.delete(request.params.uri);
    return {};
  });

  const notify = (): void => {
    notifyScheduled = false;
    if (!subscribed.has(STATE_RESOURCE_URI)) return;
    server.server
      .sendResourceUpdated({ uri: STATE_RESOURCE_URI })
      .catch((error: unknown) => {
        logger(
          'debug',
          `Failed to send resource update: ${formatUnknownErrorMessage(error)}`
        );
      });
  };

  return coordinator.subscribe(() => {
    if (notifyScheduled) return;
    notifyScheduled = true;
    queueMicrotask(notify);
  });
}
