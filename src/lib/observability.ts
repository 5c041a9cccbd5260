import { AsyncLocalStorage } from 'node:async_hooks';
import { hash } from 'node:crypto';
import { channel, tracingChannel } from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import { isRecord } from './type-guards.js';

// --- Configuration ---

interface DiagnosticsConfig {
  enabled: boolean;
  detail: 0 | 1 | 2;
  logToolErrors: boolean;
}

function readConfig(): DiagnosticsConfig {
  const env = process.env;
  return {
    enabled: isTrue(env['WORKSPACE_SEARCH_DIAGNOSTICS']),
    detail: parseDetail(env['WORKSPACE_SEARCH_DIAGNOSTICS_DETAIL']),
    logToolErrors: isTrue(env['WORKSPACE_SEARCH_TOOL_LOG_ERRORS']),
  };
}

function isTrue(val?: string): boolean {
  const norm = val?.trim().toLowerCase();
  return norm === '1' || norm === 'true' || norm === 'yes';
}

function parseDetail(val?: string): 0 | 1 | 2 {
  if (val === '2') return 2;
  if (val === '1') return 1;
  return 0;
}

// --- Event Types ---

export interface OpsTraceContext {
  op: string;
  backend?: string;
  tool?: string;
  path?: string | undefined;
  [key: string]: unknown;
}

export interface ToolDiagnosticsEvent {
  phase: 'start' | 'end';
  tool: string;
  durationMs?: number;
  ok?: boolean;
  error?: string;
  path?: string;
}

interface ToolAsyncContext {
  tool: string;
  path?: string;
}

export interface ToolMetrics {
  calls: number;
  errors: number;
  totalDurationMs: number;
}

// --- State ---

export const DIAGNOSTICS_CHANNELS = {
  tool: 'workspace-search:tool',
  ops: 'workspace-search:ops',
} as const;

const CHANNELS = {
  tool: channel(DIAGNOSTICS_CHANNELS.tool),
  ops: tracingChannel<unknown, OpsTraceContext>(DIAGNOSTICS_CHANNELS.ops),
};

const toolContext = new AsyncLocalStorage<ToolAsyncContext>();

const globalMetrics = new Map<string, ToolMetrics>();

function updateMetrics(tool: string, ok: boolean, durationMs: number): void {
  const current = globalMetrics.get(tool) ?? {
    calls: 0,
    errors: 0,
    totalDurationMs: 0,
  };
  current.calls++;
  if (!ok) current.errors++;
  current.totalDurationMs += durationMs;
  globalMetrics.set(tool, current);
}

export function getToolMetrics(tool: string): ToolMetrics | undefined {
  const metrics = globalMetrics.get(tool);
  return metrics ? { ...metrics } : undefined;
}

export function listToolMetrics(): [string, ToolMetrics][] {
  return [...globalMetrics].map(([tool, metrics]) => [tool, { ...metrics }]);
}

// --- Result Analysis ---

function extractOutcome(result: unknown): { ok: boolean; error?: string } {
  if (!isRecord(result)) return { ok: true };

  if (result['isError'] === true) {
    return { ok: false, error: extractErrorMessage(result) };
  }

  const content = result['structuredContent'];
  if (isRecord(content) && content['ok'] === false) {
    return { ok: false, error: extractErrorMessage(result) };
  }

  return { ok: true };
}

function extractErrorMessage(source: unknown): string {
  if (typeof source === 'string') return source;
  if (source instanceof Error) return source.message;
  if (isRecord(source)) {
    const structured = source['structuredContent'];
    if (isRecord(structured)) {
      const err = structured['error'];
      if (isRecord(err) && typeof err['message'] === 'string') {
        return err['message'];
      }
    }
    if (typeof source['message'] === 'string') return source['message'];
  }
  return 'Unknown error';
}

function normalizePath(path: string | undefined): string | undefined {
  const { detail } = readConfig();
  if (!path || detail === 0) return undefined;
  if (detail === 2) return path;
  return hash('sha256', path, 'hex').slice(0, 16);
}

function applyToolContext(context: OpsTraceContext): OpsTraceContext {
  const current = toolContext.getStore();
  if (!current) return context;

  const merged: OpsTraceContext = { ...context };
  merged.tool ??= current.tool;
  if (merged.path === undefined && current.path !== undefined) {
    merged.path = current.path;
  }
  return merged;
}

function normalizeContext(ctx: OpsTraceContext): OpsTraceContext {
  if (!ctx.path) return ctx;
  const normalized = normalizePath(ctx.path);
  if (!normalized) {
    const copy = { ...ctx };
    delete copy.path;
    return copy;
  }
  return { ...ctx, path: normalized };
}

// --- Ops Tracing ---

export function shouldPublishOpsTrace(): boolean {
  return readConfig().enabled && CHANNELS.ops.hasSubscribers;
}

export function publishOpsTraceStart(context: OpsTraceContext): void {
  CHANNELS.ops.start.publish(normalizeContext(applyToolContext(context)));
}

export function publishOpsTraceEnd(context: OpsTraceContext): void {
  CHANNELS.ops.end.publish(normalizeContext(applyToolContext(context)));
}

export function publishOpsTraceError(
  context: OpsTraceContext,
  error: unknown
): void {
  CHANNELS.ops.error.publish({
    ...normalizeContext(applyToolContext(context)),
    error,
  });
}

// --- Tool Diagnostics ---

function publishToolStart(tool: string, pathVal?: string): void {
  const event: ToolDiagnosticsEvent = { phase: 'start', tool };
  if (pathVal) event.path = pathVal;
  CHANNELS.tool.publish(event);
}

function publishToolEnd(
  tool: string,
  ok: boolean,
  durationMs: number,
  errorMsg?: string
): void {
  const event: ToolDiagnosticsEvent = { phase: 'end', tool, ok, durationMs };
  if (errorMsg) event.error = errorMsg;
  CHANNELS.tool.publish(event);
}

function logError(tool: string, durationMs: number, msg?: string): void {
  const suffix = msg ? `: ${msg}` : '';
  console.error(
    `[ToolError] ${tool} failed in ${durationMs.toFixed(1)}ms${suffix}`
  );
}

/**
 * Runs a tool handler inside a diagnostics context. Call counts are always
 * recorded; channel events are published only when diagnostics are enabled
 * and someone listens.
 */
export async function withToolDiagnostics<T>(
  tool: string,
  run: () => Promise<T>,
  options?: { path?: string }
): Promise<T> {
  const config = readConfig();
  const context: ToolAsyncContext = {
    tool,
    ...(options?.path ? { path: options.path } : {}),
  };
  const publish = config.enabled && CHANNELS.tool.hasSubscribers;

  return await toolContext.run(context, async () => {
    const start = performance.now();
    if (publish) publishToolStart(tool, normalizePath(options?.path));

    let ok = false;
    let errorMsg: string | undefined;
    try {
      const result = await run();
      const outcome = extractOutcome(result);
      ok = outcome.ok;
      errorMsg = outcome.error;
      return result;
    } catch (error) {
      errorMsg = extractErrorMessage(error);
      throw error;
    } finally {
      const durationMs = performance.now() - start;
      updateMetrics(tool, ok, durationMs);
      if (publish) publishToolEnd(tool, ok, durationMs, errorMsg);
      if (config.logToolErrors && !ok) logError(tool, durationMs, errorMsg);
    }
  });
}
