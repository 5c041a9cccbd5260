import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type {
  MatchOptions,
  ProcessResult,
  ScanOutcome,
  SearchLogger,
} from '../../config/types.js';
import { SPAWN_FAILURE_EXIT_CODE } from '../constants.js';
import { isNodeError } from '../errors.js';
import {
  publishOpsTraceEnd,
  publishOpsTraceError,
  publishOpsTraceStart,
  shouldPublishOpsTrace,
} from '../observability.js';
import type { SearchBackend } from './backends.js';
import type { RunProcess } from './executor.js';
import { capResults, parseGrepOutput } from './parser.js';

export interface ScanRequest {
  root: string;
  options: MatchOptions;
  backend: SearchBackend;
  maxResults: number;
}

export interface ScanDependencies {
  runProcess: RunProcess;
  logger?: SearchLogger;
}

export interface InterpretedScan {
  outcome: ScanOutcome;
  warning?: string;
}

function firstLine(text: string | undefined): string | undefined {
  if (text === undefined) return undefined;
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.length > 0) return trimmed;
  }
  return undefined;
}

function emptyOutcome(backend: SearchBackend): ScanOutcome {
  return {
    backend: backend.name,
    results: [],
    totalMatches: 0,
    truncated: false,
  };
}

/**
 * Maps a finished process onto a scan outcome.
 *
 * - exit -1: the backend could not run; `searchUnavailable` carries why.
 * - regex mode, failing exit code and stderr output: `regexError` is the
 *   first stderr line and results are empty.
 * - anything else: stdout is parsed; failing exit codes only add a warning.
 */
export function interpretProcessResult(
  request: ScanRequest,
  result: ProcessResult
): InterpretedScan {
  const { backend, options, root, maxResults } = request;

  if (result.exitCode === SPAWN_FAILURE_EXIT_CODE) {
    const reason =
      firstLine(result.stderr) ?? `Failed to run ${backend.executable}`;
    return {
      outcome: { ...emptyOutcome(backend), searchUnavailable: reason },
      warning: `${backend.name} unavailable: ${reason}`,
    };
  }

  const succeeded = backend.parseSuccess(result.exitCode);
  const stderrLine = firstLine(result.stderr);

  if (options.useRegex && !succeeded && stderrLine !== undefined) {
    return {
      outcome: { ...emptyOutcome(backend), regexError: stderrLine },
    };
  }

  const parsed = parseGrepOutput(result.stdout ?? '', root);
  const capped = capResults(parsed, maxResults);
  const outcome: ScanOutcome = {
    backend: backend.name,
    results: capped.results,
    totalMatches: capped.totalMatches,
    truncated: capped.truncated,
  };

  if (succeeded) return { outcome };
  return {
    outcome,
    warning: `${backend.name} exited with code ${result.exitCode}${
      stderrLine ? `: ${stderrLine}` : ''
    }`,
  };
}

export async function runScan(
  request: ScanRequest,
  deps: ScanDependencies
): Promise<ScanOutcome> {
  const { backend, options, root } = request;
  const args = backend.buildArgs(options);
  const trace = shouldPublishOpsTrace()
    ? { op: 'scan', backend: backend.name, path: root }
    : undefined;

  if (trace) publishOpsTraceStart(trace);
  try {
    const result = await deps.runProcess(backend.executable, args, root);
    const { outcome, warning } = interpretProcessResult(request, result);
    if (warning) deps.logger?.('warning', warning);
    if (trace) {
      publishOpsTraceEnd({
        ...trace,
        exitCode: result.exitCode,
        totalMatches: outcome.totalMatches,
      });
    }
    return outcome;
  } catch (error) {
    if (trace) publishOpsTraceError(trace, error);
    throw error;
  }
}

/** True when `root` holds a `.git` entry (directory or worktree file). */
export async function detectVersionControl(root: string): Promise<boolean> {
  try {
    await fs.stat(path.join(root, '.git'));
    return true;
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return false;
    if (isNodeError(error) && error.code === 'ENOTDIR') return false;
    throw error;
  }
}
