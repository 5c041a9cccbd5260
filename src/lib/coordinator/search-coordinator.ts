import type {
  FileResult,
  MatchOptions,
  ReplaceOutcome,
  ScanOutcome,
  SearchLogger,
  SearchState,
} from '../../config/types.js';
import { DEFAULT_MATCH_OPTIONS } from '../../config/types.js';
import {
  DEFAULT_DEBOUNCE_MS,
  DEFAULT_MAX_RESULTS,
  MAX_TEXT_FILE_SIZE,
} from '../constants.js';
import { ErrorCode, formatUnknownErrorMessage, McpError } from '../errors.js';
import { normalizePath, resolveAgainstRoot } from '../path-utils.js';
import type { ReplaceRequest } from '../replace/apply.js';
import { replaceInFiles } from '../replace/replace-file.js';
import { type BackendExecutables, selectBackend } from '../search/backends.js';
import { type RunProcess, runProcess } from '../search/executor.js';
import { isBlankQuery, normalizeQuery } from '../search/pattern.js';
import { detectVersionControl, runScan } from '../search/scan.js';
import { SerialQueue } from './serial-queue.js';

export interface SearchCoordinatorOptions {
  root?: string;
  debounceMs?: number;
  maxResults?: number;
  maxFileSize?: number;
  runProcess?: RunProcess;
  isVersionControlled?: (root: string) => Promise<boolean>;
  executables?: BackendExecutables;
  logger?: SearchLogger;
}

export type SearchStateListener = (state: SearchState) => void;

type StatePatch = Partial<SearchState>;

const EMPTY_RESULTS = {
  results: [],
  totalMatches: 0,
  truncated: false,
  regexError: undefined,
  searchUnavailable: undefined,
} as const satisfies StatePatch;

const defaultLogger: SearchLogger = (level, message) => {
  console.error(`[${level}] ${message}`);
};

function createInitialState(root: string | undefined): SearchState {
  return {
    root,
    options: DEFAULT_MATCH_OPTIONS,
    replaceText: '',
    generation: 0,
    ...EMPTY_RESULTS,
    isSearching: false,
    isReplacing: false,
    lastReplaceResult: undefined,
  };
}

/**
 * Owns the search state for one root. Option changes are debounced into
 * scans; scans and replaces share one serial worker. Every scan takes a new
 * generation, and a completion is published only while its generation and
 * root are still current.
 */
export class SearchCoordinator {
  private state: SearchState;
  private readonly queue = new SerialQueue();
  private readonly listeners = new Set<SearchStateListener>();
  private debounceTimer: ReturnType<typeof setTimeout> | undefined;
  private debounceWaiters: (() => void)[] = [];
  private activeReplaces = 0;
  private closed = false;

  private readonly debounceMs: number;
  private readonly maxResults: number;
  private readonly maxFileSize: number;
  private readonly runProcess: RunProcess;
  private readonly isVersionControlled: (root: string) => Promise<boolean>;
  private readonly executables: BackendExecutables;
  private readonly logger: SearchLogger;

  constructor(options: SearchCoordinatorOptions = {}) {
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.maxFileSize = options.maxFileSize ?? MAX_TEXT_FILE_SIZE;
    this.runProcess = options.runProcess ?? runProcess;
    this.isVersionControlled =
      options.isVersionControlled ?? detectVersionControl;
    this.executables = options.executables ?? {};
    this.logger = options.logger ?? defaultLogger;
    this.state = createInitialState(
      options.root !== undefined ? normalizePath(options.root) : undefined
    );
  }

  getState(): SearchState {
    return this.state;
  }

  subscribe(listener: SearchStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setOptions(patch: Partial<MatchOptions>): void {
    if (this.closed) return;
    this.update({ options: { ...this.state.options, ...patch } });
    this.scheduleSearch();
  }

  setReplaceText(replaceText: string): void {
    if (this.closed) return;
    this.update({ replaceText });
  }

  /** Starts a pending debounced scan now. No-op when nothing is pending. */
  flush(): void {
    if (!this.debounceTimer) return;
    this.startSearch();
  }

  /** Re-runs the current search immediately. */
  refresh(): void {
    if (this.closed) return;
    this.startSearch();
  }

  setRoot(root: string | undefined): void {
    if (this.closed) return;
    const next = root !== undefined ? normalizePath(root) : undefined;
    if (next === this.state.root) return;

    this.cancelDebounce();
    this.update({
      root: next,
      ...EMPTY_RESULTS,
      isSearching: false,
      lastReplaceResult: undefined,
    });
    if (next !== undefined && !isBlankQuery(this.state.options.query)) {
      this.startSearch();
    }
  }

  clear(): void {
    if (this.closed) return;
    this.cancelDebounce();
    this.update({
      options: { ...this.state.options, query: '', fileFilter: '' },
      replaceText: '',
      generation: this.state.generation + 1,
      ...EMPTY_RESULTS,
      isSearching: false,
      lastReplaceResult: undefined,
    });
  }

  /** Replaces in one file; `filePath` may be absolute or root-relative. */
  async replaceInFile(filePath: string): Promise<ReplaceOutcome> {
    const root = this.requireRoot();
    const target = resolveAgainstRoot(filePath, root);
    return await this.runReplace(root, [target]);
  }

  /** Replaces across the files of the current result set. */
  async replaceAll(): Promise<ReplaceOutcome> {
    const root = this.requireRoot();
    const files = this.state.results.map((result) => result.path);
    return await this.runReplace(root, files);
  }

  /** Resolves once no debounce is pending and the worker has drained. */
  async whenIdle(): Promise<void> {
    for (;;) {
      if (this.debounceTimer) {
        await new Promise<void>((resolve) => {
          this.debounceWaiters.push(resolve);
        });
      }
      await this.queue.onIdle();
      if (!this.debounceTimer && this.queue.size === 0) return;
    }
  }

  /** Stops scheduling. Work already queued finishes and is discarded. */
  close(): void {
    this.closed = true;
    this.cancelDebounce();
    this.listeners.clear();
  }

  private requireRoot(): string {
    const { root } = this.state;
    if (root === undefined) {
      throw new McpError(ErrorCode.E_NO_ROOT, 'No search root is active');
    }
    return root;
  }

  /** Files larger than this many bytes are never rewritten. */
  get fileSizeLimit(): number {
    return this.maxFileSize;
  }

  /** The match options and replacement text a replace would use now. */
  getReplaceRequest(): ReplaceRequest {
    const { options, replaceText } = this.state;
    return {
      query: options.query,
      caseSensitive: options.caseSensitive,
      useRegex: options.useRegex,
      wholeWord: options.wholeWord,
      replacement: replaceText,
    };
  }

  private scheduleSearch(): void {
    if (this.debounceTimer) {
      this.debounceTimer.refresh();
      return;
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = undefined;
      this.startSearch();
    }, this.debounceMs);
  }

  private cancelDebounce(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = undefined;
    }
    const waiters = this.debounceWaiters;
    this.debounceWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private startSearch(): void {
    this.cancelDebounce();
    if (this.closed) return;

    const generation = this.state.generation + 1;
    const { root, options } = this.state;

    if (root === undefined || isBlankQuery(options.query)) {
      this.update({ generation, ...EMPTY_RESULTS, isSearching: false });
      return;
    }

    this.update({ generation, isSearching: true, regexError: undefined });
    const snapshot: MatchOptions = {
      ...options,
      query: normalizeQuery(options.query),
    };

    void this.queue.enqueue(() => this.executeScan(root, snapshot)).then(
      (outcome) => {
        this.publishScan(generation, root, outcome);
      },
      (error: unknown) => {
        this.failScan(generation, root, error);
      }
    );
  }

  private async executeScan(
    root: string,
    options: MatchOptions
  ): Promise<ScanOutcome> {
    const versioned = await this.isVersionControlled(root);
    const backend = selectBackend(versioned, this.executables);
    return await runScan(
      { root, options, backend, maxResults: this.maxResults },
      { runProcess: this.runProcess, logger: this.logger }
    );
  }

  private isCurrent(generation: number, root: string): boolean {
    return (
      !this.closed &&
      generation === this.state.generation &&
      root === this.state.root
    );
  }

  private publishScan(
    generation: number,
    root: string,
    outcome: ScanOutcome
  ): void {
    if (!this.isCurrent(generation, root)) {
      this.logger('debug', `Discarding stale scan #${generation}`);
      return;
    }

    const results: readonly FileResult[] =
      outcome.regexError !== undefined ? [] : outcome.results;
    this.update({
      results,
      totalMatches: outcome.regexError !== undefined ? 0 : outcome.totalMatches,
      truncated: outcome.truncated,
      regexError: outcome.regexError,
      searchUnavailable: outcome.searchUnavailable,
      isSearching: false,
    });
  }

  private failScan(generation: number, root: string, error: unknown): void {
    const message = formatUnknownErrorMessage(error);
    this.logger('error', `Scan #${generation} failed: ${message}`);
    if (!this.isCurrent(generation, root)) return;

    this.update({
      ...EMPTY_RESULTS,
      searchUnavailable: message,
      isSearching: false,
    });
  }

  private async runReplace(
    root: string,
    files: readonly string[]
  ): Promise<ReplaceOutcome> {
    const request = this.getReplaceRequest();
    this.activeReplaces++;
    this.update({ isReplacing: true });

    try {
      const outcome = await this.queue.enqueue(() =>
        replaceInFiles(files, root, request, { maxFileSize: this.maxFileSize })
      );
      if (this.closed || root !== this.state.root) return outcome;

      this.update({ lastReplaceResult: outcome });
      if (outcome.replacementsCount > 0) {
        this.startSearch();
      }
      return outcome;
    } finally {
      this.activeReplaces--;
      if (!this.closed) {
        this.update({ isReplacing: this.activeReplaces > 0 });
      }
    }
  }

  private update(patch: StatePatch): void {
    this.state = { ...this.state, ...patch };
    for (const listener of this.listeners) {
      try {
        listener(this.state);
      } catch (error) {
        this.logger(
          'error',
          `Search state listener failed: ${formatUnknownErrorMessage(error)}`
        );
      }
    }
  }
}
