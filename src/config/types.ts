export interface MatchOptions {
  readonly query: string;
  readonly caseSensitive: boolean;
  readonly useRegex: boolean;
  readonly wholeWord: boolean;
  /** Comma-separated include globs or directory prefixes. */
  readonly fileFilter: string;
}

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  query: '',
  caseSensitive: false,
  useRegex: false,
  wholeWord: false,
  fileFilter: '',
};

export interface LineMatch {
  readonly lineNumber: number;
  readonly lineContent: string;
}

export interface FileResult {
  readonly path: string;
  readonly relativePath: string;
  readonly matches: readonly LineMatch[];
}

export interface ProcessResult {
  readonly stdout: string | undefined;
  readonly stderr: string | undefined;
  readonly exitCode: number;
}

export type BackendName = 'git-grep' | 'grep';

export interface ScanOutcome {
  readonly backend: BackendName;
  readonly results: readonly FileResult[];
  readonly totalMatches: number;
  readonly truncated: boolean;
  readonly regexError?: string;
  readonly searchUnavailable?: string;
}

export interface ReplaceFailure {
  readonly path: string;
  readonly error: string;
}

export interface ReplaceOutcome {
  readonly filesChanged: number;
  readonly replacementsCount: number;
  readonly failures: readonly ReplaceFailure[];
}

export interface SearchState {
  readonly root: string | undefined;
  readonly options: MatchOptions;
  readonly replaceText: string;
  readonly generation: number;
  readonly results: readonly FileResult[];
  readonly totalMatches: number;
  readonly truncated: boolean;
  readonly isSearching: boolean;
  readonly regexError: string | undefined;
  readonly searchUnavailable: string | undefined;
  readonly isReplacing: boolean;
  readonly lastReplaceResult: ReplaceOutcome | undefined;
}

export const ErrorCode = {
  E_ACCESS_DENIED: 'E_ACCESS_DENIED',
  E_NOT_FOUND: 'E_NOT_FOUND',
  E_NOT_FILE: 'E_NOT_FILE',
  E_NOT_DIRECTORY: 'E_NOT_DIRECTORY',
  E_TOO_LARGE: 'E_TOO_LARGE',
  E_INVALID_PATTERN: 'E_INVALID_PATTERN',
  E_INVALID_INPUT: 'E_INVALID_INPUT',
  E_NO_ROOT: 'E_NO_ROOT',
  E_PERMISSION_DENIED: 'E_PERMISSION_DENIED',
  E_UNKNOWN: 'E_UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type LogLevel = 'debug' | 'info' | 'notice' | 'warning' | 'error';

export type SearchLogger = (level: LogLevel, message: string) => void;
