import type { BackendName, MatchOptions } from '../../config/types.js';
import {
  GIT_EXECUTABLE,
  GIT_MAX_MATCHES_PER_FILE,
  GREP_EXECUTABLE,
  NOISE_DIRECTORIES,
} from '../constants.js';
import { normalizeQuery, parseFileFilter } from './pattern.js';

/**
 * A line matcher invoked as an external process. Every backend prints
 * `relativePath:lineNumber:content` per match, skips binary files and never
 * emits color codes.
 */
export interface SearchBackend {
  readonly name: BackendName;
  readonly executable: string;
  buildArgs(options: MatchOptions): string[];
  /** Exit codes that mean "ran fine", with or without matches. */
  parseSuccess(exitCode: number): boolean;
}

export interface BackendExecutables {
  git?: string;
  grep?: string;
}

function isMatchOrNoMatch(exitCode: number): boolean {
  return exitCode === 0 || exitCode === 1;
}

function sharedMatchFlags(options: MatchOptions): string[] {
  const flags: string[] = [];
  if (!options.caseSensitive) flags.push('-i');
  if (options.wholeWord) flags.push('-w');
  flags.push(options.useRegex ? '-E' : '--fixed-strings');
  return flags;
}

export function createGitGrepBackend(
  executable: string = GIT_EXECUTABLE
): SearchBackend {
  return {
    name: 'git-grep',
    executable,
    buildArgs(options) {
      const args = [
        '-c',
        'core.quotepath=off',
        'grep',
        '-n',
        '--color=never',
        '-I',
        `--max-count=${GIT_MAX_MATCHES_PER_FILE}`,
        ...sharedMatchFlags(options),
        '-e',
        normalizeQuery(options.query),
      ];

      // Pathspecs take globs and directory prefixes alike.
      const { tokens } = parseFileFilter(options.fileFilter);
      if (tokens.length > 0) {
        args.push('--', ...tokens);
      }
      return args;
    },
    parseSuccess: isMatchOrNoMatch,
  };
}

export function createGrepBackend(
  executable: string = GREP_EXECUTABLE
): SearchBackend {
  return {
    name: 'grep',
    executable,
    buildArgs(options) {
      const args = ['-rn', '--color=never', '-I'];
      if (!options.caseSensitive) args.push('-i');
      if (options.wholeWord) args.push('-w');
      for (const dir of NOISE_DIRECTORIES) {
        args.push(`--exclude-dir=${dir}`);
      }

      const { includeGlobs, directories } = parseFileFilter(options.fileFilter);
      for (const glob of includeGlobs) {
        args.push(`--include=${glob}`);
      }

      args.push(
        options.useRegex ? '-E' : '--fixed-strings',
        '-e',
        normalizeQuery(options.query)
      );
      args.push(...(directories.length > 0 ? directories : ['.']));
      return args;
    },
    parseSuccess: isMatchOrNoMatch,
  };
}

export function selectBackend(
  isVersionControlled: boolean,
  executables: BackendExecutables = {}
): SearchBackend {
  return isVersionControlled
    ? createGitGrepBackend(executables.git)
    : createGrepBackend(executables.grep);
}
