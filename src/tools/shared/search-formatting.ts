import type { z } from 'zod';

import {
  formatOperationSummary,
  joinLines,
  pluralize,
} from '../../config/formatting.js';
import type { ReplaceOutcome, SearchState } from '../../config/types.js';
import type {
  ReplaceOutputSchema,
  SearchStateOutputSchema,
} from '../../schemas.js';

type SearchStatePayload = z.infer<typeof SearchStateOutputSchema>;
type ReplacePayload = z.infer<typeof ReplaceOutputSchema>;

const LINE_NUMBER_PAD_WIDTH = 4;

function copyOutcome(outcome: ReplaceOutcome): Omit<ReplacePayload, 'ok'> {
  return {
    filesChanged: outcome.filesChanged,
    replacementsCount: outcome.replacementsCount,
    failures: outcome.failures.map((failure) => ({ ...failure })),
  };
}

export function buildReplacePayload(outcome: ReplaceOutcome): ReplacePayload {
  return { ok: true, ...copyOutcome(outcome) };
}

export function buildStatePayload(
  state: SearchState,
  options: { includeResults: boolean }
): SearchStatePayload {
  const last = state.lastReplaceResult;
  return {
    ok: true,
    ...(state.root !== undefined ? { root: state.root } : {}),
    options: { ...state.options },
    replaceText: state.replaceText,
    generation: state.generation,
    ...(options.includeResults
      ? {
          results: state.results.map((result) => ({
            path: result.path,
            relativePath: result.relativePath,
            matches: result.matches.map((match) => ({ ...match })),
          })),
        }
      : {}),
    fileCount: state.results.length,
    totalMatches: state.totalMatches,
    truncated: state.truncated,
    isSearching: state.isSearching,
    isReplacing: state.isReplacing,
    ...(state.regexError !== undefined ? { regexError: state.regexError } : {}),
    ...(state.searchUnavailable !== undefined
      ? { searchUnavailable: state.searchUnavailable }
      : {}),
    ...(last !== undefined
      ? { lastReplaceResult: copyOutcome(last) }
      : {}),
  };
}

function formatMatchLines(state: SearchState, maxLines: number): string[] {
  const lines: string[] = [];
  let listed = 0;

  for (const result of state.results) {
    if (listed >= maxLines) break;
    lines.push(
      `${result.relativePath} (${pluralize(result.matches.length, 'match', 'matches')}):`
    );
    for (const match of result.matches) {
      if (listed >= maxLines) break;
      lines.push(
        `  ${String(match.lineNumber).padStart(LINE_NUMBER_PAD_WIDTH)}: ${match.lineContent}`
      );
      listed++;
    }
  }

  if (listed < state.totalMatches) {
    lines.push(`… ${state.totalMatches - listed} more not shown`);
  }
  return lines;
}

function formatStatus(state: SearchState): string {
  if (state.regexError !== undefined) {
    return `Invalid pattern: ${state.regexError}`;
  }
  if (state.searchUnavailable !== undefined) {
    return `Search unavailable: ${state.searchUnavailable}`;
  }
  if (state.options.query.trim().length === 0) {
    return 'No query';
  }
  if (state.totalMatches === 0) {
    return state.isSearching ? 'Searching…' : 'No matches';
  }
  const summary = `${pluralize(state.totalMatches, 'match', 'matches')} in ${pluralize(state.results.length, 'file')}`;
  return state.isSearching ? `${summary} (searching…)` : summary;
}

export function formatReplaceOutcome(outcome: ReplaceOutcome): string {
  const lines = [
    `Replaced ${pluralize(outcome.replacementsCount, 'occurrence')} in ${pluralize(outcome.filesChanged, 'file')}.`,
  ];
  const summary = formatOperationSummary({ failed: outcome.failures.length });
  if (summary) lines.push(summary);
  for (const failure of outcome.failures) {
    lines.push(`  ${failure.path}: ${failure.error}`);
  }
  return joinLines(lines);
}

export function buildStateText(state: SearchState, maxLines: number): string {
  const lines = [
    `Root: ${state.root ?? '(none)'}`,
    `Query: ${JSON.stringify(state.options.query)}`,
    formatStatus(state),
  ];

  if (state.totalMatches > 0 && maxLines > 0) {
    lines.push(...formatMatchLines(state, maxLines));
  }

  const summary = formatOperationSummary({
    truncated: state.truncated,
    truncatedReason: `result cap reached (${state.totalMatches} matches kept)`,
    tip: 'Narrow the query or add a fileFilter.',
  });
  if (summary) lines.push(summary);

  if (state.lastReplaceResult !== undefined) {
    lines.push(`Last replace: ${formatReplaceOutcome(state.lastReplaceResult)}`);
  }
  return joinLines(lines);
}
