import { z } from 'zod';

import { ErrorCode } from './config/types.js';

const MAX_PATH_LENGTH = 4096;
const MAX_QUERY_LENGTH = 1000;
const MAX_FILTER_LENGTH = 2000;
const MAX_REPLACEMENT_LENGTH = 100_000;

const PathSchema = z
  .string()
  .min(1, 'Path required')
  .max(MAX_PATH_LENGTH, `Path too long (max ${MAX_PATH_LENGTH} chars)`);

const ErrorSchema = z.strictObject({
  code: z.enum(ErrorCode).describe('Error code (e.g. E_NOT_FOUND)'),
  message: z.string().describe('Human-readable message'),
  path: z.string().optional().describe('Relevant path'),
  suggestion: z.string().optional().describe('Fix suggestion'),
});

export const ToolErrorResponseSchema = z.strictObject({
  ok: z.literal(false).describe('Operation failed'),
  error: ErrorSchema.describe('Error details'),
});

// --- Inputs ---

export const SearchInputSchema = z.strictObject({
  query: z
    .string()
    .max(MAX_QUERY_LENGTH, `Max ${MAX_QUERY_LENGTH} chars`)
    .optional()
    .describe('Text or pattern to find. Empty (after trimming) clears results'),
  caseSensitive: z
    .boolean()
    .optional()
    .describe('Match case exactly (default: false)'),
  useRegex: z
    .boolean()
    .optional()
    .describe('Treat query as an extended regular expression'),
  wholeWord: z.boolean().optional().describe('Match whole words only'),
  fileFilter: z
    .string()
    .max(MAX_FILTER_LENGTH, `Max ${MAX_FILTER_LENGTH} chars`)
    .optional()
    .describe(
      'Comma-separated globs or directory prefixes. Examples: "*.ts", "src/, docs"'
    ),
  replaceText: z
    .string()
    .max(MAX_REPLACEMENT_LENGTH)
    .optional()
    .describe('Replacement text used by replace_in_file and replace_all'),
  refresh: z
    .boolean()
    .optional()
    .default(false)
    .describe('Re-run the search even when no option changed'),
  immediate: z
    .boolean()
    .optional()
    .default(true)
    .describe('Skip the debounce delay and start the scan now'),
  wait: z
    .boolean()
    .optional()
    .default(true)
    .describe('Wait for pending scans to settle before returning'),
  maxResultsInText: z
    .number()
    .int({ error: 'Must be integer' })
    .min(0, 'Min: 0')
    .max(10_000, 'Max: 10,000')
    .optional()
    .default(200)
    .describe('Max line matches listed in the text output'),
});

export const SearchStateInputSchema = z.strictObject({
  includeResults: z
    .boolean()
    .optional()
    .default(true)
    .describe('Include per-file matches in the response'),
});

export const ReplaceInFileInputSchema = z.strictObject({
  path: PathSchema.describe(
    'File to rewrite, absolute or relative to the search root'
  ),
});

export const ReplaceAllInputSchema = z.strictObject({});

export const PreviewReplaceInputSchema = z.strictObject({
  path: PathSchema.optional().describe(
    'Preview one file (absolute or root-relative). Default: every result file'
  ),
  context: z
    .number()
    .int({ error: 'Must be integer' })
    .min(0, 'Min: 0')
    .max(20, 'Max: 20')
    .optional()
    .describe('Context lines around each change (default: 3)'),
  maxFiles: z
    .number()
    .int({ error: 'Must be integer' })
    .min(1, 'Min: 1')
    .max(500, 'Max: 500')
    .optional()
    .default(50)
    .describe('Max files to preview'),
});

export const ClearSearchInputSchema = z.strictObject({});

// --- Outputs ---

const MatchOptionsSchema = z.strictObject({
  query: z.string(),
  caseSensitive: z.boolean(),
  useRegex: z.boolean(),
  wholeWord: z.boolean(),
  fileFilter: z.string(),
});

const LineMatchSchema = z.strictObject({
  lineNumber: z.number().describe('1-based line number'),
  lineContent: z.string().describe('Raw line text'),
});

const FileResultSchema = z.strictObject({
  path: z.string().describe('Absolute path'),
  relativePath: z.string().describe('Path relative to the root'),
  matches: z.array(LineMatchSchema),
});

const ReplaceFailureSchema = z.strictObject({
  path: z.string(),
  error: z.string(),
});

const ReplaceOutcomeSchema = z.strictObject({
  filesChanged: z.number().describe('Files with at least one replacement'),
  replacementsCount: z.number().describe('Total replacements'),
  failures: z
    .array(ReplaceFailureSchema)
    .describe('Files that could not be rewritten (sample)'),
});

export const SearchStateOutputSchema = z.strictObject({
  ok: z.literal(true),
  root: z.string().optional().describe('Active search root'),
  options: MatchOptionsSchema,
  replaceText: z.string(),
  generation: z.number().describe('Scan generation counter'),
  results: z.array(FileResultSchema).optional(),
  fileCount: z.number(),
  totalMatches: z.number(),
  truncated: z.boolean().describe('Result cap reached'),
  isSearching: z.boolean(),
  isReplacing: z.boolean(),
  regexError: z.string().optional(),
  searchUnavailable: z.string().optional(),
  lastReplaceResult: ReplaceOutcomeSchema.optional(),
});

export const ReplaceOutputSchema = z.strictObject({
  ok: z.literal(true),
  ...ReplaceOutcomeSchema.shape,
});

const FilePreviewSchema = z.strictObject({
  path: z.string(),
  relativePath: z.string(),
  count: z.number().describe('Replacements the file would receive'),
  diff: z.string().describe('Unified diff'),
});

export const PreviewReplaceOutputSchema = z.strictObject({
  ok: z.literal(true),
  files: z.array(FilePreviewSchema),
  totalReplacements: z.number(),
  truncated: z.boolean().describe('More result files than maxFiles'),
  failures: z.array(ReplaceFailureSchema),
});
