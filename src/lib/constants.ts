// Helper function for parsing and validating integer environment variables
export function parseEnvInt(
  envVar: string,
  defaultValue: number,
  min: number,
  max: number
): number {
  const value = process.env[envVar];
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < min || parsed > max) {
    console.error(
      `[WARNING] Invalid ${envVar} value: ${value} (must be ${min}-${max}). Using default: ${defaultValue}`
    );
    return defaultValue;
  }

  return parsed;
}

function parseEnvString(envVar: string, defaultValue: string): string {
  const value = process.env[envVar]?.trim();
  return value ? value : defaultValue;
}

export const DEFAULT_DEBOUNCE_MS = parseEnvInt(
  'WORKSPACE_SEARCH_DEBOUNCE_MS',
  300,
  0,
  10_000
);

// Post-parse cap on the total number of published line matches.
export const DEFAULT_MAX_RESULTS = parseEnvInt(
  'WORKSPACE_SEARCH_MAX_RESULTS',
  1000,
  10,
  100_000
);

export const MAX_TEXT_FILE_SIZE = parseEnvInt(
  'WORKSPACE_SEARCH_MAX_FILE_SIZE',
  10 * 1024 * 1024,
  1024 * 1024,
  100 * 1024 * 1024
);

export const GIT_EXECUTABLE = parseEnvString('WORKSPACE_SEARCH_GIT', 'git');
export const GREP_EXECUTABLE = parseEnvString('WORKSPACE_SEARCH_GREP', 'grep');

export const GIT_MAX_MATCHES_PER_FILE = 50;

export const SPAWN_FAILURE_EXIT_CODE = -1;

export const MAX_REPLACE_FAILURES = 20;

export const NOISE_DIRECTORIES = [
  '.git',
  '.hg',
  '.svn',
  '.build',
  'build',
  'dist',
  'coverage',
  'node_modules',
  '.next',
] as const;
