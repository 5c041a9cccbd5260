/**
 * Path normalization utilities for cross-platform consistency.
 */
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Expand home directory shorthand (~/) to actual home path.
 */
function expandHome(filepath: string): string {
  if (filepath.startsWith('~/') || filepath === '~') {
    return path.join(os.homedir(), filepath.slice(1));
  }
  return filepath;
}

/**
 * Normalize a path to a canonical, absolute form.
 *
 * - Expands ~ to home directory
 * - Resolves to absolute path
 * - On Windows, normalizes drive letter to lowercase for consistent comparison
 */
export function normalizePath(p: string): string {
  const expanded = expandHome(p);
  const resolved = path.resolve(expanded);

  // On Windows, normalize drive letter to lowercase (C: -> c:)
  if (process.platform === 'win32' && /^[A-Z]:/.test(resolved)) {
    return resolved.charAt(0).toLowerCase() + resolved.slice(1);
  }

  return resolved;
}

/**
 * True when `candidate` is `root` itself or lies below it. Both paths are
 * normalized first, so `..` segments cannot escape the root.
 */
export function isPathWithinRoot(candidate: string, root: string): boolean {
  const relative = path.relative(normalizePath(root), normalizePath(candidate));
  if (relative === '') return true;
  if (relative === '..' || relative.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(relative);
}

export function resolveAgainstRoot(input: string, root: string): string {
  return path.isAbsolute(input) ? normalizePath(input) : path.join(root, input);
}

async function realPathOrUndefined(p: string): Promise<string | undefined> {
  try {
    return await fs.realpath(p);
  } catch {
    // Unresolvable paths fail later, when they are read.
    return undefined;
  }
}

/**
 * Containment check that follows symlinks: `candidate` must lie under `root`
 * both as written and once both paths are resolved on disk.
 */
export async function isRealPathWithinRoot(
  candidate: string,
  root: string
): Promise<boolean> {
  if (!isPathWithinRoot(candidate, root)) return false;

  const realCandidate = await realPathOrUndefined(candidate);
  if (realCandidate === undefined) return true;
  const realRoot = (await realPathOrUndefined(root)) ?? normalizePath(root);
  return isPathWithinRoot(realCandidate, realRoot);
}
