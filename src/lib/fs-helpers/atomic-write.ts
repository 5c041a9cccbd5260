import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';

import { isNodeError } from '../errors.js';

export interface AtomicWriteOptions {
  encoding?: BufferEncoding;
}

async function resolveWriteTarget(filePath: string): Promise<string> {
  try {
    return await fs.realpath(filePath);
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return filePath;
    throw error;
  }
}

async function readExistingMode(target: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(target);
    return stats.mode & 0o7777;
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return undefined;
    throw error;
  }
}

async function removeQuietly(tempPath: string): Promise<void> {
  try {
    await fs.rm(tempPath, { force: true });
  } catch (cleanupError) {
    console.error(
      `[atomicWriteFile] Failed to remove temp file ${tempPath}:`,
      cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
    );
  }
}

/**
 * Writes `content` to a temp file beside the target and renames it into place,
 * so readers observe either the old body or the new one. Symlinks are resolved
 * first; the existing file mode is kept.
 */
export async function atomicWriteFile(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const { encoding = 'utf-8' } = options;

  const target = await resolveWriteTarget(filePath);
  const mode = await readExistingMode(target);
  const tempPath = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${randomUUID()}.tmp`
  );

  try {
    await fs.writeFile(tempPath, content, {
      encoding,
      flag: 'wx',
      ...(mode !== undefined ? { mode } : {}),
    });
    if (mode !== undefined) {
      await fs.chmod(tempPath, mode);
    }
    await fs.rename(tempPath, target);
  } catch (error) {
    await removeQuietly(tempPath);
    throw error;
  }
}
