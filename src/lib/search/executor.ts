import { spawn } from 'node:child_process';

import type { ProcessResult } from '../../config/types.js';
import { SPAWN_FAILURE_EXIT_CODE } from '../constants.js';
import { formatUnknownErrorMessage } from '../errors.js';

export type RunProcess = (
  executable: string,
  args: readonly string[],
  cwd: string
) => Promise<ProcessResult>;

function collect(chunks: Buffer[]): string | undefined {
  if (chunks.length === 0) return undefined;
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Runs `executable` in `cwd` and captures both output streams. The pipes are
 * read as data arrives, so a chatty child never stalls on a full buffer. The
 * promise always resolves: a spawn failure or a signal kill reports exit code
 * -1 with the reason in `stderr`.
 */
export const runProcess: RunProcess = (executable, args, cwd) =>
  new Promise<ProcessResult>((resolve) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let settled = false;

    const settle = (result: ProcessResult): void => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const child = spawn(executable, [...args], {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    child.stdout.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    child.on('error', (error) => {
      settle({
        stdout: undefined,
        stderr: formatUnknownErrorMessage(error),
        exitCode: SPAWN_FAILURE_EXIT_CODE,
      });
    });

    child.on('close', (code, signal) => {
      if (code === null || code < 0) {
        const reason =
          code === null
            ? `Process terminated by signal ${signal ?? 'unknown'}`
            : `Failed to start ${executable} (code ${code})`;
        settle({
          stdout: collect(stdoutChunks),
          stderr: collect(stderrChunks) ?? reason,
          exitCode: SPAWN_FAILURE_EXIT_CODE,
        });
        return;
      }
      settle({
        stdout: collect(stdoutChunks),
        stderr: collect(stderrChunks),
        exitCode: code,
      });
    });
  });
