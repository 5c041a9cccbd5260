import * as fs from 'node:fs/promises';
import { getSystemErrorName } from 'node:util';

import { Command, CommanderError, InvalidArgumentError } from 'commander';

import { isNodeError } from './lib/errors.js';
import { normalizePath } from './lib/path-utils.js';
import { pkgInfo } from './pkg-info.js';
import type { ServerOptions } from './server/types.js';

const { version: SERVER_VERSION } = pkgInfo;

const MAX_DEBOUNCE_MS = 10_000;
const MIN_MAX_RESULTS = 10;
const MAX_MAX_RESULTS = 100_000;

export class CliExitError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = 'CliExitError';
    this.exitCode = exitCode;
  }
}

function validateCliPath(inputPath: string): string {
  if (inputPath.includes('\0')) {
    throw new InvalidArgumentError('Path contains null bytes.');
  }
  if (inputPath.trim().length === 0) {
    throw new InvalidArgumentError('Path must not be empty.');
  }
  return inputPath;
}

function parseIntegerOption(
  name: string,
  min: number,
  max: number
): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(
        `${name} must be an integer between ${min} and ${max}.`
      );
    }
    return parsed;
  };
}

function normalizeDirectoryError(error: unknown, inputPath: string): Error {
  if (isNodeError(error) && typeof error.errno === 'number' && error.errno < 0) {
    // fs messages start with the code: "ENOENT: no such file or directory, stat '/x'"
    const name = getSystemErrorName(error.errno);
    const detail = error.message.startsWith(`${name}: `)
      ? error.message.slice(name.length + 2)
      : error.message;
    return new Error(`Cannot access directory ${inputPath} (${name}: ${detail})`);
  }
  if (isNodeError(error)) {
    return new Error(`Cannot access directory ${inputPath} (${error.code})`);
  }
  return error instanceof Error
    ? error
    : new Error(`Cannot access directory ${inputPath}`);
}

async function validateDirectoryPath(inputPath: string): Promise<string> {
  const normalized = normalizePath(inputPath);
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(normalized)).isDirectory();
  } catch (error) {
    throw normalizeDirectoryError(error, inputPath);
  }
  if (!isDirectory) {
    throw new Error(`${inputPath} is not a directory`);
  }
  return normalized;
}

function createCliProgram(output: string[]): Command {
  const cli = new Command();
  cli
    .name(pkgInfo.commandName)
    .usage('[options] [root]')
    .description(
      'MCP server for project-wide search and replace. Without a root, the first MCP root or the working directory is used.'
    )
    .argument('[root]', 'Directory to search', validateCliPath)
    .option(
      '--debounce-ms <ms>',
      'Delay between the last option change and the scan',
      parseIntegerOption('--debounce-ms', 0, MAX_DEBOUNCE_MS)
    )
    .option(
      '--max-results <count>',
      'Maximum number of line matches kept per scan',
      parseIntegerOption('--max-results', MIN_MAX_RESULTS, MAX_MAX_RESULTS)
    )
    .helpOption('-h, --help', 'Display command help')
    .version(SERVER_VERSION, '-v, --version', 'Display server version')
    .addHelpText(
      'after',
      `
Examples:
  $ workspace-search-mcp /path/to/project
  $ workspace-search-mcp --debounce-ms 150 --max-results 500
`
    );

  cli.allowUnknownOption(false);
  cli.allowExcessArguments(false);
  cli.showHelpAfterError('(run with --help for usage)');
  cli.exitOverride();
  cli.configureOutput({
    writeOut(text: string): void {
      output.push(text);
    },
    writeErr(text: string): void {
      output.push(text);
    },
    outputError(text: string, write: (str: string) => void): void {
      write(text);
    },
  });

  return cli;
}

function formatCliOutput(output: readonly string[], fallback: string): string {
  const joined = output.join('').trimEnd();
  if (joined.length > 0) return joined;
  return fallback.trimEnd();
}

function normalizeCliExitMessage(error: unknown): string {
  const rawMessage = error instanceof Error ? error.message : String(error);
  return rawMessage.startsWith('Error:') ? rawMessage : `Error: ${rawMessage}`;
}

export async function parseArgs(
  argv: readonly string[] = process.argv
): Promise<ServerOptions> {
  const output: string[] = [];
  const cli = createCliProgram(output);
  try {
    cli.parse([...argv], { from: 'node' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      throw new CliExitError(
        formatCliOutput(output, error.message),
        error.exitCode
      );
    }
    throw error;
  }

  const options = cli.opts<{ debounceMs?: number; maxResults?: number }>();
  const [rawRoot]: unknown[] = cli.processedArgs;
  const result: ServerOptions = {};
  if (options.debounceMs !== undefined) result.debounceMs = options.debounceMs;
  if (options.maxResults !== undefined) result.maxResults = options.maxResults;

  if (typeof rawRoot === 'string') {
    try {
      result.root = await validateDirectoryPath(rawRoot);
    } catch (error: unknown) {
      throw new CliExitError(normalizeCliExitMessage(error), 1);
    }
  }

  return result;
}
