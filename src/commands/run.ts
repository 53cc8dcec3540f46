/**
 * Run shell commands concurrently as one task group.
 * The first command to fail stops the others.
 */

import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { TaskGroup, createDeadline } from '../group/index.js';
import type { ErrorPrecedence } from '../group/index.js';

export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null) {
    super(`command "${command}" exited with code ${exitCode}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
  }
}

export interface CommandResult {
  command: string;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Stopped because the group was cancelled */
  cancelled: boolean;
  duration: number; // milliseconds
}

export interface RunCommandsOptions {
  cwd?: string;
  shell?: string;
  timeoutMs?: number;
  verbose?: boolean;
  errorPrecedence?: ErrorPrecedence;
  signal?: AbortSignal;
  onOutput?: (command: string, data: string, type: 'stdout' | 'stderr') => void;
}

export interface RunCommandsSummary {
  results: CommandResult[];
  error?: unknown;
  duration: number;
}

export async function runCommands(
  commands: string[],
  options: RunCommandsOptions = {},
): Promise<RunCommandsSummary> {
  const startTime = Date.now();
  const group = new TaskGroup({
    name: 'run',
    verbose: options.verbose,
    errorPrecedence: options.errorPrecedence,
  });

  const results: CommandResult[] = commands.map((command) => ({
    command,
    exitCode: null,
    stdout: '',
    stderr: '',
    cancelled: false,
    duration: 0,
  }));

  group.go(...results.map((result) => (signal: AbortSignal) => runCommand(result, signal, options)));

  const timeout = options.timeoutMs ? createDeadline(options.timeoutMs, options.signal) : undefined;

  let error: unknown;
  try {
    await group.wait(timeout ? timeout.signal : options.signal);
  } catch (err) {
    error = err;
  } finally {
    timeout?.dispose();
  }

  return { results, error, duration: Date.now() - startTime };
}

function runCommand(
  result: CommandResult,
  signal: AbortSignal,
  options: RunCommandsOptions,
): Promise<void> {
  const startTime = Date.now();

  return new Promise((resolve, reject) => {
    // own process group, so cancellation reaches everything the shell starts
    const child = spawn(options.shell ?? 'sh', ['-c', result.command], {
      cwd: options.cwd ?? process.cwd(),
      detached: true,
    });
    child.stdin.end();

    const onAbort = () => {
      result.cancelled = true;
      killProcessGroup(child);
    };
    const cleanup = () => {
      signal.removeEventListener('abort', onAbort);
      result.duration = Date.now() - startTime;
    };
    signal.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', (data: Buffer) => {
      const str = data.toString();
      result.stdout += str;
      options.onOutput?.(result.command, str, 'stdout');
    });

    child.stderr.on('data', (data: Buffer) => {
      const str = data.toString();
      result.stderr += str;
      options.onOutput?.(result.command, str, 'stderr');
    });

    child.on('close', (code: number | null) => {
      cleanup();
      result.exitCode = code;

      // a command killed by cancellation stops cleanly
      if (result.cancelled || code === 0) {
        resolve();
      } else {
        reject(new CommandFailedError(result.command, code));
      }
    });

    child.on('error', (error: Error) => {
      cleanup();
      reject(error);
    });
  });
}

function killProcessGroup(child: ChildProcess): void {
  if (child.pid === undefined) {
    child.kill('SIGTERM');
    return;
  }

  try {
    process.kill(-child.pid, 'SIGTERM');
  } catch {
    // group already gone, or process groups unsupported on this platform
    child.kill('SIGTERM');
  }
}
