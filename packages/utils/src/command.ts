/**
 * Command Execution
 * 
 * Runs an external binary without a shell and collects its output.
 * A run that outlives its timeout is sent SIGTERM, then SIGKILL.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes per stream
}

const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_MAX_OUTPUT_SIZE = 10 * 1024 * 1024;
const KILL_GRACE_MS = 10000;

class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  append(chunk: Buffer): void {
    if (this.size >= this.limit) return;
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Execute a command and resolve with its exit status and output.
 * Rejects only when the process cannot be spawned.
 */
export function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  const limit = options.maxOutputSize ?? DEFAULT_MAX_OUTPUT_SIZE;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout = new OutputBuffer(limit);
    const stderr = new OutputBuffer(limit);

    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;
    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
    }, timeout);

    const clearTimers = (): void => {
      clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
    };

    child.stdout.on('data', (chunk: Buffer) => stdout.append(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.append(chunk));

    child.on('close', (code, signal) => {
      clearTimers();
      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimers();
      reject(error);
    });
  });
}
