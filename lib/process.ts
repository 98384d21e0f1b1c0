import { spawn } from 'child_process';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  // Aborting kills the child process
  signal?: AbortSignal;
  // Receives stdout and stderr chunks as they arrive
  onOutput?: (chunk: string) => void;
  // When false, stdout is streamed to `onOutput` only and not kept
  captureStdout?: boolean;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

// Kept for error messages; stderr of a noisy compose run is not held whole
const STDERR_TAIL_BYTES = 8 * 1024;

/**
 * Runs `command` without a shell and resolves with its exit code once it closes.
 * Rejects only when the process cannot be started or is aborted; an aborted
 * run rejects after the child has exited. A non-zero exit is a normal result
 * for the caller to judge.
 */
export function runCommand(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
  const { cwd, env, signal, onOutput, captureStdout = true } = options;

  return new Promise((resolve, reject) => {
    let stdout = '';
    let stderr = '';

    const child = spawn(command, args, {
      cwd,
      env,
      signal,
      killSignal: 'SIGKILL',
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (output: string) => {
      if (captureStdout) stdout += output;
      onOutput?.(output);
    });

    child.stderr.on('data', (output: string) => {
      stderr = (stderr + output).slice(-STDERR_TAIL_BYTES);
      onOutput?.(output);
    });

    let abortError: Error | undefined;

    child.on('error', (error) => {
      if (signal?.aborted && child.pid !== undefined) {
        // Settled on 'close', once the killed child is gone
        abortError = error;
        return;
      }
      reject(error);
    });

    child.on('close', (code, closeSignal) => {
      if (abortError) {
        reject(abortError);
        return;
      }
      resolve({ exitCode: code ?? (closeSignal ? 128 : 1), stdout, stderr });
    });
  });
}

export function isSpawnNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
