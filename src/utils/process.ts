import { spawn } from 'node:child_process';

export interface ProcessOptions {
  cwd?: string;
  /** Written to stdin, which is then closed. */
  input?: string | Buffer;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Maximum bytes kept from stdout. @default 33554432 */
  maxStdoutBytes?: number;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessResult {
  exitCode: number;
  stdout: Buffer;
  stderr: string;
  timedOut: boolean;
}

const DEFAULT_MAX_STDOUT_BYTES = 32 * 1024 * 1024;
const MAX_STDERR_CHARS = 8_000;

/**
 * Run an executable without a shell and collect its output.
 *
 * Resolves for every exit, including non-zero codes and timeouts (exit code 124); rejects only
 * when the process cannot be started at all.
 */
export function runProcess(executable: string, args: string[], options: ProcessOptions = {}): Promise<ProcessResult> {
  const maxStdoutBytes = options.maxStdoutBytes ?? DEFAULT_MAX_STDOUT_BYTES;

  return new Promise((resolve, reject) => {
    const child = spawn(executable, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      windowsHide: true,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    const chunks: Buffer[] = [];
    let stdoutBytes = 0;
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const kill = (): void => {
      if (child.exitCode === null && !child.killed) {
        child.kill('SIGTERM');
      }
    };
    const timer =
      options.timeoutMs && options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            kill();
          }, options.timeoutMs)
        : null;
    const onAbort = (): void => kill();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = (): void => {
      if (timer) {
        clearTimeout(timer);
      }
      options.signal?.removeEventListener('abort', onAbort);
    };

    child.stdout.on('data', (chunk: Buffer) => {
      if (stdoutBytes >= maxStdoutBytes) {
        return;
      }
      const kept = chunk.subarray(0, maxStdoutBytes - stdoutBytes);
      chunks.push(kept);
      stdoutBytes += kept.length;
    });
    child.stderr.on('data', (chunk: Buffer) => {
      if (stderr.length < MAX_STDERR_CHARS) {
        stderr += chunk.toString('utf8');
      }
    });

    child.on('error', (error) => {
      cleanup();
      if (!settled) {
        settled = true;
        reject(error);
      }
    });
    child.on('close', (code) => {
      cleanup();
      if (settled) {
        return;
      }
      settled = true;
      resolve({
        exitCode: timedOut ? 124 : (code ?? 1),
        stdout: Buffer.concat(chunks),
        stderr: stderr.slice(0, MAX_STDERR_CHARS),
        timedOut,
      });
    });

    // A child that exits before reading stdin surfaces EPIPE here; its exit code tells the story.
    child.stdin.on('error', () => undefined);
    if (options.input !== undefined) {
      child.stdin.end(options.input);
    } else {
      child.stdin.end();
    }

    if (options.signal?.aborted) {
      kill();
    }
  });
}
