import path from 'node:path';
import { toErrorMessage } from '../core/errors.js';
import { logSystemCommand, scrubSensitiveText } from '../utils/logger.js';
import { runProcess, type ProcessResult } from '../utils/process.js';
import type { Delegate, DelegateInput, DelegateInvocationContext, DelegateResult } from './types.js';

const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_TIMEOUT_MS = 120_000;
const MAX_OUTPUT_LENGTH = 4_000;
const SHELL_OPERATOR_PATTERN = /[|&;<>`$]/;
export const DEFAULT_ALLOWED_EXECUTABLES: readonly string[] = [
  'ls',
  'cat',
  'head',
  'tail',
  'wc',
  'grep',
  'find',
  'echo',
  'date',
  'pwd',
  'uname',
  'whoami',
  'df',
  'du',
  'git',
];
const BLOCKED_COMMAND_PATTERNS: Array<{ pattern: RegExp; reason: string }> = [
  { pattern: /\brm\s+-rf\b/i, reason: 'recursive delete' },
  { pattern: /\bdd\b/i, reason: 'raw disk copy' },
  { pattern: /\bmkfs\b/i, reason: 'filesystem format' },
  { pattern: /\bformat\s+[A-Za-z]:/i, reason: 'disk format command' },
  { pattern: /\b(shutdown|reboot|halt|poweroff)\b/i, reason: 'system power command' },
  { pattern: /\bsudo\b/i, reason: 'privilege escalation' },
];

export interface ShellDelegateOptions {
  /** Executable basenames the delegate may start. */
  allowedExecutables?: readonly string[];
  cwd?: string;
  /** Per-command cap; the reasoning loop's turn timeout still applies on top. @default 10000 */
  timeoutMs?: number;
}

function truncateOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_LENGTH) {
    return output;
  }
  return `${output.slice(0, MAX_OUTPUT_LENGTH)}\n...[truncated]`;
}

function resolveTimeout(timeoutMs: unknown, fallback: number): number {
  if (typeof timeoutMs !== 'number' || !Number.isFinite(timeoutMs) || timeoutMs < 1) {
    return fallback;
  }
  return Math.min(MAX_TIMEOUT_MS, Math.floor(timeoutMs));
}

function detectBlockedCommand(command: string): string | null {
  for (const entry of BLOCKED_COMMAND_PATTERNS) {
    if (entry.pattern.test(command)) {
      return entry.reason;
    }
  }
  return null;
}

function normalizeExecutableName(value: string): string {
  return path.basename(value).trim().toLowerCase().replace(/\.(exe|cmd|bat|ps1)$/i, '');
}

/** Split a command line into argv, honouring single and double quotes. */
export function parseCommand(command: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: '"' | '\'' | null = null;
  let escapeNext = false;

  for (const char of command) {
    if (escapeNext) {
      current += char;
      escapeNext = false;
      continue;
    }
    if (quote === '"' && char === '\\') {
      escapeNext = true;
      continue;
    }
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }
    if (char === '"' || char === '\'') {
      quote = char;
      continue;
    }
    if (/\s/.test(char)) {
      if (current.length > 0) {
        tokens.push(current);
        current = '';
      }
      continue;
    }
    current += char;
  }

  if (escapeNext || quote) {
    throw new Error('unterminated quote or escape sequence.');
  }
  if (current.length > 0) {
    tokens.push(current);
  }
  return tokens;
}

/**
 * Delegate that runs one allow-listed program per call, never through a shell.
 * Input: `{ command: string, timeoutMs?: number }`.
 */
export class ShellDelegate implements Delegate {
  readonly name = 'shell';
  readonly kind = 'tool';
  readonly description =
    'Run a single read-only command line (no pipes, redirects or chaining) and return its output.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      command: { type: 'string', description: 'Command line, e.g. "ls -la src".' },
      timeoutMs: { type: 'number', description: 'Optional timeout in milliseconds.' },
    },
    required: ['command'],
  };
  readonly #allowed: Set<string>;
  readonly #cwd: string | undefined;
  readonly #timeoutMs: number;

  constructor(options: ShellDelegateOptions = {}) {
    this.#allowed = new Set(
      (options.allowedExecutables ?? DEFAULT_ALLOWED_EXECUTABLES).map(normalizeExecutableName).filter(Boolean),
    );
    this.#cwd = options.cwd;
    this.#timeoutMs = resolveTimeout(options.timeoutMs, DEFAULT_TIMEOUT_MS);
  }

  async invoke(input: DelegateInput, context: DelegateInvocationContext): Promise<DelegateResult> {
    const command = typeof input.command === 'string' ? input.command.trim() : '';
    if (!command) {
      return { ok: false, code: 'invalid_input', message: "'command' must be a non-empty string." };
    }
    if (SHELL_OPERATOR_PATTERN.test(command)) {
      return this.#block(command, 'shell operators are not allowed');
    }
    const blockedReason = detectBlockedCommand(command);
    if (blockedReason) {
      return this.#block(command, blockedReason);
    }

    let argv: string[];
    try {
      argv = parseCommand(command);
    } catch (error) {
      return { ok: false, code: 'invalid_input', message: `Failed to parse command: ${toErrorMessage(error)}` };
    }
    const [executable, ...args] = argv;
    if (!executable) {
      return { ok: false, code: 'invalid_input', message: 'Command must contain an executable.' };
    }
    if (!this.#allowed.has(normalizeExecutableName(executable))) {
      return this.#block(command, `executable '${normalizeExecutableName(executable)}' is not in allowlist`);
    }

    let result: ProcessResult;
    try {
      result = await runProcess(executable, args, {
        cwd: this.#cwd,
        timeoutMs: resolveTimeout(input.timeoutMs, this.#timeoutMs),
        signal: context.signal,
        maxStdoutBytes: 1024 * 1024,
      });
    } catch (error) {
      const message = `Command not runnable: ${toErrorMessage(error)}`;
      await logSystemCommand(command, message, 127);
      return { ok: false, code: 'command_failed', message };
    }

    const output = truncateOutput(
      scrubSensitiveText(`${result.stdout.toString('utf8')}${result.stderr}`.trim()),
    );
    await logSystemCommand(command, output || '(no output)', result.exitCode);

    if (result.timedOut) {
      return { ok: false, code: 'command_timeout', message: `Command timed out. ${output}`.trim() };
    }
    if (result.exitCode !== 0) {
      return { ok: false, code: 'command_failed', message: `Exit code ${result.exitCode}. ${output}`.trim() };
    }
    return { ok: true, output: output || '(no output)' };
  }

  async #block(command: string, reason: string): Promise<DelegateResult> {
    const message = `Blocked unsafe command (${reason}).`;
    await logSystemCommand(command, message, 126);
    return { ok: false, code: 'command_blocked', message };
  }
}
