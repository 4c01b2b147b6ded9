import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  logDelegateCall: vi.fn().mockResolvedValue(undefined),
  logSystemCommand: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (text: string) => text,
}));

vi.mock('../../src/utils/process.js', () => ({
  runProcess: vi.fn(),
}));

import { ShellDelegate, parseCommand } from '../../src/delegates/shell.js';
import { runProcess } from '../../src/utils/process.js';

const runProcessMock = vi.mocked(runProcess);

function context() {
  return { requestId: 'req-1', turnIndex: 1, signal: new AbortController().signal };
}

beforeEach(() => {
  runProcessMock.mockReset();
});

describe('parseCommand', () => {
  it('splits on whitespace and honours quotes', () => {
    expect(parseCommand(`grep -n "hello world" 'src dir'`)).toEqual(['grep', '-n', 'hello world', 'src dir']);
  });

  it('rejects an unterminated quote', () => {
    expect(() => parseCommand('echo "oops')).toThrow('unterminated quote or escape sequence.');
  });
});

describe('ShellDelegate', () => {
  it.each([
    ['ls | wc -l', 'shell operators are not allowed'],
    ['echo hi; whoami', 'shell operators are not allowed'],
    ['cat $HOME/.ssh/id_rsa', 'shell operators are not allowed'],
    ['sudo ls', 'privilege escalation'],
    ['find / -name x -exec rm -rf {}', 'recursive delete'],
  ])('blocks %s without starting a process', async (command, reason) => {
    const shell = new ShellDelegate();

    const result = await shell.invoke({ command }, context());

    expect(result).toEqual({ ok: false, code: 'command_blocked', message: `Blocked unsafe command (${reason}).` });
    expect(runProcessMock).not.toHaveBeenCalled();
  });

  it('blocks executables outside the allowlist', async () => {
    const shell = new ShellDelegate({ allowedExecutables: ['echo'] });

    const result = await shell.invoke({ command: '/usr/bin/curl example.test' }, context());

    expect(result).toEqual({
      ok: false,
      code: 'command_blocked',
      message: "Blocked unsafe command (executable 'curl' is not in allowlist).",
    });
  });

  it('rejects missing commands', async () => {
    const result = await new ShellDelegate().invoke({}, context());
    expect(result).toEqual({ ok: false, code: 'invalid_input', message: "'command' must be a non-empty string." });
  });

  it('runs allowed commands without a shell and returns their output', async () => {
    runProcessMock.mockResolvedValue({ exitCode: 0, stdout: Buffer.from('hello world\n'), stderr: '', timedOut: false });
    const shell = new ShellDelegate({ cwd: '/tmp', timeoutMs: 2_000 });
    const ctx = context();

    const result = await shell.invoke({ command: 'echo "hello world"' }, ctx);

    expect(result).toEqual({ ok: true, output: 'hello world' });
    expect(runProcessMock).toHaveBeenCalledWith('echo', ['hello world'], {
      cwd: '/tmp',
      timeoutMs: 2_000,
      signal: ctx.signal,
      maxStdoutBytes: 1024 * 1024,
    });
  });

  it('reports non-zero exits and timeouts as failures', async () => {
    const shell = new ShellDelegate();
    runProcessMock.mockResolvedValueOnce({ exitCode: 2, stdout: Buffer.alloc(0), stderr: 'no such file', timedOut: false });
    runProcessMock.mockResolvedValueOnce({ exitCode: 124, stdout: Buffer.alloc(0), stderr: '', timedOut: true });

    expect(await shell.invoke({ command: 'cat missing.txt' }, context())).toEqual({
      ok: false,
      code: 'command_failed',
      message: 'Exit code 2. no such file',
    });
    expect(await shell.invoke({ command: 'find .' }, context())).toEqual({
      ok: false,
      code: 'command_timeout',
      message: 'Command timed out.',
    });
  });

  it('reports commands that cannot be started', async () => {
    runProcessMock.mockRejectedValue(new Error('spawn git ENOENT'));

    const result = await new ShellDelegate().invoke({ command: 'git status' }, context());

    expect(result).toEqual({ ok: false, code: 'command_failed', message: 'Command not runnable: spawn git ENOENT' });
  });
});
