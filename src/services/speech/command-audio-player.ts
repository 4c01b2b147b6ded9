import { randomUUID } from 'node:crypto';
import { unlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { VoxloopError } from '../../core/errors.js';
import type { AudioPlayback } from '../../types/backends.js';
import { logSystemCommand } from '../../utils/logger.js';
import { runProcess } from '../../utils/process.js';

const FILE_PLACEHOLDER = '{file}';

export interface CommandAudioPlayerOptions {
  /** Player executable, e.g. `aplay` or `afplay`. */
  command: string;
  /** Arguments; `{file}` is replaced by a temp file path, otherwise audio is piped to stdin. */
  args?: string[];
  timeoutMs?: number;
}

/** Plays audio through a local command-line player. */
export class CommandAudioPlayer implements AudioPlayback {
  readonly #command: string;
  readonly #args: string[];
  readonly #timeoutMs: number;

  constructor(options: CommandAudioPlayerOptions) {
    this.#command = options.command;
    this.#args = options.args ?? ['-q', '-'];
    this.#timeoutMs = options.timeoutMs ?? 120_000;
  }

  async play(audio: Buffer, mimeType: string): Promise<void> {
    if (audio.length === 0) {
      throw new VoxloopError('audio_required', 'Nothing to play.');
    }

    const usesFile = this.#args.includes(FILE_PLACEHOLDER);
    const extension = mimeType.includes('mpeg') ? 'mp3' : 'wav';
    const tempPath = path.join(os.tmpdir(), `voxloop-${randomUUID()}.${extension}`);
    const args = this.#args.map((arg) => (arg === FILE_PLACEHOLDER ? tempPath : arg));
    const preview = [this.#command, ...args].join(' ');

    if (usesFile) {
      await writeFile(tempPath, audio);
    }
    try {
      const result = await runProcess(this.#command, args, {
        input: usesFile ? undefined : audio,
        timeoutMs: this.#timeoutMs,
      });
      await logSystemCommand(preview, result.stderr || '(no output)', result.exitCode);
      if (result.exitCode !== 0) {
        throw new VoxloopError('playback_failed', `Player exited with code ${result.exitCode}: ${result.stderr.trim()}`);
      }
    } finally {
      if (usesFile) {
        await unlink(tempPath).catch((error: unknown) => {
          console.warn(`[CommandAudioPlayer] Could not remove ${tempPath}: ${String(error)}`);
        });
      }
    }
  }
}
