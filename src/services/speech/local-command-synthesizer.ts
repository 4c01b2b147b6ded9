import { access } from 'node:fs/promises';
import { BackendOperationError, VoxloopError, toErrorMessage } from '../../core/errors.js';
import type {
  BackendProbeResult,
  SynthesisProvider,
  SynthesisRequest,
  SynthesisResult,
} from '../../types/backends.js';
import { logSystemCommand } from '../../utils/logger.js';
import { runProcess, type ProcessResult } from '../../utils/process.js';
import type { AssetCache, AssetDescriptor } from '../asset-cache.js';

const MODEL_PLACEHOLDER = '{model}';
const VOICE_PLACEHOLDER = '{voice}';

export interface LocalCommandSynthesizerOptions {
  id?: string;
  displayName?: string;
  /** TTS executable that reads text on stdin and writes WAV to stdout, e.g. `piper`. */
  command: string;
  /** Arguments; `{model}` becomes the cached model path and `{voice}` the requested voice. */
  args?: string[];
  /** Voice model fetched into the asset cache during preparation. */
  model?: AssetDescriptor;
  assets: AssetCache;
  defaultVoice?: string;
  timeoutMs?: number;
}

/**
 * Synthesis through a local command. Preparation downloads the voice model once; afterwards
 * each request is one process run with the text on stdin.
 */
export class LocalCommandSynthesizer implements SynthesisProvider {
  readonly id: string;
  readonly displayName: string;
  readonly description = 'Local text-to-speech command with a cached voice model.';
  readonly #command: string;
  readonly #args: string[];
  readonly #model: AssetDescriptor | undefined;
  readonly #assets: AssetCache;
  readonly #defaultVoice: string;
  readonly #timeoutMs: number;
  #modelPath: string | null = null;

  constructor(options: LocalCommandSynthesizerOptions) {
    this.id = options.id ?? 'local-command';
    this.displayName = options.displayName ?? 'Local TTS';
    this.#command = options.command;
    this.#args = options.args ?? ['--model', MODEL_PLACEHOLDER, '--output_file', '-'];
    this.#model = options.model;
    this.#assets = options.assets;
    this.#defaultVoice = options.defaultVoice ?? 'default';
    this.#timeoutMs = options.timeoutMs ?? 60_000;
  }

  async prepare(signal: AbortSignal): Promise<void> {
    if (this.#model) {
      this.#modelPath = await this.#assets.ensure(this.#model, signal);
    }
    const probe = await runProcess(this.#command, ['--help'], { timeoutMs: 10_000, signal }).catch(
      (error: unknown) => {
        throw new BackendOperationError({
          code: 'backend_not_installed',
          message: `TTS command '${this.#command}' is not runnable: ${toErrorMessage(error)}`,
          backendId: this.id,
          remediation: `Install '${this.#command}' and make sure it is on PATH, or select another synthesis backend.`,
        });
      },
    );
    if (probe.timedOut) {
      throw new BackendOperationError({
        code: 'backend_not_installed',
        message: `TTS command '${this.#command}' did not respond to --help.`,
        backendId: this.id,
      });
    }
  }

  async healthCheck(): Promise<BackendProbeResult> {
    if (!this.#model) {
      return { ok: true, reason: `Using '${this.#command}' without a managed model.` };
    }
    if (!this.#modelPath) {
      return { ok: false, reason: 'Voice model has not been prepared.', remediation: 'Re-initialize this backend.' };
    }
    try {
      await access(this.#modelPath);
      return { ok: true, reason: `Voice model available at ${this.#modelPath}.` };
    } catch {
      return {
        ok: false,
        reason: `Voice model missing at ${this.#modelPath}.`,
        remediation: 'Re-initialize this backend to download the model again.',
      };
    }
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
    const text = request.text.trim();
    if (!text) {
      throw new VoxloopError('text_required', 'Cannot synthesize empty text.');
    }
    if (this.#model && !this.#modelPath) {
      throw new BackendOperationError({
        code: 'backend_not_ready',
        message: 'Voice model has not been prepared.',
        backendId: this.id,
        remediation: 'Initialize the synthesis registry before synthesizing.',
      });
    }

    const voice = request.voice ?? this.#defaultVoice;
    const args = this.#args.map((arg) =>
      arg.replaceAll(MODEL_PLACEHOLDER, this.#modelPath ?? '').replaceAll(VOICE_PLACEHOLDER, voice),
    );

    let result: ProcessResult;
    try {
      result = await runProcess(this.#command, args, {
        input: text,
        timeoutMs: this.#timeoutMs,
        signal: request.signal,
      });
    } catch (error) {
      throw new BackendOperationError({
        code: 'synthesis_failed',
        message: `Could not start '${this.#command}': ${toErrorMessage(error)}`,
        backendId: this.id,
        remediation: `Install '${this.#command}' or select another synthesis backend.`,
        cause: error,
      });
    }

    await logSystemCommand([this.#command, ...args].join(' '), result.stderr || '(no output)', result.exitCode);
    if (result.exitCode !== 0 || result.stdout.length === 0) {
      throw new BackendOperationError({
        code: 'synthesis_failed',
        message: result.timedOut
          ? `'${this.#command}' timed out after ${this.#timeoutMs}ms.`
          : `'${this.#command}' exited with code ${result.exitCode}: ${result.stderr.trim() || 'no audio produced'}`,
        backendId: this.id,
        remediation: 'Check the TTS command and its voice model.',
      });
    }

    return { audio: result.stdout, mimeType: 'audio/wav', backendId: this.id };
  }
}
