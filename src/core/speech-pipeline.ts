import type { BackendRegistry } from '../services/backend-registry.js';
import type { SynthesisProvider, TranscriptionProvider } from '../types/backends.js';
import { isPlaybackCapable } from '../types/backends.js';
import type {
  PipelineStage,
  PipelineStageTiming,
  SpeechPipelineInput,
  SpeechPipelineResult,
} from '../types/speech.js';
import { logThought } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { PipelineStageError, VoxloopError, type PipelinePartialResult } from './errors.js';
import type { OrchestrationQueue } from './orchestration-queue.js';

const DEFAULT_STAGE_TIMEOUT_MS = 60_000;
const DEFAULT_REASONING_TIMEOUT_MS = 300_000;
const DEFAULT_MAX_AUDIO_BYTES = 25 * 1024 * 1024;
const DEFAULT_FILENAME = 'speech.wav';

/** Stages whose failure still leaves a deliverable text answer. */
const NON_TERMINAL_STAGES: ReadonlySet<PipelineStage> = new Set(['synthesis', 'playback']);

export interface SpeechPipelineDependencies {
  transcription: BackendRegistry<TranscriptionProvider>;
  synthesis: BackendRegistry<SynthesisProvider>;
  queue: OrchestrationQueue;
}

export interface SpeechPipelineOptions {
  /** Deadline for transcription, synthesis and playback individually. @default 60000 */
  stageTimeoutMs?: number;
  /** Deadline for the queued reasoning request, including time spent waiting in the queue. @default 300000 */
  reasoningTimeoutMs?: number;
  /** @default 26214400 */
  maxAudioBytes?: number;
}

/**
 * Speech in, speech out: capture → transcription → reasoning → synthesis → playback.
 *
 * Providers are looked up with `current()` at the start of every stage, so a swap between two
 * stages takes effect for the next stage while the running one finishes where it started.
 * The pipeline never changes registry state.
 */
export class SpeechPipeline {
  readonly #deps: SpeechPipelineDependencies;
  readonly #stageTimeoutMs: number;
  readonly #reasoningTimeoutMs: number;
  readonly #maxAudioBytes: number;

  constructor(deps: SpeechPipelineDependencies, options: SpeechPipelineOptions = {}) {
    this.#deps = deps;
    this.#stageTimeoutMs = Math.max(1, options.stageTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS);
    this.#reasoningTimeoutMs = Math.max(1, options.reasoningTimeoutMs ?? DEFAULT_REASONING_TIMEOUT_MS);
    this.#maxAudioBytes = Math.max(1, options.maxAudioBytes ?? DEFAULT_MAX_AUDIO_BYTES);
  }

  async process(input: SpeechPipelineInput): Promise<SpeechPipelineResult> {
    const stages: SpeechPipelineResult['stages'] = {};
    const partial: PipelinePartialResult = {};

    await this.#stage('capture', stages, partial, async () => {
      this.#validateAudio(input.audio);
      return { value: undefined };
    });

    const transcript = await this.#stage('transcription', stages, partial, async () => {
      const provider = this.#deps.transcription.current();
      const controller = new AbortController();
      const result = await withTimeout(
        provider.transcribe({
          audio: input.audio,
          filename: input.filename?.trim() || DEFAULT_FILENAME,
          mimeType: input.mimeType,
          language: input.language,
          signal: controller.signal,
        }),
        this.#stageTimeoutMs,
        `Transcription with '${provider.id}'`,
        { controller },
      );
      const text = result.text.trim();
      if (!text) {
        throw new VoxloopError('empty_transcript', `Backend '${provider.id}' returned an empty transcript.`);
      }
      return { value: text, backendId: provider.id };
    });
    partial.transcript = transcript;

    const { requestId, response } = await this.#stage('reasoning', stages, partial, async () => {
      const { queue } = this.#deps;
      const submitted = queue.submit({
        text: transcript,
        metadata: { ...input.metadata, source: 'speech' },
      });
      partial.requestId = submitted.id;

      const record = await withTimeout(
        queue.waitFor(submitted.id),
        this.#reasoningTimeoutMs,
        `Reasoning request ${submitted.id}`,
      ).catch((error: unknown) => {
        const status = queue.get(submitted.id)?.status;
        if (status === 'queued' || status === 'running') {
          queue.cancel(submitted.id, 'Speech pipeline reasoning deadline passed.');
        }
        throw error;
      });

      if (record.status !== 'succeeded' || record.result === undefined) {
        const code = record.error?.code ?? 'reasoning_failure';
        throw new VoxloopError(code, record.error?.reason ?? `Request ended as '${record.status}'.`);
      }
      return { value: { requestId: record.id, response: record.result } };
    });
    partial.response = response;

    const result: SpeechPipelineResult = {
      transcript,
      response,
      requestId,
      audio: null,
      played: false,
      stages,
    };

    if (input.synthesize === false) {
      return result;
    }

    const synthesized = await this.#stage('synthesis', stages, partial, async () => {
      const provider = this.#deps.synthesis.current();
      const controller = new AbortController();
      const audio = await withTimeout(
        provider.synthesize({ text: response, voice: input.voice, signal: controller.signal }),
        this.#stageTimeoutMs,
        `Synthesis with '${provider.id}'`,
        { controller },
      );
      return { value: { provider, audio }, backendId: provider.id };
    });
    result.audio = {
      data: synthesized.audio.audio,
      mimeType: synthesized.audio.mimeType,
      backendId: synthesized.audio.backendId,
    };

    if (input.playback === true && isPlaybackCapable(synthesized.provider)) {
      const player = synthesized.provider;
      await this.#stage('playback', stages, partial, async () => {
        await withTimeout(
          player.play(synthesized.audio.audio, synthesized.audio.mimeType),
          this.#stageTimeoutMs,
          `Playback with '${synthesized.provider.id}'`,
        );
        return { value: undefined, backendId: synthesized.provider.id };
      });
      result.played = true;
    }

    return result;
  }

  #validateAudio(audio: Buffer): void {
    if (!Buffer.isBuffer(audio) || audio.length === 0) {
      throw new VoxloopError('audio_required', 'No audio was captured.');
    }
    if (audio.length > this.#maxAudioBytes) {
      throw new VoxloopError(
        'audio_too_large',
        `Captured audio is ${audio.length} bytes; the limit is ${this.#maxAudioBytes}.`,
      );
    }
  }

  async #stage<T>(
    stage: PipelineStage,
    stages: SpeechPipelineResult['stages'],
    partial: PipelinePartialResult,
    run: () => Promise<{ value: T; backendId?: string }>,
  ): Promise<T> {
    const startedAt = Date.now();
    try {
      const { value, backendId } = await run();
      const timing: PipelineStageTiming = { durationMs: Date.now() - startedAt };
      if (backendId) {
        timing.backendId = backendId;
      }
      stages[stage] = timing;
      return value;
    } catch (error) {
      const failure = new PipelineStageError({
        stage,
        cause: error,
        terminal: !NON_TERMINAL_STAGES.has(stage),
        partial: { ...partial },
      });
      void logThought(`[SpeechPipeline] ${failure.message}`);
      throw failure;
    }
  }
}
