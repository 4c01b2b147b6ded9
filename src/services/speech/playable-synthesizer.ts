import type {
  AudioPlayback,
  BackendProbeResult,
  SynthesisProvider,
  SynthesisRequest,
  SynthesisResult,
} from '../../types/backends.js';

/**
 * Adds local playback to a synthesis provider by composition: readiness, health and synthesis
 * go to the wrapped provider, `play` goes to the player.
 */
export class PlayableSynthesizer implements SynthesisProvider, AudioPlayback {
  readonly #inner: SynthesisProvider;
  readonly #player: AudioPlayback;

  constructor(inner: SynthesisProvider, player: AudioPlayback) {
    this.#inner = inner;
    this.#player = player;
  }

  get id(): string {
    return this.#inner.id;
  }

  get displayName(): string {
    return this.#inner.displayName;
  }

  get description(): string | undefined {
    return this.#inner.description;
  }

  async prepare(signal: AbortSignal): Promise<void> {
    await this.#inner.prepare?.(signal);
  }

  healthCheck(): Promise<BackendProbeResult> {
    return this.#inner.healthCheck();
  }

  synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
    return this.#inner.synthesize(request);
  }

  play(audio: Buffer, mimeType: string): Promise<void> {
    return this.#player.play(audio, mimeType);
  }

  async dispose(): Promise<void> {
    await this.#inner.dispose?.();
  }
}
