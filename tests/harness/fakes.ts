import type {
  BackendProbeResult,
  SynthesisProvider,
  SynthesisRequest,
  SynthesisResult,
  TranscriptionProvider,
  TranscriptionRequest,
  TranscriptionResult,
} from '../../src/types/backends.js';
import type { LoopRunOptions } from '../../src/core/reasoning-loop.js';
import type { RequestRunner } from '../../src/core/orchestration-queue.js';
import type { LoopRunResult, RequestInput } from '../../src/types/orchestration.js';

export interface FakeProviderOptions {
  prepare?: (signal: AbortSignal) => Promise<void>;
  health?: () => Promise<BackendProbeResult>;
}

export class FakeTranscriber implements TranscriptionProvider {
  readonly displayName: string;
  readonly calls: TranscriptionRequest[] = [];
  readonly prepare?: (signal: AbortSignal) => Promise<void>;
  readonly #health: () => Promise<BackendProbeResult>;
  #transcribe: (request: TranscriptionRequest) => Promise<TranscriptionResult>;

  constructor(readonly id: string, text = 'hello there', options: FakeProviderOptions = {}) {
    this.displayName = `Fake ${id}`;
    this.prepare = options.prepare;
    this.#health = options.health ?? (async () => ({ ok: true, reason: 'ok' }));
    this.#transcribe = async () => ({ text, backendId: id });
  }

  respondWith(handler: (request: TranscriptionRequest) => Promise<TranscriptionResult>): this {
    this.#transcribe = handler;
    return this;
  }

  healthCheck(): Promise<BackendProbeResult> {
    return this.#health();
  }

  transcribe(request: TranscriptionRequest): Promise<TranscriptionResult> {
    this.calls.push(request);
    return this.#transcribe(request);
  }
}

export class FakeSynthesizer implements SynthesisProvider {
  readonly displayName: string;
  readonly calls: SynthesisRequest[] = [];
  readonly prepare?: (signal: AbortSignal) => Promise<void>;

  constructor(readonly id: string, options: FakeProviderOptions = {}) {
    this.displayName = `Fake ${id}`;
    this.prepare = options.prepare;
  }

  async healthCheck(): Promise<BackendProbeResult> {
    return { ok: true, reason: 'ok' };
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
    this.calls.push(request);
    return { audio: Buffer.from(`audio:${request.text}`), mimeType: 'audio/wav', backendId: this.id };
  }
}

/** Synthesizer that also plays, recording what it was given. */
export class FakePlayableSynthesizer extends FakeSynthesizer {
  readonly played: Buffer[] = [];

  async play(audio: Buffer): Promise<void> {
    this.played.push(audio);
  }
}

/**
 * Runner whose runs stay open until released, so tests can observe the queue mid-flight.
 * `answer` builds the final text from the input.
 */
export class GatedRunner implements RequestRunner {
  readonly started: string[] = [];
  readonly signals: AbortSignal[] = [];
  #active = 0;
  maxConcurrent = 0;
  #gates: Array<() => void> = [];

  constructor(private readonly answer: (input: RequestInput) => string = (input) => `echo: ${input.text}`) {}

  async run(input: RequestInput, options: LoopRunOptions = {}): Promise<LoopRunResult> {
    this.started.push(input.text);
    if (options.signal) {
      this.signals.push(options.signal);
    }
    this.#active += 1;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.#active);
    try {
      await new Promise<void>((resolve) => {
        this.#gates.push(resolve);
        options.signal?.addEventListener('abort', () => resolve(), { once: true });
      });
      if (options.signal?.aborted) {
        return { outcome: { status: 'cancelled', reason: String(options.signal.reason) }, trace: [] };
      }
      const text = this.answer(input);
      return {
        outcome: { status: 'final', text },
        trace: [
          {
            index: 1,
            observation: input.text,
            plan: [],
            action: 'answer',
            response: text,
            producedAt: new Date().toISOString(),
          },
        ],
      };
    } finally {
      this.#active -= 1;
    }
  }

  /** Let the oldest open run finish. */
  releaseNext(): void {
    this.#gates.shift()?.();
  }

  get open(): number {
    return this.#gates.length;
  }
}

/** Yield until queued promise jobs and timers at 0ms have run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

/** Poll `condition` every few ms until it holds or `timeoutMs` passes. */
export async function waitUntil(condition: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time.');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** Runner that answers immediately with `answer(input)`. */
export function instantRunner(answer: (input: RequestInput) => string = (input) => `echo: ${input.text}`): RequestRunner {
  return {
    run: async (input) => ({ outcome: { status: 'final', text: answer(input) }, trace: [] }),
  };
}
