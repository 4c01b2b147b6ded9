import Groq from 'groq-sdk';
import { BackendOperationError, VoxloopError, toErrorMessage } from '../../core/errors.js';
import type {
  BackendProbeResult,
  SynthesisProvider,
  SynthesisRequest,
  SynthesisResult,
} from '../../types/backends.js';

const DEFAULT_MODEL_ID = 'canopylabs/orpheus-v1-english';
const DEFAULT_VOICE = 'autumn';
const REMEDIATION = 'Set GROQ_API_KEY (or speech.groqApiKey in voxloop.json) and restart, or select another synthesis backend.';

export interface GroqSpeechSynthesizerOptions {
  apiKey: string;
  modelId?: string;
  voice?: string;
  id?: string;
}

/** Speech synthesis backed by the Groq Audio Speech API. Produces WAV. */
export class GroqSpeechSynthesizer implements SynthesisProvider {
  readonly id: string;
  readonly displayName = 'Groq Speech';
  readonly description = 'Hosted text-to-speech through the Groq API.';
  readonly #apiKey: string;
  readonly #modelId: string;
  readonly #voice: string;
  #client: Groq | null = null;

  constructor(options: GroqSpeechSynthesizerOptions) {
    this.id = options.id ?? 'groq-speech';
    this.#apiKey = options.apiKey.trim();
    this.#modelId = options.modelId ?? DEFAULT_MODEL_ID;
    this.#voice = options.voice ?? DEFAULT_VOICE;
  }

  async prepare(): Promise<void> {
    this.#requireClient();
  }

  async healthCheck(): Promise<BackendProbeResult> {
    if (!this.#apiKey) {
      return { ok: false, reason: 'GROQ_API_KEY is not configured.', remediation: REMEDIATION };
    }
    return { ok: true, reason: `Configured for ${this.#modelId} (${this.#voice}).` };
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
    const text = request.text.trim();
    if (!text) {
      throw new VoxloopError('text_required', 'Cannot synthesize empty text.');
    }
    const client = this.#requireClient();

    try {
      const wav = await client.audio.speech.create(
        {
          model: this.#modelId,
          voice: request.voice ?? this.#voice,
          response_format: 'wav',
          input: text,
        },
        { signal: request.signal },
      );
      return {
        audio: Buffer.from(await wav.arrayBuffer()),
        mimeType: 'audio/wav',
        backendId: this.id,
      };
    } catch (error) {
      throw new BackendOperationError({
        code: 'synthesis_failed',
        message: `Groq synthesis failed: ${toErrorMessage(error)}`,
        backendId: this.id,
        remediation: REMEDIATION,
        cause: error,
      });
    }
  }

  #requireClient(): Groq {
    if (!this.#apiKey) {
      throw new BackendOperationError({
        code: 'backend_not_configured',
        message: 'GROQ_API_KEY is not configured.',
        backendId: this.id,
        remediation: REMEDIATION,
      });
    }
    this.#client ??= new Groq({ apiKey: this.#apiKey });
    return this.#client;
  }
}
