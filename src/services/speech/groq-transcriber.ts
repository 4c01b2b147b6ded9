import Groq, { toFile } from 'groq-sdk';
import { BackendOperationError, VoxloopError, toErrorMessage } from '../../core/errors.js';
import type {
  BackendProbeResult,
  TranscriptionProvider,
  TranscriptionRequest,
  TranscriptionResult,
} from '../../types/backends.js';

/** Groq model IDs supported for audio transcription. */
type WhisperModel = 'whisper-large-v3' | 'whisper-large-v3-turbo';

const DEFAULT_MODEL: WhisperModel = 'whisper-large-v3-turbo';
const REMEDIATION = 'Set GROQ_API_KEY (or speech.groqApiKey in voxloop.json) and restart, or select another transcription backend.';

export interface GroqWhisperTranscriberOptions {
  apiKey: string;
  model?: WhisperModel;
  id?: string;
}

/**
 * Transcription backed by Groq's hosted Whisper API.
 *
 * Transcription is fully awaited before the caller receives the text, so downstream text
 * handling never starts on a partial result.
 */
export class GroqWhisperTranscriber implements TranscriptionProvider {
  readonly id: string;
  readonly displayName = 'Groq Whisper';
  readonly description = 'Hosted Whisper transcription through the Groq API.';
  readonly #apiKey: string;
  readonly #model: WhisperModel;
  #client: Groq | null = null;

  constructor(options: GroqWhisperTranscriberOptions) {
    this.id = options.id ?? 'groq-whisper';
    this.#apiKey = options.apiKey.trim();
    this.#model = options.model ?? DEFAULT_MODEL;
  }

  async prepare(): Promise<void> {
    this.#requireClient();
  }

  async healthCheck(): Promise<BackendProbeResult> {
    if (!this.#apiKey) {
      return { ok: false, reason: 'GROQ_API_KEY is not configured.', remediation: REMEDIATION };
    }
    return { ok: true, reason: `Configured for ${this.#model}.` };
  }

  async transcribe(request: TranscriptionRequest): Promise<TranscriptionResult> {
    if (request.audio.length === 0) {
      throw new VoxloopError('audio_required', 'Cannot transcribe empty audio.');
    }
    const client = this.#requireClient();

    let text: string;
    try {
      const file = await toFile(request.audio, request.filename, {
        type: request.mimeType ?? 'audio/wav',
      });
      const result = await client.audio.transcriptions.create(
        {
          file,
          model: this.#model,
          response_format: 'json',
          ...(request.language ? { language: request.language } : {}),
        },
        { signal: request.signal },
      );
      text = result.text.trim();
    } catch (error) {
      throw new BackendOperationError({
        code: 'transcription_failed',
        message: `Groq transcription failed: ${toErrorMessage(error)}`,
        backendId: this.id,
        remediation: REMEDIATION,
        cause: error,
      });
    }

    if (!text) {
      throw new VoxloopError('empty_transcript', 'Groq returned an empty transcript.');
    }
    return { text, backendId: this.id, model: this.#model };
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
