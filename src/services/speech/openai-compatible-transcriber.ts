import { BackendOperationError, VoxloopError, toErrorMessage } from '../../core/errors.js';
import type {
  BackendProbeResult,
  FetchLike,
  TranscriptionProvider,
  TranscriptionRequest,
  TranscriptionResult,
} from '../../types/backends.js';
import { scrubSensitiveText } from '../../utils/logger.js';

const DEFAULT_BASE_URL = 'http://127.0.0.1:1234/v1';
const DEFAULT_MODEL = 'whisper-large-v3-turbo';
const REMEDIATION = 'Start a Whisper-compatible API server (WHISPER_API_URL) or switch the transcription backend.';

export interface OpenAiCompatibleTranscriberOptions {
  baseUrl?: string;
  model?: string;
  apiKey?: string;
  id?: string;
  fetchImpl?: FetchLike;
}

/** Transcription against a local OpenAI-compatible `/audio/transcriptions` endpoint. */
export class OpenAiCompatibleTranscriber implements TranscriptionProvider {
  readonly id: string;
  readonly displayName = 'Whisper API';
  readonly description = 'Local Whisper-compatible HTTP endpoint.';
  readonly #baseUrl: string;
  readonly #model: string;
  readonly #apiKey: string;
  readonly #fetch: FetchLike;

  constructor(options: OpenAiCompatibleTranscriberOptions = {}) {
    this.id = options.id ?? 'whisper-api';
    this.#baseUrl = (options.baseUrl?.trim() || DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.#model = options.model ?? DEFAULT_MODEL;
    this.#apiKey = options.apiKey?.trim() || 'local';
    this.#fetch = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  /** Reachable means any answer below 500 from `GET /models`. */
  async healthCheck(): Promise<BackendProbeResult> {
    const endpoint = `${this.#baseUrl}/models`;
    try {
      const response = await this.#fetch(endpoint, { headers: this.#headers() });
      if (response.status < 500) {
        return { ok: true, reason: `Endpoint reachable (${response.status}).`, remediation: REMEDIATION };
      }
      return { ok: false, reason: `Endpoint responded with ${response.status}.`, remediation: REMEDIATION };
    } catch (error) {
      return {
        ok: false,
        reason: scrubSensitiveText(`${this.id} unreachable: ${toErrorMessage(error)}`),
        remediation: REMEDIATION,
      };
    }
  }

  async transcribe(request: TranscriptionRequest): Promise<TranscriptionResult> {
    if (request.audio.length === 0) {
      throw new VoxloopError('audio_required', 'Cannot transcribe empty audio.');
    }

    const form = new FormData();
    form.append('model', this.#model);
    form.append(
      'file',
      new Blob([new Uint8Array(request.audio)], { type: request.mimeType ?? 'audio/wav' }),
      request.filename,
    );
    if (request.language) {
      form.append('language', request.language);
    }

    let payload: unknown;
    try {
      const response = await this.#fetch(`${this.#baseUrl}/audio/transcriptions`, {
        method: 'POST',
        headers: this.#headers(),
        body: form,
        signal: request.signal,
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${(await response.text()).slice(0, 200)}`);
      }
      payload = await response.json();
    } catch (error) {
      throw new BackendOperationError({
        code: 'transcription_failed',
        message: scrubSensitiveText(`Whisper transcription failed: ${toErrorMessage(error)}`),
        backendId: this.id,
        remediation: REMEDIATION,
        cause: error,
      });
    }

    const text =
      typeof payload === 'object' && payload !== null && 'text' in payload && typeof payload.text === 'string'
        ? payload.text.trim()
        : '';
    if (!text) {
      throw new BackendOperationError({
        code: 'empty_transcript',
        message: 'Whisper returned an empty transcript.',
        backendId: this.id,
        remediation: 'Speak clearly and make sure the model supports the uploaded audio format.',
        statusCode: 422,
      });
    }
    return { text, backendId: this.id, model: this.#model };
  }

  #headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.#apiKey}` };
  }
}
