/**
 * Inventory of every environment key the runtime reads.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `class`       'required' | 'optional' | 'conditional'.
 *   - `scope`       Subsystem that owns the key.
 *   - `condition`   Feature gate that makes a conditional key applicable.
 *   - `format`      Shape checked by the validator when the key is set.
 */

export type ConfigKeyClass = 'required' | 'optional' | 'conditional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'runtime' | 'reasoning' | 'speech' | 'storage';

/**
 * Feature gate identifiers used by `condition`.
 * Format: `<subsystem>:<feature>`.
 */
export type ConfigCondition = 'speech:groq' | 'speech:whisper_api' | 'speech:local_command';

export type ConfigKeyFormat = 'port' | 'positive_int' | 'url' | 'backend_id';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  /** Applies only when class === 'conditional'. */
  condition?: ConfigCondition;
  format?: ConfigKeyFormat;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Runtime ─────────────────────────────────────────────────────────────────
  {
    key: 'API_SECRET',
    type: 'secret',
    class: 'required',
    scope: 'runtime',
    description: 'Shared secret for HMAC request signatures and the WebSocket auth handshake.',
    remediation: 'Set API_SECRET in your .env file or in runtime.apiSecret of the config file.',
  },
  {
    key: 'API_PORT',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'port',
    description: 'Listening port for the HTTP API and WebSocket hub (default: 3100).',
    remediation: 'Set API_PORT to an integer between 1 and 65535, e.g. API_PORT=8080.',
  },
  {
    key: 'VOXLOOP_CONFIG_PATH',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Location of the JSON config file (default: ~/.voxloop/voxloop.json).',
    remediation: 'Point VOXLOOP_CONFIG_PATH at a readable JSON file.',
  },
  {
    key: 'VOXLOOP_LOG_DIR',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Directory for daily activity logs (default: memory/logs).',
    remediation: 'Set VOXLOOP_LOG_DIR to a writable directory.',
  },
  {
    key: 'QUEUE_MAX_DEPTH',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    format: 'positive_int',
    description: 'Maximum number of queued requests before submissions are rejected (default: unbounded).',
    remediation: 'Set QUEUE_MAX_DEPTH to a positive integer, or leave it unset for no limit.',
  },

  // ── Reasoning ───────────────────────────────────────────────────────────────
  {
    key: 'REASONING_API_URL',
    type: 'env',
    class: 'optional',
    scope: 'reasoning',
    format: 'url',
    description: 'Base URL of the OpenAI-compatible chat completions API (default: http://127.0.0.1:1234/v1).',
    remediation: 'Set REASONING_API_URL to an http(s) URL ending before /chat/completions.',
  },
  {
    key: 'REASONING_API_KEY',
    type: 'secret',
    class: 'optional',
    scope: 'reasoning',
    description: 'Bearer token sent to the reasoning API. Local servers usually ignore it.',
    remediation: 'Set REASONING_API_KEY when your reasoning endpoint requires authentication.',
  },
  {
    key: 'REASONING_MODEL',
    type: 'env',
    class: 'optional',
    scope: 'reasoning',
    description: 'Model name passed to the reasoning API (default: local-model).',
    remediation: 'Set REASONING_MODEL to a model your endpoint serves.',
  },
  {
    key: 'MAX_ITERATIONS',
    type: 'env',
    class: 'optional',
    scope: 'reasoning',
    format: 'positive_int',
    description: 'Turn budget of the top-level reasoning loop (default: 8).',
    remediation: 'Set MAX_ITERATIONS to a positive integer.',
  },
  {
    key: 'TURN_TIMEOUT_MS',
    type: 'env',
    class: 'optional',
    scope: 'reasoning',
    format: 'positive_int',
    description: 'Deadline for a single delegate invocation in milliseconds (default: 30000).',
    remediation: 'Set TURN_TIMEOUT_MS to a positive integer.',
  },
  {
    key: 'REASONING_TIMEOUT_MS',
    type: 'env',
    class: 'optional',
    scope: 'reasoning',
    format: 'positive_int',
    description: 'Deadline for a single reasoning backend call in milliseconds (default: 60000).',
    remediation: 'Set REASONING_TIMEOUT_MS to a positive integer.',
  },

  // ── Speech ──────────────────────────────────────────────────────────────────
  {
    key: 'GROQ_API_KEY',
    type: 'secret',
    class: 'conditional',
    condition: 'speech:groq',
    scope: 'speech',
    description: 'API key for Groq Whisper transcription and Groq speech synthesis.',
    remediation: 'Set GROQ_API_KEY to enable the groq-whisper and groq-speech backends.',
  },
  {
    key: 'WHISPER_API_URL',
    type: 'env',
    class: 'conditional',
    condition: 'speech:whisper_api',
    scope: 'speech',
    format: 'url',
    description: 'Base URL of a local Whisper-compatible transcription server (default: http://127.0.0.1:1234/v1).',
    remediation: 'Set WHISPER_API_URL to the base URL of your local transcription server.',
  },
  {
    key: 'STS_TRANSCRIBE_BACKEND',
    type: 'env',
    class: 'optional',
    scope: 'speech',
    format: 'backend_id',
    description: 'Preferred transcription backend id (groq-whisper or whisper-api).',
    remediation: 'Set STS_TRANSCRIBE_BACKEND to the id of a registered transcription backend.',
  },
  {
    key: 'STS_SYNTHESIS_BACKEND',
    type: 'env',
    class: 'optional',
    scope: 'speech',
    format: 'backend_id',
    description: 'Preferred synthesis backend id (groq-speech or local-command).',
    remediation: 'Set STS_SYNTHESIS_BACKEND to the id of a registered synthesis backend.',
  },
  {
    key: 'LOCAL_TTS_COMMAND',
    type: 'env',
    class: 'conditional',
    condition: 'speech:local_command',
    scope: 'speech',
    description: 'Executable of the local text-to-speech program (enables the local-command backend).',
    remediation: 'Set LOCAL_TTS_COMMAND to a TTS program that writes WAV audio to stdout.',
  },
  {
    key: 'LOCAL_TTS_MODEL_URL',
    type: 'env',
    class: 'optional',
    scope: 'speech',
    format: 'url',
    description: 'Download URL of the voice model used by the local TTS command.',
    remediation: 'Set LOCAL_TTS_MODEL_URL to an http(s) URL of the voice model file.',
  },
  {
    key: 'AUDIO_PLAYER_COMMAND',
    type: 'env',
    class: 'optional',
    scope: 'speech',
    description: 'Program used for local playback of synthesized audio (default: aplay).',
    remediation: 'Set AUDIO_PLAYER_COMMAND to a player that reads WAV from stdin.',
  },

  // ── Storage ─────────────────────────────────────────────────────────────────
  {
    key: 'VOXLOOP_ASSET_DIR',
    type: 'env',
    class: 'optional',
    scope: 'storage',
    description: 'Directory where downloaded model assets are cached (default: ~/.voxloop/assets).',
    remediation: 'Set VOXLOOP_ASSET_DIR to a writable directory.',
  },
  {
    key: 'VOXLOOP_DB_PATH',
    type: 'env',
    class: 'optional',
    scope: 'storage',
    description: 'SQLite file for request history (default: memory/voxloop.db).',
    remediation: 'Set VOXLOOP_DB_PATH to a writable file path, or :memory: to keep history in memory.',
  },
];

