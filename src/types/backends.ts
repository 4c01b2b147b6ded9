/** Capability families served by interchangeable backend providers. */
export type BackendFamily = 'transcription' | 'synthesis';

/**
 * Readiness lifecycle of a provider inside a registry.
 *
 * `unregistered` is only ever reported for ids the registry does not hold.
 */
export type BackendReadinessState = 'unregistered' | 'initializing' | 'ready' | 'degraded' | 'failed';

/** Result of a cheap liveness probe. */
export interface BackendProbeResult {
  ok: boolean;
  reason: string;
  remediation?: string;
}

export interface BackendHealthCheck extends BackendProbeResult {
  checkedAt: string;
}

/** Common surface of every provider, regardless of family. */
export interface BackendProvider {
  readonly id: string;
  readonly displayName: string;
  readonly description?: string;
  /**
   * Readiness preparation (asset download, model load). Called at most once per
   * process unless the operator explicitly re-initializes a failed provider.
   */
  prepare?(signal: AbortSignal): Promise<void>;
  healthCheck(): Promise<BackendProbeResult>;
  dispose?(): Promise<void>;
}

export interface TranscriptionRequest {
  audio: Buffer;
  filename: string;
  mimeType?: string;
  language?: string;
  signal?: AbortSignal;
}

export interface TranscriptionResult {
  text: string;
  backendId: string;
  model?: string;
}

export interface TranscriptionProvider extends BackendProvider {
  transcribe(request: TranscriptionRequest): Promise<TranscriptionResult>;
}

export interface SynthesisRequest {
  text: string;
  voice?: string;
  signal?: AbortSignal;
}

export interface SynthesisResult {
  audio: Buffer;
  mimeType: string;
  backendId: string;
}

export interface SynthesisProvider extends BackendProvider {
  synthesize(request: SynthesisRequest): Promise<SynthesisResult>;
}

/** Output capability kept separate from readiness; a provider composes one. */
export interface AudioPlayback {
  play(audio: Buffer, mimeType: string): Promise<void>;
}

export function isPlaybackCapable(value: object): value is AudioPlayback {
  return 'play' in value && typeof value.play === 'function';
}

/** Point-in-time view of one registered provider. */
export interface BackendDescriptor {
  id: string;
  displayName: string;
  family: BackendFamily;
  state: BackendReadinessState;
  selected: boolean;
  failureReason: string | null;
  lastHealth: BackendHealthCheck | null;
  preparedAt: string | null;
}

export interface BackendInitReport {
  id: string;
  state: BackendReadinessState;
  durationMs: number;
  error?: string;
}

export interface RegistryInitSummary {
  family: BackendFamily;
  selectedId: string | null;
  reports: BackendInitReport[];
}

export type BackendRegistryEvent =
  | { type: 'backend.state'; family: BackendFamily; backend: BackendDescriptor }
  | { type: 'backend.selected'; family: BackendFamily; previousId: string | null; selectedId: string };

/** `fetch` as used by HTTP-backed providers; injectable for tests. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
