export type PipelineStage = 'capture' | 'transcription' | 'reasoning' | 'synthesis' | 'playback';

export interface SpeechPipelineInput {
  audio: Buffer;
  filename?: string;
  mimeType?: string;
  language?: string;
  voice?: string;
  /** Synthesize the answer to audio. @default true */
  synthesize?: boolean;
  /** Play synthesized audio locally when the selected synthesis backend can. @default false */
  playback?: boolean;
  metadata?: Record<string, unknown>;
}

export interface PipelineStageTiming {
  backendId?: string;
  durationMs: number;
}

export interface SpeechPipelineResult {
  transcript: string;
  response: string;
  requestId: string;
  audio: { data: Buffer; mimeType: string; backendId: string } | null;
  played: boolean;
  stages: Partial<Record<PipelineStage, PipelineStageTiming>>;
}
