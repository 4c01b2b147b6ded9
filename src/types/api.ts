import type { BackendDescriptor, BackendFamily, BackendReadinessState } from './backends.js';
import type { QueueStats, RequestSnapshot } from './orchestration.js';
import type { PipelineStage, PipelineStageTiming } from './speech.js';

export interface ApiErrorDetail {
    code: string;
    message: string;
    remediation?: string;
    stage?: PipelineStage;
    partial?: Record<string, unknown>;
}

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: ApiErrorDetail;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    queue: QueueStats;
    backends: Record<BackendFamily, {
        selectedId: string | null;
        backends: BackendDescriptor[];
    }>;
    websocket?: { activeClients: number };
}

export interface ReadinessData {
    ready: boolean;
    families: Record<BackendFamily, { selectedId: string | null; state: BackendReadinessState }>;
}

// ── Requests ────────────────────────────────────────────────────────────────

export interface SubmitRequestBody {
    text: string;
    metadata?: Record<string, unknown>;
}

export interface RequestListData {
    requests: RequestSnapshot[];
    stats: QueueStats;
}

// ── Backends ────────────────────────────────────────────────────────────────

export interface BackendListData {
    family: BackendFamily;
    selectedId: string | null;
    backends: BackendDescriptor[];
}

// ── Speech ──────────────────────────────────────────────────────────────────

export interface SpeechResponseData {
    requestId: string;
    transcript: string;
    response: string;
    audio: { base64: string; mimeType: string; backendId: string } | null;
    played: boolean;
    stages: Partial<Record<PipelineStage, PipelineStageTiming>>;
}
