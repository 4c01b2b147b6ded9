import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { toErrorMessage } from '../core/errors.js';

export interface VoxloopConfig {
    runtime: {
        apiSecret: string;
        apiPort: number;
        dbPath: string;
        /** `null` means unbounded. */
        queueMaxDepth: number | null;
        requestRetention: number;
    };
    reasoning: {
        apiUrl: string;
        apiKey: string;
        model: string;
        temperature: number;
        maxIterations: number;
        turnTimeoutMs: number;
        reasoningTimeoutMs: number;
        /** Wall-clock budget per request; `null` disables it. */
        maxDurationMs: number | null;
    };
    speech: {
        groqApiKey: string;
        whisperApiUrl: string;
        transcribeBackend: string;
        synthesisBackend: string;
        localTtsCommand: string;
        localTtsModelUrl: string;
        localTtsModelSha256: string;
        audioPlayerCommand: string;
        assetDir: string;
        stageTimeoutMs: number;
        maxAudioBytes: number;
    };
}

export const DEFAULT_CONFIG: VoxloopConfig = {
    runtime: {
        apiSecret: '',
        apiPort: 3100,
        dbPath: path.join('memory', 'voxloop.db'),
        queueMaxDepth: null,
        requestRetention: 200,
    },
    reasoning: {
        apiUrl: 'http://127.0.0.1:1234/v1',
        apiKey: '',
        model: 'local-model',
        temperature: 0.2,
        maxIterations: 8,
        turnTimeoutMs: 30_000,
        reasoningTimeoutMs: 60_000,
        maxDurationMs: null,
    },
    speech: {
        groqApiKey: '',
        whisperApiUrl: 'http://127.0.0.1:1234/v1',
        transcribeBackend: 'groq-whisper',
        synthesisBackend: 'groq-speech',
        localTtsCommand: '',
        localTtsModelUrl: '',
        localTtsModelSha256: '',
        audioPlayerCommand: 'aplay',
        assetDir: path.join(os.homedir(), '.voxloop', 'assets'),
        stageTimeoutMs: 60_000,
        maxAudioBytes: 25 * 1024 * 1024,
    },
};

type Env = Record<string, string | undefined>;

export function getConfigPath(overridePath?: string, env: Env = process.env): string {
    if (overridePath) return path.resolve(overridePath);
    const fromEnv = env.VOXLOOP_CONFIG_PATH?.trim();
    if (fromEnv) return path.resolve(fromEnv);
    return path.join(os.homedir(), '.voxloop', 'voxloop.json');
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/** Read the config file merged over defaults. A missing file yields the defaults. */
export async function readConfig(overridePath?: string, env: Env = process.env): Promise<VoxloopConfig> {
    const targetPath = getConfigPath(overridePath, env);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return mergeWithDefaults({});
        throw new Error(`Failed to read config file at ${targetPath}: ${toErrorMessage(error)}`, { cause: error });
    }
    try {
        const parsed: unknown = JSON.parse(rawData);
        return mergeWithDefaults(parsed);
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${toErrorMessage(error)}`, { cause: error });
    }
}

/** Atomic write: temp file with mode 0600, then rename over the target. */
export async function writeConfig(config: VoxloopConfig, overridePath?: string, env: Env = process.env): Promise<string> {
    const targetPath = getConfigPath(overridePath, env);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${process.pid}.${Date.now()}.tmp`;
    try {
        await fs.writeFile(tempPath, `${JSON.stringify(config, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw new Error(`Failed to save config to ${targetPath}: ${toErrorMessage(error)}`, { cause: error });
    }
    return targetPath;
}

// ── Merging ──────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = source[key];
    return isRecord(value) ? value : {};
}

function stringField(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function numberField(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function nullableNumberField(source: Record<string, unknown>, key: string, fallback: number | null): number | null {
    const value = source[key];
    if (value === null) return null;
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/** Field-by-field merge; values of the wrong type fall back to the default. */
export function mergeWithDefaults(loaded: unknown): VoxloopConfig {
    const root = isRecord(loaded) ? loaded : {};
    const runtime = section(root, 'runtime');
    const reasoning = section(root, 'reasoning');
    const speech = section(root, 'speech');
    const defaults = DEFAULT_CONFIG;

    return {
        runtime: {
            apiSecret: stringField(runtime, 'apiSecret', defaults.runtime.apiSecret),
            apiPort: numberField(runtime, 'apiPort', defaults.runtime.apiPort),
            dbPath: stringField(runtime, 'dbPath', defaults.runtime.dbPath),
            queueMaxDepth: nullableNumberField(runtime, 'queueMaxDepth', defaults.runtime.queueMaxDepth),
            requestRetention: numberField(runtime, 'requestRetention', defaults.runtime.requestRetention),
        },
        reasoning: {
            apiUrl: stringField(reasoning, 'apiUrl', defaults.reasoning.apiUrl),
            apiKey: stringField(reasoning, 'apiKey', defaults.reasoning.apiKey),
            model: stringField(reasoning, 'model', defaults.reasoning.model),
            temperature: numberField(reasoning, 'temperature', defaults.reasoning.temperature),
            maxIterations: numberField(reasoning, 'maxIterations', defaults.reasoning.maxIterations),
            turnTimeoutMs: numberField(reasoning, 'turnTimeoutMs', defaults.reasoning.turnTimeoutMs),
            reasoningTimeoutMs: numberField(reasoning, 'reasoningTimeoutMs', defaults.reasoning.reasoningTimeoutMs),
            maxDurationMs: nullableNumberField(reasoning, 'maxDurationMs', defaults.reasoning.maxDurationMs),
        },
        speech: {
            groqApiKey: stringField(speech, 'groqApiKey', defaults.speech.groqApiKey),
            whisperApiUrl: stringField(speech, 'whisperApiUrl', defaults.speech.whisperApiUrl),
            transcribeBackend: stringField(speech, 'transcribeBackend', defaults.speech.transcribeBackend),
            synthesisBackend: stringField(speech, 'synthesisBackend', defaults.speech.synthesisBackend),
            localTtsCommand: stringField(speech, 'localTtsCommand', defaults.speech.localTtsCommand),
            localTtsModelUrl: stringField(speech, 'localTtsModelUrl', defaults.speech.localTtsModelUrl),
            localTtsModelSha256: stringField(speech, 'localTtsModelSha256', defaults.speech.localTtsModelSha256),
            audioPlayerCommand: stringField(speech, 'audioPlayerCommand', defaults.speech.audioPlayerCommand),
            assetDir: stringField(speech, 'assetDir', defaults.speech.assetDir),
            stageTimeoutMs: numberField(speech, 'stageTimeoutMs', defaults.speech.stageTimeoutMs),
            maxAudioBytes: numberField(speech, 'maxAudioBytes', defaults.speech.maxAudioBytes),
        },
    };
}

// ── Environment overrides ────────────────────────────────────────────────────

function envString(env: Env, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

function envInt(env: Env, key: string): number | undefined {
    const raw = envString(env, key);
    if (raw === undefined) return undefined;
    const parsed = Number(raw);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Apply environment overrides on top of a file config. Malformed numeric values are ignored
 * here; `validateEnvironment` reports them.
 */
export function applyEnvOverrides(config: VoxloopConfig, env: Env = process.env): VoxloopConfig {
    return {
        runtime: {
            ...config.runtime,
            apiSecret: envString(env, 'API_SECRET') ?? config.runtime.apiSecret,
            apiPort: envInt(env, 'API_PORT') ?? config.runtime.apiPort,
            dbPath: envString(env, 'VOXLOOP_DB_PATH') ?? config.runtime.dbPath,
            queueMaxDepth: envInt(env, 'QUEUE_MAX_DEPTH') ?? config.runtime.queueMaxDepth,
        },
        reasoning: {
            ...config.reasoning,
            apiUrl: envString(env, 'REASONING_API_URL') ?? config.reasoning.apiUrl,
            apiKey: envString(env, 'REASONING_API_KEY') ?? config.reasoning.apiKey,
            model: envString(env, 'REASONING_MODEL') ?? config.reasoning.model,
            maxIterations: envInt(env, 'MAX_ITERATIONS') ?? config.reasoning.maxIterations,
            turnTimeoutMs: envInt(env, 'TURN_TIMEOUT_MS') ?? config.reasoning.turnTimeoutMs,
            reasoningTimeoutMs: envInt(env, 'REASONING_TIMEOUT_MS') ?? config.reasoning.reasoningTimeoutMs,
        },
        speech: {
            ...config.speech,
            groqApiKey: envString(env, 'GROQ_API_KEY') ?? config.speech.groqApiKey,
            whisperApiUrl: envString(env, 'WHISPER_API_URL') ?? config.speech.whisperApiUrl,
            transcribeBackend: envString(env, 'STS_TRANSCRIBE_BACKEND') ?? config.speech.transcribeBackend,
            synthesisBackend: envString(env, 'STS_SYNTHESIS_BACKEND') ?? config.speech.synthesisBackend,
            localTtsCommand: envString(env, 'LOCAL_TTS_COMMAND') ?? config.speech.localTtsCommand,
            localTtsModelUrl: envString(env, 'LOCAL_TTS_MODEL_URL') ?? config.speech.localTtsModelUrl,
            audioPlayerCommand: envString(env, 'AUDIO_PLAYER_COMMAND') ?? config.speech.audioPlayerCommand,
            assetDir: envString(env, 'VOXLOOP_ASSET_DIR') ?? config.speech.assetDir,
        },
    };
}

/** Config file (or defaults) with environment overrides applied. */
export async function resolveConfig(env: Env = process.env, overridePath?: string): Promise<VoxloopConfig> {
    const fileConfig = await readConfig(overridePath, env);
    return applyEnvOverrides(fileConfig, env);
}
