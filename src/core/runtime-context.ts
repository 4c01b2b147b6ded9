import path from 'node:path';
import type { VoxloopConfig } from '../config/json-config.js';
import { DEFAULT_DELEGATE_MANIFEST, buildDelegateTable, type DelegateManifest } from '../delegates/manifest.js';
import { AssetCache } from '../services/asset-cache.js';
import { BackendRegistry } from '../services/backend-registry.js';
import { RequestHistoryStore } from '../services/request-history.js';
import { CommandAudioPlayer } from '../services/speech/command-audio-player.js';
import { GroqSpeechSynthesizer } from '../services/speech/groq-synthesizer.js';
import { GroqWhisperTranscriber } from '../services/speech/groq-transcriber.js';
import { LocalCommandSynthesizer } from '../services/speech/local-command-synthesizer.js';
import { OpenAiCompatibleTranscriber } from '../services/speech/openai-compatible-transcriber.js';
import { PlayableSynthesizer } from '../services/speech/playable-synthesizer.js';
import type {
  FetchLike,
  RegistryInitSummary,
  SynthesisProvider,
  TranscriptionProvider,
} from '../types/backends.js';
import { logThought } from '../utils/logger.js';
import { ChatCompletionReasoningBackend } from './chat-completion-backend.js';
import type { DelegateTable } from './delegate-table.js';
import { OrchestrationQueue } from './orchestration-queue.js';
import { ReasoningLoop, type ReasoningBackend, type ReasoningLoopOptions } from './reasoning-loop.js';
import { SpeechPipeline } from './speech-pipeline.js';

/** Everything the process needs, built once at startup and passed explicitly. */
export interface RuntimeContext {
  readonly config: VoxloopConfig;
  readonly delegates: DelegateTable;
  readonly loop: ReasoningLoop;
  readonly queue: OrchestrationQueue;
  readonly transcription: BackendRegistry<TranscriptionProvider>;
  readonly synthesis: BackendRegistry<SynthesisProvider>;
  readonly pipeline: SpeechPipeline;
  readonly history: RequestHistoryStore | null;
  readonly startedAt: number;
  /** Prepare every provider of both families concurrently; never blocks request intake. */
  initializeBackends(): Promise<RegistryInitSummary[]>;
  shutdown(): Promise<void>;
}

/** Overrides for the parts that talk to the outside world. */
export interface RuntimeDependencies {
  backend?: ReasoningBackend;
  manifest?: DelegateManifest;
  transcriptionProviders?: TranscriptionProvider[];
  synthesisProviders?: SynthesisProvider[];
  /** `null` disables persistence; omitted opens the configured SQLite file. */
  history?: RequestHistoryStore | null;
  fetchImpl?: FetchLike;
}

function loopOptionsFrom(config: VoxloopConfig): ReasoningLoopOptions {
  return {
    maxIterations: config.reasoning.maxIterations,
    turnTimeoutMs: config.reasoning.turnTimeoutMs,
    reasoningTimeoutMs: config.reasoning.reasoningTimeoutMs,
    ...(config.reasoning.maxDurationMs !== null ? { maxDurationMs: config.reasoning.maxDurationMs } : {}),
  };
}

export function createDefaultTranscriptionProviders(
  config: VoxloopConfig,
  fetchImpl?: FetchLike,
): TranscriptionProvider[] {
  return [
    new GroqWhisperTranscriber({ apiKey: config.speech.groqApiKey }),
    new OpenAiCompatibleTranscriber({ baseUrl: config.speech.whisperApiUrl, fetchImpl }),
  ];
}

export function createDefaultSynthesisProviders(config: VoxloopConfig, assets: AssetCache): SynthesisProvider[] {
  const providers: SynthesisProvider[] = [new GroqSpeechSynthesizer({ apiKey: config.speech.groqApiKey })];

  if (config.speech.localTtsCommand) {
    const modelUrl = config.speech.localTtsModelUrl;
    providers.push(
      new LocalCommandSynthesizer({
        command: config.speech.localTtsCommand,
        assets,
        ...(modelUrl
          ? {
              model: {
                name: 'local-tts-voice',
                url: modelUrl,
                ...(config.speech.localTtsModelSha256 ? { sha256: config.speech.localTtsModelSha256 } : {}),
              },
            }
          : {}),
      }),
    );
  }

  const playerCommand = config.speech.audioPlayerCommand.trim();
  if (!playerCommand) {
    return providers;
  }
  const player = new CommandAudioPlayer({ command: playerCommand });
  return providers.map((provider) => new PlayableSynthesizer(provider, player));
}

export function createRuntimeContext(config: VoxloopConfig, deps: RuntimeDependencies = {}): RuntimeContext {
  const loopOptions = loopOptionsFrom(config);
  const backend =
    deps.backend ??
    new ChatCompletionReasoningBackend({
      baseUrl: config.reasoning.apiUrl,
      model: config.reasoning.model,
      apiKey: config.reasoning.apiKey,
      temperature: config.reasoning.temperature,
      fetchImpl: deps.fetchImpl,
    });

  const delegates = buildDelegateTable(deps.manifest ?? DEFAULT_DELEGATE_MANIFEST, { backend, loopOptions });
  const loop = new ReasoningLoop(backend, delegates, loopOptions);
  const queue = new OrchestrationQueue(loop, {
    ...(config.runtime.queueMaxDepth !== null ? { maxQueueDepth: config.runtime.queueMaxDepth } : {}),
    retention: config.runtime.requestRetention,
    runOptions: loopOptions,
  });

  const assets = new AssetCache({ directory: path.resolve(config.speech.assetDir), fetchImpl: deps.fetchImpl });
  const transcription = new BackendRegistry<TranscriptionProvider>('transcription', {
    preferredId: config.speech.transcribeBackend,
  });
  const synthesis = new BackendRegistry<SynthesisProvider>('synthesis', {
    preferredId: config.speech.synthesisBackend,
  });
  for (const provider of deps.transcriptionProviders ?? createDefaultTranscriptionProviders(config, deps.fetchImpl)) {
    transcription.register(provider);
  }
  for (const provider of deps.synthesisProviders ?? createDefaultSynthesisProviders(config, assets)) {
    synthesis.register(provider);
  }

  const pipeline = new SpeechPipeline(
    { transcription, synthesis, queue },
    {
      stageTimeoutMs: config.speech.stageTimeoutMs,
      maxAudioBytes: config.speech.maxAudioBytes,
    },
  );

  const history = deps.history === undefined ? new RequestHistoryStore(config.runtime.dbPath) : deps.history;
  const detachHistory = history ? history.attach(queue) : () => undefined;

  void logThought(
    `[Runtime] Context ready: ${delegates.size} delegate(s), ${transcription.ids().length} transcription and ${synthesis.ids().length} synthesis backend(s).`,
  );

  return {
    config,
    delegates,
    loop,
    queue,
    transcription,
    synthesis,
    pipeline,
    history,
    startedAt: Date.now(),
    initializeBackends: () => Promise.all([transcription.initializeAll(), synthesis.initializeAll()]),
    async shutdown(): Promise<void> {
      await queue.stop('Runtime shutting down.');
      detachHistory();
      await Promise.allSettled([transcription.shutdown(), synthesis.shutdown()]);
      history?.close();
      void logThought('[Runtime] Shut down.');
    },
  };
}
