import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  logDelegateCall: vi.fn().mockResolvedValue(undefined),
  logSystemCommand: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (text: string) => text,
}));

import { DEFAULT_CONFIG, type VoxloopConfig } from '../../src/config/json-config.js';
import {
  createDefaultSynthesisProviders,
  createDefaultTranscriptionProviders,
  createRuntimeContext,
} from '../../src/core/runtime-context.js';
import type { ReasoningBackend } from '../../src/core/reasoning-loop.js';
import { AssetCache } from '../../src/services/asset-cache.js';
import { RequestHistoryStore } from '../../src/services/request-history.js';
import { PlayableSynthesizer } from '../../src/services/speech/playable-synthesizer.js';
import { FakeSynthesizer, FakeTranscriber } from '../harness/fakes.js';

function configWith(speech: Partial<VoxloopConfig['speech']> = {}): VoxloopConfig {
  return {
    ...DEFAULT_CONFIG,
    runtime: { ...DEFAULT_CONFIG.runtime, apiSecret: 'test-secret' },
    speech: { ...DEFAULT_CONFIG.speech, ...speech },
  };
}

const answeringBackend: ReasoningBackend = {
  complete: async (context) => ({
    plan: ['answer directly'],
    action: 'answer',
    response: `heard: ${context.input.text}`,
  }),
};

describe('default providers', () => {
  it('registers the hosted and local transcription backends', () => {
    const ids = createDefaultTranscriptionProviders(configWith()).map((provider) => provider.id);
    expect(ids).toEqual(['groq-whisper', 'whisper-api']);
  });

  it('adds the local command synthesizer only when a command is configured', () => {
    const assets = new AssetCache({ directory: 'memory/test-assets' });

    const hostedOnly = createDefaultSynthesisProviders(configWith({ audioPlayerCommand: '' }), assets);
    expect(hostedOnly.map((provider) => provider.id)).toEqual(['groq-speech']);
    expect(hostedOnly[0]).not.toBeInstanceOf(PlayableSynthesizer);

    const withLocal = createDefaultSynthesisProviders(configWith({ localTtsCommand: 'tts --stdout' }), assets);
    expect(withLocal.map((provider) => provider.id)).toEqual(['groq-speech', 'local-command']);
    expect(withLocal.every((provider) => provider instanceof PlayableSynthesizer)).toBe(true);
  });
});

describe('createRuntimeContext', () => {
  it('wires the loop, queue, registries and history together', async () => {
    const history = new RequestHistoryStore(':memory:');
    const context = createRuntimeContext(configWith(), {
      backend: answeringBackend,
      transcriptionProviders: [new FakeTranscriber('fake-stt')],
      synthesisProviders: [new FakeSynthesizer('fake-tts')],
      history,
    });

    expect(context.delegates.names()).toEqual(['command_line']);
    expect(context.transcription.selectedId()).toBe('fake-stt');
    expect(context.synthesis.selectedId()).toBe('fake-tts');

    const summaries = await context.initializeBackends();
    expect(summaries.map((summary) => [summary.family, summary.selectedId])).toEqual([
      ['transcription', 'fake-stt'],
      ['synthesis', 'fake-tts'],
    ]);

    const submitted = context.queue.submit({ text: 'status report' });
    const finished = await context.queue.waitFor(submitted.id);
    expect(finished.status).toBe('succeeded');
    expect(finished.result).toBe('heard: status report');
    expect(history.getRequest(submitted.id)?.status).toBe('succeeded');

    await context.shutdown();
    expect(() => context.queue.submit({ text: 'too late' })).toThrow('Orchestration queue is stopped; request rejected.');
  });

  it('runs without persistence when history is disabled', async () => {
    const context = createRuntimeContext(configWith(), {
      backend: answeringBackend,
      transcriptionProviders: [],
      synthesisProviders: [],
      history: null,
    });

    expect(context.history).toBeNull();
    expect(context.transcription.selectedId()).toBeNull();
    await context.shutdown();
  });
});
