import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  logDelegateCall: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (text: string) => text,
}));

import { SpeechPipeline, type SpeechPipelineOptions } from '../../src/core/speech-pipeline.js';
import { OrchestrationQueue, type RequestRunner } from '../../src/core/orchestration-queue.js';
import { BackendRegistry } from '../../src/services/backend-registry.js';
import { PipelineStageError } from '../../src/core/errors.js';
import type { SynthesisProvider, TranscriptionProvider } from '../../src/types/backends.js';
import type { RequestInput } from '../../src/types/orchestration.js';
import { FakePlayableSynthesizer, FakeSynthesizer, FakeTranscriber } from '../harness/fakes.js';

const AUDIO = Buffer.from('RIFF-test-audio');

interface Harness {
  pipeline: SpeechPipeline;
  transcriber: FakeTranscriber;
  synthesizer: FakeSynthesizer;
  transcription: BackendRegistry<TranscriptionProvider>;
  synthesis: BackendRegistry<SynthesisProvider>;
  queue: OrchestrationQueue;
  inputs: RequestInput[];
}

async function createHarness(
  options: {
    runner?: RequestRunner;
    synthesizer?: FakeSynthesizer;
    pipeline?: SpeechPipelineOptions;
  } = {},
): Promise<Harness> {
  const inputs: RequestInput[] = [];
  const runner: RequestRunner = options.runner ?? {
    run: async (input) => {
      inputs.push(input);
      return { outcome: { status: 'final', text: `You said: ${input.text}` }, trace: [] };
    },
  };
  const transcriber = new FakeTranscriber('fake-stt');
  const synthesizer = options.synthesizer ?? new FakeSynthesizer('fake-tts');
  const transcription = new BackendRegistry<TranscriptionProvider>('transcription');
  const synthesis = new BackendRegistry<SynthesisProvider>('synthesis');
  transcription.register(transcriber);
  synthesis.register(synthesizer);
  await Promise.all([transcription.initializeAll(), synthesis.initializeAll()]);

  const queue = new OrchestrationQueue(runner);
  const pipeline = new SpeechPipeline({ transcription, synthesis, queue }, options.pipeline);
  return { pipeline, transcriber, synthesizer, transcription, synthesis, queue, inputs };
}

async function captureFailure(work: Promise<unknown>): Promise<PipelineStageError> {
  try {
    await work;
  } catch (error) {
    if (error instanceof PipelineStageError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the pipeline to fail.');
}

describe('SpeechPipeline', () => {
  it('turns audio into a transcript, an answer and synthesized audio', async () => {
    const { pipeline, transcriber, synthesizer, inputs } = await createHarness();

    const result = await pipeline.process({ audio: AUDIO, metadata: { caller: 'test' } });

    expect(result.transcript).toBe('hello there');
    expect(result.response).toBe('You said: hello there');
    expect(result.audio).toEqual({
      data: Buffer.from('audio:You said: hello there'),
      mimeType: 'audio/wav',
      backendId: 'fake-tts',
    });
    expect(result.played).toBe(false);
    expect(Object.keys(result.stages)).toEqual(['capture', 'transcription', 'reasoning', 'synthesis']);
    expect(result.stages.transcription?.backendId).toBe('fake-stt');
    expect(result.stages.synthesis?.backendId).toBe('fake-tts');

    expect(transcriber.calls[0].filename).toBe('speech.wav');
    expect(synthesizer.calls[0].text).toBe('You said: hello there');
    expect(inputs[0]).toEqual({ text: 'hello there', metadata: { caller: 'test', source: 'speech' } });
  });

  it('skips synthesis when asked to', async () => {
    const { pipeline, synthesizer } = await createHarness();

    const result = await pipeline.process({ audio: AUDIO, synthesize: false });

    expect(result.audio).toBeNull();
    expect(synthesizer.calls).toHaveLength(0);
  });

  it('plays the audio when the synthesizer can and playback is requested', async () => {
    const player = new FakePlayableSynthesizer('speaker');
    const { pipeline } = await createHarness({ synthesizer: player });

    const result = await pipeline.process({ audio: AUDIO, playback: true });

    expect(result.played).toBe(true);
    expect(player.played).toEqual([Buffer.from('audio:You said: hello there')]);
    expect(result.stages.playback?.backendId).toBe('speaker');
  });

  it('fails at capture when no audio arrives', async () => {
    const { pipeline, transcriber } = await createHarness();

    const failure = await captureFailure(pipeline.process({ audio: Buffer.alloc(0) }));

    expect(failure.stage).toBe('capture');
    expect(failure.causeCode).toBe('audio_required');
    expect(failure.terminal).toBe(true);
    expect(transcriber.calls).toHaveLength(0);
  });

  it('fails at capture when the audio is over the limit', async () => {
    const { pipeline } = await createHarness({ pipeline: { maxAudioBytes: 4 } });

    const failure = await captureFailure(pipeline.process({ audio: AUDIO }));

    expect(failure.causeCode).toBe('audio_too_large');
    expect(failure.message).toBe('Speech pipeline failed at capture: Captured audio is 15 bytes; the limit is 4.');
  });

  it('stops after a transcription timeout without reasoning or synthesizing', async () => {
    const { pipeline, transcriber, synthesizer, queue } = await createHarness({ pipeline: { stageTimeoutMs: 20 } });
    transcriber.respondWith(() => new Promise<never>(() => undefined));

    const failure = await captureFailure(pipeline.process({ audio: AUDIO }));

    expect(failure.stage).toBe('transcription');
    expect(failure.causeCode).toBe('timeout');
    expect(failure.terminal).toBe(true);
    expect(failure.message).toBe(
      "Speech pipeline failed at transcription: Transcription with 'fake-stt' timed out after 20ms.",
    );
    expect(synthesizer.calls).toHaveLength(0);
    expect(queue.list()).toHaveLength(0);
  });

  it('rejects an empty transcript', async () => {
    const { pipeline, transcriber } = await createHarness();
    transcriber.respondWith(async () => ({ text: '   ', backendId: 'fake-stt' }));

    const failure = await captureFailure(pipeline.process({ audio: AUDIO }));

    expect(failure.stage).toBe('transcription');
    expect(failure.causeCode).toBe('empty_transcript');
  });

  it('reports a failed reasoning request with the transcript as partial output', async () => {
    const { pipeline, synthesizer } = await createHarness({
      runner: {
        run: async () => ({
          outcome: { status: 'error', code: 'malformed_turn', reason: 'Backend spoke gibberish.' },
          trace: [],
        }),
      },
    });

    const failure = await captureFailure(pipeline.process({ audio: AUDIO }));

    expect(failure.stage).toBe('reasoning');
    expect(failure.causeCode).toBe('malformed_turn');
    expect(failure.partial.transcript).toBe('hello there');
    expect(failure.partial.requestId).toBeDefined();
    expect(synthesizer.calls).toHaveLength(0);
  });

  it('keeps the text answer when synthesis fails', async () => {
    const broken = new FakeSynthesizer('broken-tts');
    broken.synthesize = async () => {
      throw new Error('voice unavailable');
    };
    const { pipeline } = await createHarness({ synthesizer: broken });

    const failure = await captureFailure(pipeline.process({ audio: AUDIO }));

    expect(failure.stage).toBe('synthesis');
    expect(failure.terminal).toBe(false);
    expect(failure.causeCode).toBe('unexpected_error');
    expect(failure.partial).toMatchObject({ transcript: 'hello there', response: 'You said: hello there' });
  });

  it('uses a synthesis backend selected while earlier stages ran', async () => {
    const { pipeline, transcriber, synthesis, synthesizer } = await createHarness();
    const replacement = new FakeSynthesizer('replacement-tts');
    synthesis.register(replacement);
    await synthesis.initializeAll();

    transcriber.respondWith(async () => {
      await synthesis.select('replacement-tts');
      return { text: 'switch voices', backendId: 'fake-stt' };
    });

    const result = await pipeline.process({ audio: AUDIO });

    expect(result.audio?.backendId).toBe('replacement-tts');
    expect(replacement.calls).toHaveLength(1);
    expect(synthesizer.calls).toHaveLength(0);
  });
});
