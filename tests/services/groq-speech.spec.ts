import { describe, expect, it } from 'vitest';
import { BackendOperationError } from '../../src/core/errors.js';
import { GroqSpeechSynthesizer } from '../../src/services/speech/groq-synthesizer.js';
import { GroqWhisperTranscriber } from '../../src/services/speech/groq-transcriber.js';

describe('Groq speech backends without an API key', () => {
  it('points the transcriber remediation at the speech config section', async () => {
    const transcriber = new GroqWhisperTranscriber({ apiKey: '  ' });

    expect(await transcriber.healthCheck()).toEqual({
      ok: false,
      reason: 'GROQ_API_KEY is not configured.',
      remediation:
        'Set GROQ_API_KEY (or speech.groqApiKey in voxloop.json) and restart, or select another transcription backend.',
    });
  });

  it('fails synthesizer preparation with the same remediation', async () => {
    const synthesizer = new GroqSpeechSynthesizer({ apiKey: '' });

    const error = await synthesizer.prepare().then(
      () => null,
      (reason: unknown) => reason,
    );

    expect(error).toBeInstanceOf(BackendOperationError);
    expect(error).toMatchObject({
      code: 'backend_not_configured',
      backendId: 'groq-speech',
      remediation:
        'Set GROQ_API_KEY (or speech.groqApiKey in voxloop.json) and restart, or select another synthesis backend.',
    });
  });

  it('rejects empty input before reaching the API', async () => {
    await expect(new GroqSpeechSynthesizer({ apiKey: 'test-secret' }).synthesize({ text: '   ' })).rejects.toMatchObject({
      code: 'text_required',
    });
    await expect(
      new GroqWhisperTranscriber({ apiKey: 'test-secret' }).transcribe({ audio: Buffer.alloc(0), filename: 'clip.wav' }),
    ).rejects.toMatchObject({ code: 'audio_required' });
  });
});
