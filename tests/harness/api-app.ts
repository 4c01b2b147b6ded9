import type { Express } from 'express';
import { createApiApp } from '../../src/api/router.js';
import { OrchestrationQueue, type RequestRunner } from '../../src/core/orchestration-queue.js';
import { SpeechPipeline } from '../../src/core/speech-pipeline.js';
import { BackendRegistry } from '../../src/services/backend-registry.js';
import { RequestHistoryStore } from '../../src/services/request-history.js';
import { signPayload } from '../../src/api/shared.js';
import type { SynthesisProvider, TranscriptionProvider } from '../../src/types/backends.js';
import { FakeSynthesizer, FakeTranscriber, instantRunner } from './fakes.js';

export const TEST_SECRET = 'test-secret';

export interface ApiHarness {
  app: Express;
  queue: OrchestrationQueue;
  transcription: BackendRegistry<TranscriptionProvider>;
  synthesis: BackendRegistry<SynthesisProvider>;
  history: RequestHistoryStore | null;
}

export interface ApiHarnessOptions {
  runner?: RequestRunner;
  transcribers?: FakeTranscriber[];
  synthesizers?: FakeSynthesizer[];
  withHistory?: boolean;
  apiSecret?: string;
}

/** Express app wired to real queue, registries and pipeline over fake providers. */
export async function createApiHarness(options: ApiHarnessOptions = {}): Promise<ApiHarness> {
  const queue = new OrchestrationQueue(options.runner ?? instantRunner());
  const transcription = new BackendRegistry<TranscriptionProvider>('transcription');
  const synthesis = new BackendRegistry<SynthesisProvider>('synthesis');
  for (const provider of options.transcribers ?? [new FakeTranscriber('fake-stt')]) {
    transcription.register(provider);
  }
  for (const provider of options.synthesizers ?? [new FakeSynthesizer('fake-tts')]) {
    synthesis.register(provider);
  }
  await Promise.all([transcription.initializeAll(), synthesis.initializeAll()]);

  const history = options.withHistory ? new RequestHistoryStore(':memory:') : null;
  history?.attach(queue);

  const app = createApiApp({
    apiSecret: options.apiSecret ?? TEST_SECRET,
    queue,
    history,
    registries: { transcription, synthesis },
    pipeline: new SpeechPipeline({ transcription, synthesis, queue }),
  });
  return { app, queue, transcription, synthesis, history };
}

/** `X-Signature` header value for a JSON body. */
export function signatureFor(body: unknown, secret = TEST_SECRET): string {
  return `sha256=${signPayload(JSON.stringify(body), secret)}`;
}
