// In worker/src/services/mock.service.ts
import path from 'path';

import type { ITranscriptionService } from './transcription.service.js';

export interface MockServiceOptions {
  /** Simulate a provider outage on every call. */
  fail?: boolean;
}

export class MockService implements ITranscriptionService {
  constructor(private readonly options: MockServiceOptions = {}) {}

  async transcribe(audioPath: string): Promise<string> {
    if (this.options.fail) {
      console.log(`[MockService] SIMULATING FAILURE for ${audioPath}`);
      throw new Error('MockService: AI transcription service is down!');
    }

    console.log(`[MockService] Transcribing ${audioPath}.`);
    return `Mock transcript of ${path.basename(audioPath)}.`;
  }
}
