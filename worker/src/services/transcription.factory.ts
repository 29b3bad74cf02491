// In worker/src/services/transcription.factory.ts

import type { ITranscriptionService } from './transcription.service.js';
import { AssemblyAiService } from './assemblyai.service.js';
import { MockService } from './mock.service.js';
import { WhisperService } from './whisper.service.js';

/**
 * Instantiates and returns the correct transcription service
 * based on environment variables.
 */
export const getTranscriptionService = (
  env: NodeJS.ProcessEnv = process.env
): ITranscriptionService => {

  const provider = env.TRANSCRIPTION_PROVIDER;

  switch (provider) {
    case 'whisper':
      console.log('Using OpenAI Whisper for transcription.');
      return new WhisperService({
        apiKey: env.OPENAI_API_KEY,
        model: env.WHISPER_MODEL,
      });

    case 'assemblyai':
      console.log('Using AssemblyAI for transcription.');
      return new AssemblyAiService(env.ASSEMBLYAI_API_KEY);

    case 'mock':
      console.log('Using MOCK service for transcription.');
      return new MockService({ fail: env.MOCK_TRANSCRIPTION_FAIL === 'true' });

    default:
      console.warn(`No provider set, defaulting to MOCK service.`);
      return new MockService({ fail: env.MOCK_TRANSCRIPTION_FAIL === 'true' });
  }
};
