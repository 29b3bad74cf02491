import { AssemblyAI } from 'assemblyai';

import type { ITranscriptionService } from './transcription.service.js';

const delay = (ms: number) => new Promise(res => setTimeout(res, ms));

export class AssemblyAiService implements ITranscriptionService {
  private assemblyClient: AssemblyAI;
  private pollIntervalMs: number;

  constructor(apiKey = process.env.ASSEMBLYAI_API_KEY, pollIntervalMs = 3000) {
    if (!apiKey) {
      throw new Error('ASSEMBLYAI_API_KEY is not set.');
    }

    this.assemblyClient = new AssemblyAI({ apiKey });
    this.pollIntervalMs = pollIntervalMs;
  }

  async transcribe(audioPath: string): Promise<string> {
    console.log(`[AssemblyAiService] Starting transcription for ${audioPath}`);

    // Local paths are uploaded by the SDK before the job is created.
    let transcript = await this.assemblyClient.transcripts.submit({
      audio: audioPath,
    });

    while (transcript.status !== 'completed' && transcript.status !== 'error') {
      await delay(this.pollIntervalMs);
      transcript = await this.assemblyClient.transcripts.get(transcript.id);
      console.log(`[AssemblyAiService] Job ${transcript.id} status: ${transcript.status}`);
    }

    if (transcript.status === 'error') {
      throw new Error(`AssemblyAI transcription failed: ${transcript.error}`);
    }

    if (!transcript.text) {
      console.warn('[AssemblyAiService] No speech in transcript, returning empty text.');
      return '';
    }

    return transcript.text;
  }
}
