import { createReadStream, promises as fs } from 'fs';
import path from 'path';
import OpenAI from 'openai';

import type { ITranscriptionService } from './transcription.service.js';

export interface WhisperServiceOptions {
  apiKey?: string;
  model?: string;
}

export class WhisperService implements ITranscriptionService {
  private openai: OpenAI;
  private model: string;

  constructor(options: WhisperServiceOptions = {}) {
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is not set.');
    }

    this.openai = new OpenAI({ apiKey });
    this.model = options.model ?? process.env.WHISPER_MODEL ?? 'whisper-1';
  }

  async transcribe(audioPath: string): Promise<string> {
    const { size } = await fs.stat(audioPath);
    console.log(
      `[WhisperService] Sending ${path.basename(audioPath)} (${(size / (1024 * 1024)).toFixed(2)} MB) to ${this.model}`
    );

    const transcription = await this.openai.audio.transcriptions.create({
      file: createReadStream(audioPath),
      model: this.model,
    });

    return transcription.text;
  }
}
