import 'dotenv/config';
import { createClient } from 'redis';

import { loadConfig } from './config.js';
import { processJob } from './jobs/job.processor.js';
import { RedisJobStore } from './jobs/job.store.js';
import { FfmpegAudioService, type IAudioService } from './services/audio.service.js';
import { ChunkOrchestrator } from './services/chunk-orchestrator.js';
import type { ITranscriptionService } from './services/transcription.service.js';
import { getTranscriptionService } from './services/transcription.factory.js';

const REDIS_URL = process.env.REDIS_URL;
if (!REDIS_URL) throw new Error('REDIS_URL is not set.');

const TRANSCRIPTS_DIR = process.env.TRANSCRIPTS_DIR || 'transcribed_texts';

const redisClient = createClient({ url: REDIS_URL });
redisClient.on('error', (err) => console.error('Redis Client Error:', err));

const startWorker = async () => {
  const config = loadConfig();
  await redisClient.connect();

  const store = new RedisJobStore(redisClient);
  const audioService: IAudioService = new FfmpegAudioService();
  const transcriptionService: ITranscriptionService = getTranscriptionService();
  const orchestrator = new ChunkOrchestrator(config, transcriptionService, audioService, {
    onTransition: (from, to) => console.debug(`[ChunkOrchestrator] ${from} -> ${to}`),
  });

  console.log('✅ Worker connected to Redis, waiting for jobs...');

  // One job at a time: the transcription provider is a shared,
  // rate-limited channel.
  while (true) {
    try {
      const jobId = await store.nextJob();
      if (!jobId) continue;

      console.log(`[Worker] Found job ${jobId}, starting processing...`);
      await processJob(jobId, {
        store,
        orchestrator,
        config,
        transcriptsDir: TRANSCRIPTS_DIR,
      });
    } catch (error) {
      console.error('Worker loop error (Redis connection?):', error);
      await new Promise((res) => setTimeout(res, 5000));
    }
  }
};

startWorker().catch((err) => {
  console.error('Worker crashed:', err);
  process.exit(1);
});
