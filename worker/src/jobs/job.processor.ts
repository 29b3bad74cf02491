import path from 'path';

import type { TranscriberConfig } from '../config.js';
import { TranscriberError, errorMessage } from '../errors.js';
import { readAudioAsset } from '../services/asset.js';
import type { ChunkOrchestrator } from '../services/chunk-orchestrator.js';
import { saveTranscript } from '../services/transcript-store.js';
import type { JobStore } from './job.store.js';

export interface JobDependencies {
  store: JobStore;
  orchestrator: ChunkOrchestrator;
  config: TranscriberConfig;
  transcriptsDir: string;
}

/**
 * Runs one job to a terminal status. Failures are recorded on the job and
 * dead-lettered; nothing is retried and nothing is thrown for a failed
 * transcription.
 */
export const processJob = async (jobId: string, deps: JobDependencies): Promise<void> => {
  const { store, orchestrator, config, transcriptsDir } = deps;

  try {
    console.log(`[${jobId}] Adding to processing set.`);
    await store.markProcessing(jobId);

    const job = await store.getJob(jobId);
    if (!job) throw new Error(`No audioPath found for job ${jobId}`);

    await store.update(jobId, { status: 'processing:transcribing' });
    const asset = await readAudioAsset(job.audioPath, config.bitrateKbps);
    const outcome = await orchestrator.transcribe(asset);
    if (!outcome.ok) throw outcome.error;

    const title = job.title || path.parse(job.audioPath).name;
    const transcriptPath = await saveTranscript(transcriptsDir, title, outcome.text);

    await store.update(jobId, {
      status: 'completed',
      transcriptPath,
      finishedAt: new Date().toISOString(),
    });
    console.log(`[${jobId}] Job fully completed!`);
  } catch (err) {
    const message = errorMessage(err);
    console.error(`[${jobId}] Processing failed:`, message);

    await store.update(jobId, {
      status: 'failed',
      error: message,
      errorKind: err instanceof TranscriberError ? err.kind : 'internal',
      finishedAt: new Date().toISOString(),
    });
    await store.moveToDeadLetter(jobId);
  } finally {
    await store.clearProcessing(jobId);
    console.log(`[${jobId}] Removed from processing set.`);
  }
};
