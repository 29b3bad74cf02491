import { createClient } from 'redis';

export type JobStatus =
  | 'queued'
  | 'processing:transcribing'
  | 'completed'
  | 'failed';

export interface TranscriptionJob {
  id: string;
  audioPath: string;
  title?: string;
  status?: string;
  priority?: string;
  createdAt?: string;
  transcriptPath?: string;
  error?: string;
  errorKind?: string;
  finishedAt?: string;
}

export type JobFields = Partial<{
  status: JobStatus;
  transcriptPath: string;
  error: string;
  errorKind: string;
  finishedAt: string;
}>;

export interface JobStore {
  /** Blocks until a job id is available. High priority is served first. */
  nextJob(): Promise<string | null>;
  getJob(jobId: string): Promise<TranscriptionJob | null>;
  update(jobId: string, fields: JobFields): Promise<void>;
  markProcessing(jobId: string): Promise<void>;
  clearProcessing(jobId: string): Promise<void>;
  moveToDeadLetter(jobId: string): Promise<void>;
}

export const QUEUE_HIGH = 'queue:high';
export const QUEUE_LOW = 'queue:low';
export const QUEUE_DLQ = 'queue:dlq';
export const PROCESSING_SET = 'jobs:processing';

export const jobKey = (jobId: string) => `job:${jobId}`;

/** Reads a `job:<id>` hash; `null` when it holds no audio path. */
export const toTranscriptionJob = (
  jobId: string,
  fields: Record<string, string>
): TranscriptionJob | null => {
  if (!fields.audioPath) return null;
  return {
    id: jobId,
    audioPath: fields.audioPath,
    title: fields.title,
    status: fields.status,
    priority: fields.priority,
    createdAt: fields.createdAt,
    transcriptPath: fields.transcriptPath,
    error: fields.error,
    errorKind: fields.errorKind,
    finishedAt: fields.finishedAt,
  };
};

export type RedisClient = ReturnType<typeof createClient>;

export class RedisJobStore implements JobStore {
  constructor(private readonly redis: RedisClient) {}

  async nextJob(): Promise<string | null> {
    const result = await this.redis.brPop([QUEUE_HIGH, QUEUE_LOW], 0);
    return result ? result.element : null;
  }

  async getJob(jobId: string): Promise<TranscriptionJob | null> {
    return toTranscriptionJob(jobId, await this.redis.hGetAll(jobKey(jobId)));
  }

  async update(jobId: string, fields: JobFields): Promise<void> {
    const entries = Object.entries(fields).filter(
      (entry): entry is [string, string] => entry[1] !== undefined
    );
    if (entries.length === 0) return;
    await this.redis.hSet(jobKey(jobId), Object.fromEntries(entries));
  }

  async markProcessing(jobId: string): Promise<void> {
    await this.redis.sAdd(PROCESSING_SET, jobId);
  }

  async clearProcessing(jobId: string): Promise<void> {
    await this.redis.sRem(PROCESSING_SET, jobId);
  }

  async moveToDeadLetter(jobId: string): Promise<void> {
    await this.redis.rPush(QUEUE_DLQ, jobId);
  }
}
