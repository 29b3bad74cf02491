import { createClient } from 'redis';

export type Priority = 'high' | 'low';

export interface NewJob {
  id: string;
  audioPath: string;
  title: string;
  priority: Priority;
  createdAt: string;
}

export interface JobQueue {
  enqueue(job: NewJob): Promise<void>;
  get(jobId: string): Promise<Record<string, string> | null>;
}

type RedisClient = ReturnType<typeof createClient>;

export class RedisJobQueue implements JobQueue {
  constructor(private readonly redis: RedisClient) {}

  async enqueue(job: NewJob): Promise<void> {
    await this.redis.hSet(`job:${job.id}`, {
      id: job.id,
      audioPath: job.audioPath,
      title: job.title,
      status: 'queued',
      createdAt: job.createdAt,
      priority: job.priority,
    });

    await this.redis.lPush(job.priority === 'high' ? 'queue:high' : 'queue:low', job.id);
  }

  async get(jobId: string): Promise<Record<string, string> | null> {
    const fields = await this.redis.hGetAll(`job:${jobId}`);
    return Object.keys(fields).length > 0 ? fields : null;
  }
}
