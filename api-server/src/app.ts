// api-server/src/app.ts

import express from 'express';
import cors from 'cors';
import { randomUUID } from 'crypto';
import path from 'path';

import type { JobQueue } from './job.queue.js';

export interface AppOptions {
  corsOrigin?: string;
}

export const createApp = (queue: JobQueue, options: AppOptions = {}) => {
  const app = express();
  app.use(
    cors({
      origin: options.corsOrigin ?? 'http://localhost:5173',
      optionsSuccessStatus: 200,
    })
  );
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.post('/jobs', async (req, res) => {
    const { audioPath, title, priority } = req.body ?? {};

    if (typeof audioPath !== 'string' || audioPath.trim() === '') {
      return res
        .status(400)
        .send({ message: 'Missing audioPath in request body.' });
    }

    const jobId = randomUUID();

    try {
      await queue.enqueue({
        id: jobId,
        audioPath,
        title: typeof title === 'string' && title.trim() ? title : path.parse(audioPath).name,
        priority: priority === 'high' ? 'high' : 'low',
        createdAt: new Date().toISOString(),
      });

      console.log(`Job ${jobId} created for ${audioPath}`);
      res.status(201).json({
        message: 'Job created successfully',
        jobId,
      });
    } catch (error) {
      console.error('Failed to create job:', error);
      res.status(500).send({ message: 'Server error while creating job.' });
    }
  });

  app.get('/jobs/:id', async (req, res) => {
    try {
      const job = await queue.get(req.params.id);
      if (!job) {
        return res.status(404).send({ message: `Job ${req.params.id} not found.` });
      }
      res.status(200).json(job);
    } catch (error) {
      console.error('Failed to read job:', error);
      res.status(500).send({ message: 'Server error while reading job.' });
    }
  });

  return app;
};
