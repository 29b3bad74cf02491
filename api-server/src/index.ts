// api-server/src/index.ts

import 'dotenv/config';
import { createClient } from 'redis';

import { createApp } from './app.js';
import { RedisJobQueue } from './job.queue.js';

const redisUrl = process.env.REDIS_URL;
if (!redisUrl) {
  throw new Error('REDIS_URL environment variable is not set.');
}

const port = Number(process.env.PORT) || 3000;

const redisClient = createClient({ url: redisUrl });
redisClient.on('error', (err) => console.error('Redis Client Error:', err));

const startServer = async () => {
  await redisClient.connect();
  const app = createApp(new RedisJobQueue(redisClient), {
    corsOrigin: process.env.CORS_ORIGIN,
  });
  app.listen(port, () => {
    console.log(`API Server is listening on port ${port}`);
  });
};

startServer().catch((err) => {
  console.error('API server failed to start:', err);
  process.exit(1);
});
