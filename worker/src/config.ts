import os from 'os';
import path from 'path';
import { z } from 'zod';

import { ConfigError } from './errors.js';

const MIB = 1024 * 1024;

/**
 * Size limits and encoding assumptions shared by the planner, the splitter
 * and the orchestrator. The same `bitrateKbps` drives both the chunk-duration
 * arithmetic and the chunk export.
 */
export const transcriberConfigSchema = z
  .object({
    hardLimitBytes: z.coerce.number().int().positive(),
    safetyBudgetBytes: z.coerce.number().int().positive(),
    bitrateKbps: z.coerce.number(),
    safetyMargin: z.coerce.number().min(0).lt(1),
    minChunkDurationMs: z.coerce.number().int().positive(),
    scratchRoot: z.string().min(1),
  })
  .refine((c) => c.safetyBudgetBytes < c.hardLimitBytes, {
    message: 'safetyBudgetBytes must be strictly less than hardLimitBytes',
    path: ['safetyBudgetBytes'],
  });

export type TranscriberConfig = z.infer<typeof transcriberConfigSchema>;

export const DEFAULT_CONFIG: TranscriberConfig = {
  hardLimitBytes: 25 * MIB,
  safetyBudgetBytes: 24 * MIB,
  bitrateKbps: 192,
  safetyMargin: 0.05,
  minChunkDurationMs: 1000,
  scratchRoot: path.join(os.tmpdir(), 'chunked-transcriber'),
};

/**
 * Builds the config from environment variables, falling back to the
 * defaults for anything unset.
 */
export const loadConfig = (
  env: NodeJS.ProcessEnv = process.env
): TranscriberConfig => {
  const parsed = transcriberConfigSchema.safeParse({
    hardLimitBytes: env.TRANSCRIBE_HARD_LIMIT_BYTES ?? DEFAULT_CONFIG.hardLimitBytes,
    safetyBudgetBytes:
      env.TRANSCRIBE_SAFETY_BUDGET_BYTES ?? DEFAULT_CONFIG.safetyBudgetBytes,
    bitrateKbps: env.AUDIO_BITRATE_KBPS ?? DEFAULT_CONFIG.bitrateKbps,
    safetyMargin: env.CHUNK_SAFETY_MARGIN ?? DEFAULT_CONFIG.safetyMargin,
    minChunkDurationMs:
      env.MIN_CHUNK_DURATION_MS ?? DEFAULT_CONFIG.minChunkDurationMs,
    scratchRoot: env.TRANSCRIBE_SCRATCH_DIR || DEFAULT_CONFIG.scratchRoot,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'config';
    throw new ConfigError(`Invalid transcriber config (${field}): ${issue?.message}`, {
      field,
    });
  }

  return parsed.data;
};
