import type { TranscriberConfig } from '../config.js';
import { PlanError } from '../errors.js';

export interface ChunkPlan {
  /** Longest duration any single chunk may cover. */
  chunkDurationMs: number;
  /** Bytes a chunk of `chunkDurationMs` is expected to take at the assumed bitrate. */
  bytesPerChunk: number;
}

export type PlannerInput = Pick<
  TranscriberConfig,
  'safetyBudgetBytes' | 'bitrateKbps' | 'safetyMargin' | 'minChunkDurationMs'
>;

export const bytesPerSecond = (bitrateKbps: number): number =>
  (bitrateKbps * 1000) / 8;

/**
 * Derives the per-chunk duration that keeps an export at `bitrateKbps`
 * within the safety budget, discounted by the safety margin.
 */
export const planChunks = (input: PlannerInput): ChunkPlan => {
  const bps = bytesPerSecond(input.bitrateKbps);
  if (!Number.isFinite(bps) || bps <= 0) {
    throw new PlanError(
      `Audio bytes per second is ${bps}; check the assumed bitrate (${input.bitrateKbps} kbps).`,
      { bitrateKbps: input.bitrateKbps }
    );
  }

  const maxSeconds = (input.safetyBudgetBytes / bps) * (1 - input.safetyMargin);
  const chunkDurationMs = Math.trunc(maxSeconds * 1000);

  if (!(chunkDurationMs > input.minChunkDurationMs)) {
    throw new PlanError(
      `Calculated chunk length (${chunkDurationMs}ms) is too small to split effectively.`,
      { chunkDurationMs, minChunkDurationMs: input.minChunkDurationMs }
    );
  }

  return {
    chunkDurationMs,
    bytesPerChunk: (chunkDurationMs / 1000) * bps,
  };
};
