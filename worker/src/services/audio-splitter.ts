import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';

import type { TranscriberConfig } from '../config.js';
import {
  ExportError,
  LoadError,
  SizeViolationError,
  errorMessage,
} from '../errors.js';
import type { AudioAsset } from './asset.js';
import type { IAudioService } from './audio.service.js';
import type { ChunkPlan } from './chunk-planner.js';
import { sanitizeFilename } from './transcript-store.js';

export interface Chunk {
  index: number;
  path: string;
  startMs: number;
  durationMs: number;
}

export interface ChunkInterval {
  startMs: number;
  durationMs: number;
}

/**
 * Consecutive, non-overlapping intervals of `chunkDurationMs` covering
 * `[0, totalMs)`. The last interval keeps whatever remains.
 */
export const partitionDuration = (
  totalMs: number,
  chunkDurationMs: number
): ChunkInterval[] => {
  const intervals: ChunkInterval[] = [];
  for (let startMs = 0; startMs < totalMs; startMs += chunkDurationMs) {
    intervals.push({
      startMs,
      durationMs: Math.min(chunkDurationMs, totalMs - startMs),
    });
  }
  return intervals;
};

export const assetBaseName = (asset: AudioAsset): string =>
  sanitizeFilename(path.parse(asset.path).name);

export const chunkFileName = (baseName: string, index: number): string =>
  `chunk_${baseName}_${index}.mp3`;

type SplitterConfig = Pick<TranscriberConfig, 'hardLimitBytes' | 'bitrateKbps' | 'scratchRoot'>;

export class AudioSplitter {
  constructor(
    private readonly config: SplitterConfig,
    private readonly audioService: IAudioService
  ) {}

  /**
   * Creates the per-run scratch directory for `asset`. The caller owns it
   * and must remove it.
   */
  async createScratchDir(asset: AudioAsset): Promise<string> {
    const dir = path.join(
      this.config.scratchRoot,
      `${assetBaseName(asset)}_chunks_${randomUUID().slice(0, 8)}`
    );
    await fs.mkdir(dir, { recursive: true });
    return dir;
  }

  /**
   * Probes the source and partitions it into chunk intervals. Runs before
   * any chunk is exported, so a source that cannot be decoded fails here.
   */
  async prepare(asset: AudioAsset, plan: ChunkPlan): Promise<ChunkInterval[]> {
    let totalMs: number;
    try {
      totalMs = await this.audioService.probeDuration(asset.path);
    } catch (err) {
      throw new LoadError(
        `Could not load audio file ${asset.path}: ${errorMessage(err)}`,
        { audioPath: asset.path },
        { cause: err }
      );
    }
    if (!(totalMs > 0)) {
      throw new LoadError(`Audio file ${asset.path} has no playable duration`, {
        audioPath: asset.path,
        totalMs,
      });
    }

    const intervals = partitionDuration(totalMs, plan.chunkDurationMs);
    console.log(
      `[AudioSplitter] Targeting ${intervals.length} chunk(s) of up to ${(plan.chunkDurationMs / 1000).toFixed(2)}s for ${asset.path}`
    );
    return intervals;
  }

  /**
   * Lazily exports `intervals` of the asset as chunk files. A chunk is only
   * written once the previous one has been consumed.
   */
  async *split(
    asset: AudioAsset,
    intervals: readonly ChunkInterval[],
    scratchDir: string
  ): AsyncGenerator<Chunk> {
    const baseName = assetBaseName(asset);

    for (const [index, interval] of intervals.entries()) {
      const chunkPath = path.join(scratchDir, chunkFileName(baseName, index));
      console.log(`[AudioSplitter] Exporting chunk ${index + 1}/${intervals.length}: ${chunkPath}`);

      try {
        await this.audioService.exportSegment(asset.path, chunkPath, {
          ...interval,
          bitrateKbps: this.config.bitrateKbps,
        });
      } catch (err) {
        throw new ExportError(
          `Error exporting audio chunk ${chunkPath}: ${errorMessage(err)}`,
          { chunkPath, index },
          { cause: err }
        );
      }

      let size: number;
      try {
        ({ size } = await fs.stat(chunkPath));
      } catch (err) {
        throw new ExportError(
          `Exported chunk ${chunkPath} is missing: ${errorMessage(err)}`,
          { chunkPath, index },
          { cause: err }
        );
      }
      if (size >= this.config.hardLimitBytes) {
        await fs.rm(chunkPath, { force: true });
        throw new SizeViolationError(
          `Exported chunk ${chunkPath} is ${size} bytes, at or over the ${this.config.hardLimitBytes} byte limit`,
          { chunkPath, index, size }
        );
      }

      yield { index, path: chunkPath, ...interval };
    }
  }
}
