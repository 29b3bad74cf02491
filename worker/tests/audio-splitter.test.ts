import { promises as fs } from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach } from 'vitest';

import { ExportError, LoadError, SizeViolationError } from '../src/errors.js';
import type { AudioAsset } from '../src/services/asset.js';
import {
  AudioSplitter,
  partitionDuration,
  type Chunk,
} from '../src/services/audio-splitter.js';
import { planChunks } from '../src/services/chunk-planner.js';
import { FakeAudioService, MIB, makeTempDir, testConfig } from './helpers/fakes.js';

const collect = async (chunks: AsyncIterable<Chunk>) => {
  const out: Chunk[] = [];
  for await (const chunk of chunks) out.push(chunk);
  return out;
};

describe('partitionDuration', () => {
  it('keeps a shorter final interval', () => {
    expect(partitionDuration(2500, 1000)).toEqual([
      { startMs: 0, durationMs: 1000 },
      { startMs: 1000, durationMs: 1000 },
      { startMs: 2000, durationMs: 500 },
    ]);
  });

  it('covers an exact multiple without an empty tail', () => {
    expect(partitionDuration(2000, 1000)).toEqual([
      { startMs: 0, durationMs: 1000 },
      { startMs: 1000, durationMs: 1000 },
    ]);
  });
});

describe('AudioSplitter', () => {
  let scratchRoot: string;
  const asset: AudioAsset = {
    path: '/media/My Talk?.mp3',
    sizeBytes: 30 * MIB,
    bitrateKbps: 192,
  };

  beforeEach(async () => {
    scratchRoot = await makeTempDir('splitter');
  });

  it('creates a per-run scratch directory named after the asset', async () => {
    const splitter = new AudioSplitter(testConfig(scratchRoot), new FakeAudioService(1000));

    const first = await splitter.createScratchDir(asset);
    const second = await splitter.createScratchDir(asset);

    expect(path.dirname(first)).toBe(scratchRoot);
    expect(path.basename(first)).toMatch(/^My Talk_chunks_[0-9a-f]{8}$/);
    expect(first).not.toBe(second);
  });

  it('exports ordered chunks at the configured bitrate', async () => {
    const config = testConfig(scratchRoot);
    const audio = new FakeAudioService(2_500_000);
    const splitter = new AudioSplitter(config, audio);
    const dir = await splitter.createScratchDir(asset);

    const intervals = await splitter.prepare(asset, planChunks(config));
    const chunks = await collect(splitter.split(asset, intervals, dir));

    expect(chunks.map((c) => path.basename(c.path))).toEqual([
      'chunk_My Talk_0.mp3',
      'chunk_My Talk_1.mp3',
      'chunk_My Talk_2.mp3',
    ]);
    expect(chunks.map((c) => [c.index, c.startMs, c.durationMs])).toEqual([
      [0, 0, 996147],
      [1, 996147, 996147],
      [2, 1992294, 507706],
    ]);
    expect(audio.exports.every((e) => e.segment.bitrateKbps === 192)).toBe(true);
    for (const chunk of chunks) {
      expect((await fs.stat(chunk.path)).size).toBeLessThan(config.hardLimitBytes);
    }
  });

  it('partitions the probed duration without exporting anything', async () => {
    const config = testConfig(scratchRoot);
    const audio = new FakeAudioService(2_500_000);
    const splitter = new AudioSplitter(config, audio);

    const intervals = await splitter.prepare(asset, planChunks(config));

    expect(intervals).toEqual([
      { startMs: 0, durationMs: 996147 },
      { startMs: 996147, durationMs: 996147 },
      { startMs: 1992294, durationMs: 507706 },
    ]);
    expect(audio.exports).toHaveLength(0);
  });

  it('only exports a chunk once the previous one is consumed', async () => {
    const config = testConfig(scratchRoot);
    const audio = new FakeAudioService(2_500_000);
    const splitter = new AudioSplitter(config, audio);
    const dir = await splitter.createScratchDir(asset);

    const intervals = await splitter.prepare(asset, planChunks(config));
    const iterator = splitter.split(asset, intervals, dir);
    await iterator.next();

    expect(audio.exports).toHaveLength(1);
    await iterator.return(undefined);
    expect(audio.exports).toHaveLength(1);
  });

  it('fails with LoadError when the source cannot be decoded', async () => {
    const config = testConfig(scratchRoot);
    const splitter = new AudioSplitter(
      config,
      new FakeAudioService(0, { probeError: new Error('invalid data found') })
    );

    await expect(splitter.prepare(asset, planChunks(config))).rejects.toThrow(LoadError);
  });

  it('fails with LoadError when the source has no duration', async () => {
    const config = testConfig(scratchRoot);
    const splitter = new AudioSplitter(config, new FakeAudioService(0));

    await expect(splitter.prepare(asset, planChunks(config))).rejects.toThrow(
      'has no playable duration'
    );
  });

  it('fails with ExportError when a chunk cannot be written', async () => {
    const config = testConfig(scratchRoot);
    const splitter = new AudioSplitter(
      config,
      new FakeAudioService(2_500_000, { failExportAt: 1 })
    );
    const dir = await splitter.createScratchDir(asset);
    const seen: number[] = [];

    const run = async () => {
      const intervals = await splitter.prepare(asset, planChunks(config));
      for await (const chunk of splitter.split(asset, intervals, dir)) {
        seen.push(chunk.index);
      }
    };

    await expect(run()).rejects.toThrow(ExportError);
    expect(seen).toEqual([0]);
  });

  it('aborts with SizeViolationError and removes an oversized chunk', async () => {
    const config = testConfig(scratchRoot);
    const audio = new FakeAudioService(2_500_000, { sizeFactor: 1.2 });
    const splitter = new AudioSplitter(config, audio);
    const dir = await splitter.createScratchDir(asset);

    const intervals = await splitter.prepare(asset, planChunks(config));

    await expect(collect(splitter.split(asset, intervals, dir))).rejects.toThrow(
      SizeViolationError
    );
    expect(audio.exports).toHaveLength(1);
    expect(await fs.readdir(dir)).toEqual([]);
  });
});
