import { promises as fs } from 'fs';

import type { TranscriberConfig } from '../config.js';
import {
  LoadError,
  PlanError,
  TranscriberError,
  TranscriptionError,
  errorMessage,
} from '../errors.js';
import type { AudioAsset } from './asset.js';
import { AudioSplitter, type Chunk } from './audio-splitter.js';
import type { IAudioService } from './audio.service.js';
import { planChunks } from './chunk-planner.js';
import { decideRoute } from './size-threshold.js';
import type { ITranscriptionService } from './transcription.service.js';

export type OrchestratorState =
  | 'deciding'
  | 'direct'
  | 'splitting'
  | 'transcribing'
  | 'aggregating'
  | 'done_ok'
  | 'done_fail';

export type TranscriptionOutcome =
  | { ok: true; text: string }
  | { ok: false; error: TranscriberError };

export interface ChunkOrchestratorOptions {
  onTransition?: (from: OrchestratorState, to: OrchestratorState) => void;
}

export type Collecting = { status: 'collecting'; parts: string[] };
export type Failed = { status: 'failed'; error: TranscriberError };
export type Accumulator = Collecting | Failed;

/**
 * Folds `step` over `items` in order and stops at the first `failed`
 * accumulator, which is final. Leaving the loop early closes the source
 * iterator, so no further items are produced.
 */
export const foldUntilFailed = async <T>(
  items: AsyncIterable<T>,
  step: (acc: Collecting, item: T) => Promise<Accumulator>
): Promise<Accumulator> => {
  let acc: Accumulator = { status: 'collecting', parts: [] };
  for await (const item of items) {
    acc = await step(acc, item);
    if (acc.status === 'failed') break;
  }
  return acc;
};

type Transition = (to: OrchestratorState) => void;

const removeQuietly = async (target: string, what: string) => {
  try {
    await fs.rm(target, { recursive: true, force: true });
  } catch (err) {
    console.warn(`[ChunkOrchestrator] Could not delete ${what} ${target}: ${errorMessage(err)}`);
  }
};

export class ChunkOrchestrator {
  private readonly splitter: AudioSplitter;

  constructor(
    private readonly config: TranscriberConfig,
    private readonly transcriptionService: ITranscriptionService,
    audioService: IAudioService,
    private readonly options: ChunkOrchestratorOptions = {}
  ) {
    this.splitter = new AudioSplitter(config, audioService);
  }

  /**
   * Transcribes `asset`, splitting it first when it is too close to the
   * service's size limit. Resolves to the joined transcript or to the error
   * that aborted the run; temporary chunk files never outlive the call.
   */
  async transcribe(asset: AudioAsset): Promise<TranscriptionOutcome> {
    const transition = this.startRun();
    const route = decideRoute(asset.sizeBytes, this.config.hardLimitBytes);
    const sizeMb = (asset.sizeBytes / (1024 * 1024)).toFixed(2);

    if (route === 'direct') {
      console.log(`[ChunkOrchestrator] ${asset.path} (${sizeMb} MB) is within size limit. Transcribing directly.`);
      transition('direct');
      try {
        const text = await this.transcriptionService.transcribe(asset.path);
        transition('done_ok');
        return { ok: true, text };
      } catch (err) {
        return this.fail(
          transition,
          new TranscriptionError(
            `Transcription failed for ${asset.path}: ${errorMessage(err)}`,
            { audioPath: asset.path },
            { cause: err }
          )
        );
      }
    }

    console.log(`[ChunkOrchestrator] ${asset.path} (${sizeMb} MB) exceeds threshold. Attempting to split.`);
    transition('splitting');
    return this.splitAndTranscribe(asset, transition);
  }

  private async splitAndTranscribe(
    asset: AudioAsset,
    transition: Transition
  ): Promise<TranscriptionOutcome> {
    let scratchDir: string | undefined;
    try {
      if (asset.bitrateKbps !== this.config.bitrateKbps) {
        throw new PlanError(
          `Asset bitrate ${asset.bitrateKbps} kbps differs from the configured ${this.config.bitrateKbps} kbps`,
          { audioPath: asset.path }
        );
      }
      const plan = planChunks(this.config);
      const intervals = await this.splitter.prepare(asset, plan);
      scratchDir = await this.splitter.createScratchDir(asset);
      const chunks = this.splitter.split(asset, intervals, scratchDir);

      // Still splitting until the first chunk has been exported and checked.
      const result = await foldUntilFailed(chunks, (acc, chunk) => {
        if (chunk.index === 0) transition('transcribing');
        return this.transcribeChunk(acc, chunk);
      });

      if (result.status === 'failed') {
        return this.fail(transition, result.error);
      }
      if (result.parts.length === 0) {
        throw new LoadError(`No audio chunks were produced for ${asset.path}`, {
          audioPath: asset.path,
        });
      }

      transition('aggregating');
      const text = result.parts.join(' ');
      transition('done_ok');
      return { ok: true, text };
    } catch (err) {
      if (err instanceof TranscriberError) {
        return this.fail(transition, err);
      }
      transition('done_fail');
      throw err;
    } finally {
      if (scratchDir) {
        await removeQuietly(scratchDir, 'chunk folder');
        console.log(`[ChunkOrchestrator] Cleaned up chunk folder: ${scratchDir}`);
      }
    }
  }

  private async transcribeChunk(
    acc: Collecting,
    chunk: Chunk
  ): Promise<Accumulator> {
    try {
      const text = await this.transcriptionService.transcribe(chunk.path);
      return { status: 'collecting', parts: [...acc.parts, text] };
    } catch (err) {
      console.error(`[ChunkOrchestrator] Failed to transcribe chunk ${chunk.index + 1}. Aborting.`);
      return {
        status: 'failed',
        error: new TranscriptionError(
          `Transcription failed for chunk ${chunk.index} (${chunk.path}): ${errorMessage(err)}`,
          { chunkIndex: chunk.index, chunkPath: chunk.path },
          { cause: err }
        ),
      };
    } finally {
      await removeQuietly(chunk.path, 'audio chunk file');
    }
  }

  private fail(transition: Transition, error: TranscriberError): TranscriptionOutcome {
    console.error(`[ChunkOrchestrator] Transcription aborted (${error.kind}): ${error.message}`);
    transition('done_fail');
    return { ok: false, error };
  }

  private startRun(): Transition {
    let state: OrchestratorState = 'deciding';
    return (to) => {
      const from = state;
      state = to;
      this.options.onTransition?.(from, to);
    };
  }
}
