import { promises as fs, type Stats } from 'fs';

import { LoadError, errorMessage } from '../errors.js';

export interface AudioAsset {
  readonly path: string;
  readonly sizeBytes: number;
  /** Constant bitrate assumed for every duration calculation on this asset. */
  readonly bitrateKbps: number;
}

export const readAudioAsset = async (
  audioPath: string,
  bitrateKbps: number
): Promise<AudioAsset> => {
  let stats: Stats;
  try {
    stats = await fs.stat(audioPath);
  } catch (err) {
    throw new LoadError(
      `Audio file not found at ${audioPath}: ${errorMessage(err)}`,
      { audioPath },
      { cause: err }
    );
  }

  if (!stats.isFile()) {
    throw new LoadError(`Audio path ${audioPath} is not a regular file`, { audioPath });
  }

  return Object.freeze({ path: audioPath, sizeBytes: stats.size, bitrateKbps });
};
