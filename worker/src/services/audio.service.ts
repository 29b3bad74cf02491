// In worker/src/services/audio.service.ts
import { execFile } from 'child_process';

export interface SegmentSpec {
  startMs: number;
  durationMs: number;
  bitrateKbps: number;
}

// The "contract" for any audio processor
export interface IAudioService {
  /** Total duration of the audio at `audioPath`, in milliseconds. */
  probeDuration(audioPath: string): Promise<number>;
  /** Writes `segment` of `sourcePath` to `targetPath` as CBR MP3. */
  exportSegment(sourcePath: string, targetPath: string, segment: SegmentSpec): Promise<void>;
}

const toSeconds = (ms: number) => (ms / 1000).toFixed(3);

// The specific implementation using FFmpeg
export class FfmpegAudioService implements IAudioService {
  constructor(
    private readonly ffmpegPath = 'ffmpeg',
    private readonly ffprobePath = 'ffprobe'
  ) {}

  private runCommand(file: string, args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      execFile(file, args, { maxBuffer: 16 * 1024 * 1024 }, (error, stdout, stderr) => {
        if (error) {
          console.error(`[FfmpegAudioService] ${file} error: ${stderr}`);
          return reject(error);
        }
        resolve(stdout);
      });
    });
  }

  async probeDuration(audioPath: string): Promise<number> {
    const output = await this.runCommand(this.ffprobePath, [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      audioPath,
    ]);
    const seconds = parseFloat(output.trim());
    if (!Number.isFinite(seconds)) {
      throw new Error(`ffprobe reported no duration for ${audioPath}`);
    }
    return Math.round(seconds * 1000);
  }

  async exportSegment(
    sourcePath: string,
    targetPath: string,
    segment: SegmentSpec
  ): Promise<void> {
    const args = [
      '-y',
      '-i', sourcePath,
      '-ss', toSeconds(segment.startMs),
      '-t', toSeconds(segment.durationMs),
      '-vn',
      '-acodec', 'libmp3lame',
      '-b:a', `${segment.bitrateKbps}k`,
      targetPath,
    ];
    console.log(`[FfmpegAudioService] Running: ffmpeg ${args.join(' ')}`);
    await this.runCommand(this.ffmpegPath, args);
  }
}
