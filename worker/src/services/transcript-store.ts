import { promises as fs } from 'fs';
import path from 'path';

/**
 * Makes a title safe to use as a file name on every common filesystem.
 */
export const sanitizeFilename = (name: string | null | undefined): string => {
  const sanitized = (name ?? 'untitled')
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^[_ ]+|[_ ]+$/g, '');
  return sanitized || 'untitled_video';
};

/**
 * Writes `text` to `<dir>/<sanitized title>.txt` and returns the path.
 */
export const saveTranscript = async (
  dir: string,
  title: string,
  text: string
): Promise<string> => {
  await fs.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, `${sanitizeFilename(title)}.txt`);
  await fs.writeFile(filePath, text, 'utf-8');
  console.log(`[TranscriptStore] Transcription saved to: ${filePath}`);
  return filePath;
};
