export interface ITranscriptionService {
  /**
   * @param audioPath Local path of the audio file or chunk to transcribe.
   * @returns The transcript text. Rejects when the provider fails.
   */
  transcribe(audioPath: string): Promise<string>;
}
