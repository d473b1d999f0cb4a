import type { AudioChunk, ChunkTranscriber, SpeechToTextClient } from "../src/types/live-session";
import { encodeWav, float32ToPcm16 } from "./audioEncoding";

/**
 * Per-chunk transcription boundary. Keeps no state between calls, so chunks
 * may be transcribed concurrently. A failed request yields an empty string.
 */
export class TranscriptionAdapter implements ChunkTranscriber {
  constructor(private readonly client: SpeechToTextClient) {}

  public async transcribe(chunk: AudioChunk): Promise<string> {
    try {
      const wav = encodeWav(float32ToPcm16(chunk.samples), chunk.sampleRate);
      const text = await this.client.transcribe(wav, chunk.sampleRate);
      return text.trim();
    } catch (error) {
      console.error('[TranscriptionAdapter] Transcription failed for chunk', chunk.id, error);
      return "";
    }
  }
}
