import { v4 as uuidv4 } from "uuid";
import type { AudioChunk, ChunkingConfig } from "../src/types/live-session";
import { pcm16ToFloat32 } from "./audioEncoding";

export type ChunkHandoff = (chunk: AudioChunk) => void;

/**
 * Turns the capture device's small frames into fixed-duration chunks.
 *
 * Every chunk except a flushed final one holds exactly
 * `chunkDurationSeconds` of audio. Each chunk after the first starts with the
 * trailing `overlapSeconds` of the one before it, so a word cut at a chunk
 * boundary is heard whole at least once; the words in the overlap may then
 * appear twice in the transcript.
 * `push` runs on the capture path: it never awaits and never throws.
 */
export class ChunkAccumulator {
  private readonly config: ChunkingConfig;
  private readonly handoff: ChunkHandoff;
  private readonly targetSamples: number;
  private readonly overlapSamples: number;

  private frames: Float32Array[] = [];
  private bufferedSamples = 0;
  // Samples at the head of the buffer carried over from the previous chunk
  private carriedSamples = 0;
  private chunksEmitted = 0;

  constructor(config: Partial<ChunkingConfig>, handoff: ChunkHandoff) {
    this.config = {
      sampleRate: config.sampleRate ?? 16000,
      chunkDurationSeconds: config.chunkDurationSeconds ?? 10,
      overlapSeconds: config.overlapSeconds ?? 2
    };

    const { sampleRate, chunkDurationSeconds, overlapSeconds } = this.config;
    if (!(sampleRate > 0)) {
      throw new RangeError(`sampleRate must be positive, got ${sampleRate}`);
    }
    if (!(chunkDurationSeconds > 0)) {
      throw new RangeError(`chunkDurationSeconds must be positive, got ${chunkDurationSeconds}`);
    }
    if (!(overlapSeconds >= 0 && overlapSeconds < chunkDurationSeconds)) {
      throw new RangeError(
        `overlapSeconds must be in [0, ${chunkDurationSeconds}), got ${overlapSeconds}`
      );
    }

    this.handoff = handoff;
    this.targetSamples = Math.round(chunkDurationSeconds * sampleRate);
    this.overlapSamples = Math.round(overlapSeconds * sampleRate);

    if (this.targetSamples < 1 || this.overlapSamples >= this.targetSamples) {
      throw new RangeError(
        `A ${chunkDurationSeconds}s chunk with ${overlapSeconds}s overlap at ${sampleRate}Hz ` +
          `leaves no new samples per chunk`
      );
    }
  }

  public push(samples: Float32Array): void {
    if (samples.length === 0) return;

    // Capture drivers may reuse their frame buffers
    this.frames.push(samples.slice());
    this.bufferedSamples += samples.length;

    // One large frame can complete several chunks
    while (this.bufferedSamples >= this.targetSamples) {
      this.emitChunk(this.targetSamples, true);
    }
  }

  public pushPcm16(buffer: Buffer): void {
    this.push(pcm16ToFloat32(buffer));
  }

  /**
   * Hand off whatever new audio is buffered as a final, possibly short chunk.
   * Returns false when there was nothing new to flush.
   */
  public flush(): boolean {
    if (this.bufferedSamples <= this.carriedSamples) {
      this.reset();
      return false;
    }
    this.emitChunk(this.bufferedSamples, false);
    return true;
  }

  public get pendingSamples(): number {
    return this.bufferedSamples - this.carriedSamples;
  }

  public get emittedChunks(): number {
    return this.chunksEmitted;
  }

  private emitChunk(length: number, retainOverlap: boolean): void {
    const buffered = new Float32Array(this.bufferedSamples);
    let offset = 0;
    for (const frame of this.frames) {
      buffered.set(frame, offset);
      offset += frame.length;
    }
    const samples = buffered.slice(0, length);

    const chunk: AudioChunk = {
      id: uuidv4(),
      samples,
      sampleRate: this.config.sampleRate,
      capturedAt: Date.now(),
      duration: (samples.length / this.config.sampleRate) * 1000,
      overlapSamples: this.carriedSamples
    };

    if (retainOverlap) {
      // Overlap tail plus whatever arrived beyond this chunk
      const rest = buffered.slice(length - this.overlapSamples);
      this.frames = rest.length > 0 ? [rest] : [];
      this.bufferedSamples = rest.length;
      this.carriedSamples = this.overlapSamples;
    } else {
      this.reset();
    }

    this.chunksEmitted++;
    try {
      this.handoff(chunk);
    } catch (error) {
      console.error('[ChunkAccumulator] Chunk handoff failed, chunk dropped:', error);
    }
  }

  private reset(): void {
    this.frames = [];
    this.bufferedSamples = 0;
    this.carriedSamples = 0;
  }
}
