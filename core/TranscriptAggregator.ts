import type { TranscriptSegment } from "../src/types/live-session"

const FULL_CONTEXT_THRESHOLD = 100
const RECENT_CONTEXT_SEGMENTS = 5

export type TranscriptUpdateCallback = (increment: string, fullTranscript: string) => void

/**
 * Owns the running transcript of a session: the full text, which only ever
 * grows, and a fixed-capacity window of the most recent segments.
 */
export class TranscriptAggregator {
  private fullTranscript = ""
  private recent: TranscriptSegment[] = []
  private readonly capacity: number
  private readonly onUpdate?: TranscriptUpdateCallback

  constructor(capacity: number = 20, onUpdate?: TranscriptUpdateCallback) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Recent window capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
    this.onUpdate = onUpdate
  }

  public append(text: string): void {
    if (!text.trim()) return

    this.recent.push({ text, producedAt: Date.now() })
    if (this.recent.length > this.capacity) {
      this.recent.shift()
    }

    this.fullTranscript += " " + text

    if (this.onUpdate) {
      try {
        this.onUpdate(text, this.fullTranscript)
      } catch (error) {
        console.error("[TranscriptAggregator] Transcript update callback failed:", error)
      }
    }
  }

  /**
   * Context handed to answer generation. Early in a session the full
   * transcript is too thin, so the last few segments are used instead.
   */
  public selectContext(): string {
    if (this.fullTranscript.length > FULL_CONTEXT_THRESHOLD) {
      return this.fullTranscript
    }
    return this.recent
      .slice(-RECENT_CONTEXT_SEGMENTS)
      .map(segment => segment.text)
      .join(" ")
  }

  public getFullTranscript(): string {
    return this.fullTranscript
  }

  public getRecentWindow(): TranscriptSegment[] {
    return this.recent.map(segment => ({ ...segment }))
  }

  public get length(): number {
    return this.fullTranscript.length
  }
}
