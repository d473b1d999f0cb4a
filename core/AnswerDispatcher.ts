import { v4 as uuidv4 } from "uuid"
import type { Answer, AnswerFormat, AnswerGenerator, DetectedQuestion } from "../src/types/live-session"

export interface AnswerDispatcherCallbacks {
  onQuestionDetected?: (question: DetectedQuestion) => void
  onAnswerReady?: (answer: Answer) => void
  onAnswerFailed?: (question: DetectedQuestion, error: Error) => void
}

/**
 * Sends each question seen for the first time in a session to the answer
 * generator without waiting for the result. A question text is dispatched
 * at most once.
 */
export class AnswerDispatcher {
  private detected: DetectedQuestion[] = []
  private seen = new Set<string>()
  private pending = new Set<Promise<void>>()
  private answered = 0
  private failed = 0

  constructor(
    private readonly generator: AnswerGenerator,
    private readonly selectContext: () => string,
    private readonly format: AnswerFormat = "bullets",
    private readonly callbacks: AnswerDispatcherCallbacks = {}
  ) {}

  /**
   * Returns false when the question was already dispatched.
   */
  public dispatch(text: string): boolean {
    if (this.seen.has(text)) {
      return false
    }

    const question: DetectedQuestion = { id: uuidv4(), text, firstSeenAt: Date.now() }
    this.seen.add(text)
    this.detected.push(question)
    console.log("[AnswerDispatcher] Question detected:", text)

    this.invoke("onQuestionDetected", () => this.callbacks.onQuestionDetected?.(question))

    // Snapshot now: the transcript keeps growing while the answer is generated
    const context = this.selectContext()
    const task = this.generate(question, context)
    this.pending.add(task)
    void task.finally(() => this.pending.delete(task))
    return true
  }

  /** Resolves once every in-flight generation has settled. */
  public async waitForPending(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending))
    }
  }

  public getDetectedQuestions(): DetectedQuestion[] {
    return this.detected.map(question => ({ ...question }))
  }

  public get questionCount(): number {
    return this.detected.length
  }

  public get answeredCount(): number {
    return this.answered
  }

  public get failedCount(): number {
    return this.failed
  }

  public get pendingCount(): number {
    return this.pending.size
  }

  private async generate(question: DetectedQuestion, context: string): Promise<void> {
    const startedAt = Date.now()
    let text: string
    try {
      text = await this.generator.generateAnswer(question.text, context, this.format)
    } catch (error) {
      this.failed++
      const err = error instanceof Error ? error : new Error(String(error))
      console.error(`[AnswerDispatcher] Answer generation failed for "${question.text}":`, err)
      this.invoke("onAnswerFailed", () => this.callbacks.onAnswerFailed?.(question, err))
      return
    }

    const answer: Answer = {
      question,
      text,
      format: this.format,
      generationLatencyMs: Date.now() - startedAt,
      generatedAt: Date.now()
    }
    this.answered++
    console.log(`[AnswerDispatcher] Answer ready in ${answer.generationLatencyMs}ms`)
    this.invoke("onAnswerReady", () => this.callbacks.onAnswerReady?.(answer))
  }

  private invoke(name: keyof AnswerDispatcherCallbacks, fn: () => void): void {
    try {
      fn()
    } catch (error) {
      console.error(`[AnswerDispatcher] ${name} callback failed:`, error)
    }
  }
}
