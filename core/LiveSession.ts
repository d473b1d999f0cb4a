import type { EventEmitter } from "events"
import { v4 as uuidv4 } from "uuid"
import type {
  Answer,
  AnswerFormat,
  AnswerGenerator,
  ChunkTranscriber,
  ChunkingConfig,
  CoordinatorConfig,
  CoordinatorState,
  DetectedQuestion,
  LiveSessionEvents,
  SessionStatistics
} from "../src/types/live-session"
import { ChunkAccumulator } from "./ChunkAccumulator"
import { StreamCoordinator } from "./StreamCoordinator"

export type LiveSessionConfig = Partial<ChunkingConfig> & Partial<CoordinatorConfig>

/**
 * One listening session, from start() until it is idle again. This is the
 * object a transport layer holds: it feeds captured audio in and subscribes
 * to the session's events.
 */
export class LiveSession {
  private readonly coordinator: StreamCoordinator
  private readonly accumulator: ChunkAccumulator
  private readonly generator: AnswerGenerator
  private readonly answerFormat: AnswerFormat

  constructor(transcriber: ChunkTranscriber, generator: AnswerGenerator, config: LiveSessionConfig = {}) {
    const { sampleRate, chunkDurationSeconds, overlapSeconds, ...coordinatorConfig } = config

    this.generator = generator
    this.answerFormat = coordinatorConfig.answerFormat ?? "bullets"
    // stop() queues the flushed final chunk right before the loop is told to exit
    this.coordinator = new StreamCoordinator(transcriber, generator, {
      ...coordinatorConfig,
      drainOnStop: coordinatorConfig.drainOnStop ?? true
    })
    this.accumulator = new ChunkAccumulator(
      { sampleRate, chunkDurationSeconds, overlapSeconds },
      chunk => this.coordinator.enqueue(chunk)
    )
  }

  /** Starts a new session; the previous session's transcript and questions are dropped. */
  public start(): void {
    this.coordinator.start()
  }

  /**
   * Flushes buffered audio as a final chunk, then stops the coordinator.
   * Resolves false when the processing loop had to be abandoned.
   */
  public async stop(): Promise<boolean> {
    if (this.coordinator.getState() === "running") {
      this.accumulator.flush()
    }
    return this.coordinator.stop()
  }

  /** Capture callback entry point for float samples. */
  public pushAudio(samples: Float32Array): void {
    if (this.coordinator.getState() !== "running") return
    this.accumulator.push(samples)
  }

  /** Capture callback entry point for 16-bit little-endian PCM. */
  public pushPcm16(buffer: Buffer): void {
    if (this.coordinator.getState() !== "running") return
    this.accumulator.pushPcm16(buffer)
  }

  public on<E extends keyof LiveSessionEvents>(event: E, listener: LiveSessionEvents[E]): this {
    const emitter: EventEmitter = this.coordinator
    emitter.on(event, listener)
    return this
  }

  public off<E extends keyof LiveSessionEvents>(event: E, listener: LiveSessionEvents[E]): this {
    const emitter: EventEmitter = this.coordinator
    emitter.off(event, listener)
    return this
  }

  public getState(): CoordinatorState {
    return this.coordinator.getState()
  }

  public getStatistics(): SessionStatistics {
    return this.coordinator.getStatistics()
  }

  public getFullTranscript(): string {
    return this.coordinator.getFullTranscript()
  }

  public getDetectedQuestions(): DetectedQuestion[] {
    return this.coordinator.getDetectedQuestions()
  }

  public waitForPendingAnswers(): Promise<void> {
    return this.coordinator.waitForPendingAnswers()
  }

  /**
   * Answers a question the user typed, against the same context a detected
   * question would get. Not recorded as a detected question; generation
   * errors reach the caller.
   */
  public async answerQuestion(question: string, format: AnswerFormat = this.answerFormat): Promise<Answer> {
    const text = question.trim()
    if (!text) {
      throw new Error("A question is required")
    }
    this.requireTranscript()

    const detected: DetectedQuestion = { id: uuidv4(), text, firstSeenAt: Date.now() }
    const startedAt = Date.now()
    const answerText = await this.generator.generateAnswer(text, this.coordinator.selectContext(), format)
    const answer: Answer = {
      question: detected,
      text: answerText,
      format,
      generationLatencyMs: Date.now() - startedAt,
      generatedAt: Date.now()
    }
    console.log(`[LiveSession] Answered on request in ${answer.generationLatencyMs}ms`)
    return answer
  }

  public async summarize(): Promise<string> {
    const transcript = this.requireTranscript()
    if (!this.generator.generateSummary) {
      throw new Error("The configured answer generator cannot summarize")
    }
    return this.generator.generateSummary(transcript)
  }

  public async interviewPrep(): Promise<string> {
    const transcript = this.requireTranscript()
    if (!this.generator.generateInterviewPrep) {
      throw new Error("The configured answer generator cannot produce interview prep")
    }
    return this.generator.generateInterviewPrep(transcript)
  }

  public async extractQuestionsAndAnswers(): Promise<string> {
    const transcript = this.requireTranscript()
    if (!this.generator.extractQuestionsAndAnswers) {
      throw new Error("The configured answer generator cannot extract questions and answers")
    }
    return this.generator.extractQuestionsAndAnswers(transcript)
  }

  private requireTranscript(): string {
    const transcript = this.getFullTranscript().trim()
    if (!transcript) {
      throw new Error("Nothing has been transcribed in this session")
    }
    return transcript
  }
}
