import { EventEmitter } from "events";
import type {
  Answer,
  AnswerGenerator,
  AudioChunk,
  ChunkTranscriber,
  CoordinatorConfig,
  CoordinatorState,
  DetectedQuestion,
  SessionStatistics
} from "../src/types/live-session";
import { AnswerDispatcher } from "./AnswerDispatcher";
import { ChunkQueue } from "./ChunkQueue";
import { QuestionDetector } from "./QuestionDetector";
import { TranscriptAggregator } from "./TranscriptAggregator";

export declare interface StreamCoordinator {
  on(event: "state-changed", listener: (state: CoordinatorState) => void): this;
  on(event: "chunk-processed", listener: (chunk: AudioChunk, text: string) => void): this;
  on(event: "transcript-update", listener: (increment: string, fullTranscript: string) => void): this;
  on(event: "question-detected", listener: (question: DetectedQuestion) => void): this;
  on(event: "answer-ready", listener: (answer: Answer) => void): this;
  on(event: "answer-failed", listener: (question: DetectedQuestion, error: Error) => void): this;
  on(event: "processing-error", listener: (error: Error) => void): this;
}

/**
 * Drives a session: pulls chunks off the queue one at a time, transcribes
 * them, folds the text into the transcript and hands new questions to the
 * answer dispatcher.
 *
 * idle -> running -> stopping -> idle
 *
 * Chunks are processed strictly in enqueue order. Answers are generated in
 * the background and may arrive after stop() has returned.
 */
export class StreamCoordinator extends EventEmitter {
  private state: CoordinatorState = "idle";
  private readonly config: CoordinatorConfig;
  private readonly queue = new ChunkQueue<AudioChunk>();
  private readonly questionDetector = new QuestionDetector();
  private readonly generator: AnswerGenerator;
  private aggregator: TranscriptAggregator;
  private dispatcher: AnswerDispatcher;

  private running = false;
  private generation = 0;
  private loop: Promise<void> | null = null;
  private stopping: Promise<boolean> | null = null;

  private chunksProcessed = 0;
  private failedTranscriptions = 0;
  private discardedChunks = 0;

  constructor(
    private readonly transcriber: ChunkTranscriber,
    generator: AnswerGenerator,
    config: Partial<CoordinatorConfig> = {}
  ) {
    super();

    this.generator = generator;
    this.config = {
      queuePollMs: config.queuePollMs ?? 1000,
      shutdownTimeoutMs: config.shutdownTimeoutMs ?? 5000,
      drainOnStop: config.drainOnStop ?? false,
      recentWindowSize: config.recentWindowSize ?? 20,
      answerFormat: config.answerFormat ?? "bullets"
    };

    this.aggregator = this.createAggregator();
    this.dispatcher = this.createDispatcher(this.aggregator);
  }

  /**
   * Begins a new session. Transcript, detected questions and counters from
   * the previous session are cleared; chunks queued while idle are kept.
   */
  public start(): void {
    if (this.state !== "idle") {
      console.log(`[StreamCoordinator] start() ignored in state ${this.state}`);
      return;
    }

    this.aggregator = this.createAggregator();
    this.dispatcher = this.createDispatcher(this.aggregator);
    this.chunksProcessed = 0;
    this.failedTranscriptions = 0;
    this.discardedChunks = 0;

    this.running = true;
    this.setState("running");
    this.loop = this.processLoop(++this.generation).catch(error => {
      console.error("[StreamCoordinator] Processing loop crashed:", error);
    });
    console.log("[StreamCoordinator] Started");
  }

  /**
   * Signals the loop to exit and waits up to `shutdownTimeoutMs` for it.
   * Resolves true when the loop exited in time, false when it was abandoned.
   * Either way the coordinator is idle afterwards. A second call while
   * stopping resolves with the first call's result.
   */
  public stop(): Promise<boolean> {
    if (this.stopping) {
      return this.stopping;
    }
    if (this.state !== "running") {
      return Promise.resolve(true);
    }

    const stopping = this.shutdown().finally(() => {
      this.stopping = null;
    });
    this.stopping = stopping;
    return stopping;
  }

  private async shutdown(): Promise<boolean> {
    this.setState("stopping");
    this.running = false;
    // Wake a loop parked in dequeue so it sees the cleared flag now
    this.queue.interrupt();

    const loop = this.loop;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), this.config.shutdownTimeoutMs);
    });

    const exited = loop
      ? await Promise.race([loop.then(() => true), timedOut])
      : true;
    clearTimeout(timer);

    if (!exited) {
      // The straggler must not touch queue or state when its call returns
      this.generation++;
      console.warn(
        `[StreamCoordinator] Loop did not exit within ${this.config.shutdownTimeoutMs}ms, abandoning it`
      );
    }

    this.loop = null;
    this.setState("idle");
    console.log("[StreamCoordinator] Stopped");
    return exited;
  }

  /**
   * Queue a chunk for processing. Safe to call from the capture path.
   */
  public enqueue(chunk: AudioChunk): void {
    this.queue.enqueue(chunk);
  }

  public getState(): CoordinatorState {
    return this.state;
  }

  public getStatistics(): SessionStatistics {
    return {
      state: this.state,
      transcriptLength: this.aggregator.length,
      chunksProcessed: this.chunksProcessed,
      failedTranscriptions: this.failedTranscriptions,
      questionsDetected: this.dispatcher.questionCount,
      answersGenerated: this.dispatcher.answeredCount,
      failedAnswers: this.dispatcher.failedCount,
      queueDepth: this.queue.size,
      discardedChunks: this.discardedChunks
    };
  }

  public getFullTranscript(): string {
    return this.aggregator.getFullTranscript();
  }

  public getDetectedQuestions(): DetectedQuestion[] {
    return this.dispatcher.getDetectedQuestions();
  }

  /** Resolves once every answer generation started so far has settled. */
  public waitForPendingAnswers(): Promise<void> {
    return this.dispatcher.waitForPending();
  }

  /** Generation context for the current transcript, as used for detected questions. */
  public selectContext(): string {
    return this.aggregator.selectContext();
  }

  private async processLoop(generation: number): Promise<void> {
    // An abandoned loop must not keep consuming once a newer one has started
    const isCurrent = () => generation === this.generation;
    let drainDeadline = Infinity;

    while (isCurrent()) {
      if (!this.running) {
        if (!this.config.drainOnStop || this.queue.size === 0) break;
        if (drainDeadline === Infinity) {
          drainDeadline = Date.now() + this.config.shutdownTimeoutMs;
        }
        if (Date.now() >= drainDeadline) break;
      }

      const chunk = await this.queue.dequeue(this.running ? this.config.queuePollMs : 0);
      if (!chunk) continue;

      try {
        await this.processChunk(chunk, isCurrent);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        console.error("[StreamCoordinator] Error in processing loop:", err);
        this.notify("processing-error", () => this.emit("processing-error", err));
      }
    }

    if (!isCurrent()) return;

    const leftover = this.queue.drain();
    if (leftover.length > 0) {
      this.discardedChunks += leftover.length;
      console.warn(`[StreamCoordinator] Discarded ${leftover.length} queued chunk(s) on shutdown`);
    }
  }

  private async processChunk(chunk: AudioChunk, isCurrent: () => boolean): Promise<void> {
    // Counted up front: a chunk whose transcription fails was still processed
    this.chunksProcessed++;

    let text: string;
    try {
      text = await this.transcriber.transcribe(chunk);
    } catch (error) {
      if (!isCurrent()) {
        console.warn(`[StreamCoordinator] Abandoned transcription of chunk ${chunk.id} failed:`, error);
        return;
      }
      this.failedTranscriptions++;
      throw error;
    }

    if (!isCurrent()) {
      console.warn(`[StreamCoordinator] Dropping late transcription of abandoned chunk ${chunk.id}`);
      return;
    }
    this.notify("chunk-processed", () => this.emit("chunk-processed", chunk, text));

    if (!text) {
      this.failedTranscriptions++;
      console.log("[StreamCoordinator] No text for chunk", chunk.id);
      return;
    }

    this.aggregator.append(text);

    for (const question of this.questionDetector.extractQuestions(text)) {
      this.dispatcher.dispatch(question);
    }
  }

  private createAggregator(): TranscriptAggregator {
    return new TranscriptAggregator(this.config.recentWindowSize, (increment, full) =>
      this.notify("transcript-update", () => this.emit("transcript-update", increment, full))
    );
  }

  private createDispatcher(aggregator: TranscriptAggregator): AnswerDispatcher {
    return new AnswerDispatcher(
      this.generator,
      () => aggregator.selectContext(),
      this.config.answerFormat,
      {
        onQuestionDetected: question =>
          this.notify("question-detected", () => this.emit("question-detected", question)),
        onAnswerReady: answer =>
          this.notify("answer-ready", () => this.emit("answer-ready", answer)),
        onAnswerFailed: (question, error) =>
          this.notify("answer-failed", () => this.emit("answer-failed", question, error))
      }
    );
  }

  private setState(state: CoordinatorState): void {
    this.state = state;
    this.notify("state-changed", () => this.emit("state-changed", state));
  }

  // Listener exceptions must not reach the loop or the capture path
  private notify(event: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      console.error(`[StreamCoordinator] Listener for ${event} threw:`, error);
    }
  }
}
