export type AnswerFormat = "bullets" | "full";

export type CoordinatorState = "idle" | "running" | "stopping";

export interface AudioChunk {
  readonly id: string;
  /** Mono samples in [-1, 1) */
  readonly samples: Float32Array;
  readonly sampleRate: number;
  readonly capturedAt: number;
  /** Duration in milliseconds */
  readonly duration: number;
  /** Leading samples repeated from the tail of the previous chunk */
  readonly overlapSamples: number;
}

export interface TranscriptSegment {
  text: string;
  producedAt: number;
}

export interface DetectedQuestion {
  id: string;
  text: string;
  firstSeenAt: number;
}

export interface Answer {
  question: DetectedQuestion;
  text: string;
  format: AnswerFormat;
  generationLatencyMs: number;
  generatedAt: number;
}

export interface SessionStatistics {
  state: CoordinatorState;
  transcriptLength: number;
  chunksProcessed: number;
  failedTranscriptions: number;
  questionsDetected: number;
  answersGenerated: number;
  failedAnswers: number;
  queueDepth: number;
  discardedChunks: number;
}

export interface ChunkingConfig {
  sampleRate: number;
  chunkDurationSeconds: number;
  overlapSeconds: number;
}

export interface CoordinatorConfig {
  /** How long one dequeue waits before the loop re-checks the run flag */
  queuePollMs: number;
  /** Upper bound on how long stop() waits for the loop to exit */
  shutdownTimeoutMs: number;
  /** Keep processing queued chunks after stop() until the queue is empty */
  drainOnStop: boolean;
  recentWindowSize: number;
  answerFormat: AnswerFormat;
}

/**
 * Speech-to-text collaborator. Receives a complete WAV file.
 */
export interface SpeechToTextClient {
  transcribe(audio: Buffer, sampleRate: number): Promise<string>;
}

/**
 * Answer-generation collaborator.
 */
export interface AnswerGenerator {
  generateAnswer(question: string, context: string, format: AnswerFormat): Promise<string>;
  generateSummary?(transcript: string): Promise<string>;
  /** Questions asked, suggested talking points and areas to prepare */
  generateInterviewPrep?(transcript: string): Promise<string>;
  /** Q1/A1 document of every question in the transcript with a polished answer */
  extractQuestionsAndAnswers?(transcript: string): Promise<string>;
}

export interface ChunkTranscriber {
  transcribe(chunk: AudioChunk): Promise<string>;
}

export interface LiveSessionEvents {
  "state-changed": (state: CoordinatorState) => void;
  "chunk-processed": (chunk: AudioChunk, text: string) => void;
  "transcript-update": (increment: string, fullTranscript: string) => void;
  "question-detected": (question: DetectedQuestion) => void;
  "answer-ready": (answer: Answer) => void;
  "answer-failed": (question: DetectedQuestion, error: Error) => void;
  "processing-error": (error: Error) => void;
}
