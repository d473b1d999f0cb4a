export { AnswerDispatcher } from "./AnswerDispatcher"
export type { AnswerDispatcherCallbacks } from "./AnswerDispatcher"
export { loadAppConfig, loadEnvConfig } from "./AppConfig"
export type { AppConfig } from "./AppConfig"
export { encodeWav, float32ToPcm16, pcm16ToFloat32 } from "./audioEncoding"
export { ChunkAccumulator } from "./ChunkAccumulator"
export { ChunkQueue } from "./ChunkQueue"
export { LiveSession } from "./LiveSession"
export type { LiveSessionConfig } from "./LiveSession"
export { LLMHelper, cleanResponseText } from "./LLMHelper"
export type { AIProvider, LLMHelperOptions } from "./LLMHelper"
export { createLiveSession } from "./main"
export { QuestionDetector } from "./QuestionDetector"
export { StreamCoordinator } from "./StreamCoordinator"
export { TranscriptAggregator } from "./TranscriptAggregator"
export { TranscriptionAdapter } from "./TranscriptionAdapter"
export { WhisperSpeechClient } from "./WhisperSpeechClient"
export type { WhisperOptions } from "./WhisperSpeechClient"

export * from "../src/types/live-session"
