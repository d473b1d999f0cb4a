import { loadEnvConfig } from "./AppConfig"
import type { AppConfig } from "./AppConfig"
import { LiveSession } from "./LiveSession"
import type { LiveSessionConfig } from "./LiveSession"
import { LLMHelper } from "./LLMHelper"
import { TranscriptionAdapter } from "./TranscriptionAdapter"
import { WhisperSpeechClient } from "./WhisperSpeechClient"

/**
 * Build a session wired to the production collaborators: Whisper for
 * transcription and the configured provider for answers.
 */
export function createLiveSession(
  config: AppConfig = loadEnvConfig(),
  overrides: LiveSessionConfig = {}
): LiveSession {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required for transcription")
  }

  const answerKey = config.aiProvider === "gemini" ? config.geminiApiKey : config.openaiApiKey
  if (!answerKey) {
    throw new Error(`API key for provider ${config.aiProvider} is not configured`)
  }

  const transcriber = new TranscriptionAdapter(
    new WhisperSpeechClient(config.openaiApiKey, { language: config.transcriptionLanguage })
  )
  const llmHelper = new LLMHelper({
    provider: config.aiProvider,
    apiKey: answerKey,
    model: config.aiProvider === "gemini" ? config.geminiModel : config.openaiModel
  })

  console.log("[LiveSession] Creating session:", {
    provider: config.aiProvider,
    sampleRate: config.sampleRate,
    chunkDurationSeconds: config.chunkDurationSeconds,
    overlapSeconds: config.overlapSeconds,
    answerFormat: config.answerFormat
  })

  return new LiveSession(transcriber, llmHelper, {
    sampleRate: config.sampleRate,
    chunkDurationSeconds: config.chunkDurationSeconds,
    overlapSeconds: config.overlapSeconds,
    answerFormat: config.answerFormat,
    ...overrides
  })
}
