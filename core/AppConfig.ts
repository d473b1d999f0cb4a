import dotenv from "dotenv"
import type { AnswerFormat } from "../src/types/live-session"
import type { AIProvider } from "./LLMHelper"

export interface AppConfig {
  aiProvider: AIProvider
  geminiApiKey?: string
  openaiApiKey?: string
  geminiModel?: string
  openaiModel?: string
  transcriptionLanguage?: string
  sampleRate: number
  chunkDurationSeconds: number
  overlapSeconds: number
  answerFormat: AnswerFormat
}

type Env = Record<string, string | undefined>

/**
 * Load `.env` into process.env (existing variables win) and read the config.
 */
export function loadEnvConfig(path?: string): AppConfig {
  dotenv.config(path ? { path } : undefined)
  return loadAppConfig(process.env)
}

export function loadAppConfig(env: Env): AppConfig {
  const config: AppConfig = {
    aiProvider: readEnum(env, "AI_PROVIDER", ["gemini", "openai"], "gemini"),
    geminiApiKey: readString(env, "GEMINI_API_KEY"),
    openaiApiKey: readString(env, "OPENAI_API_KEY"),
    geminiModel: readString(env, "GEMINI_MODEL"),
    openaiModel: readString(env, "OPENAI_MODEL"),
    transcriptionLanguage: readString(env, "TRANSCRIPTION_LANGUAGE"),
    sampleRate: readNumber(env, "SAMPLE_RATE", 16000),
    chunkDurationSeconds: readNumber(env, "CHUNK_DURATION_SECONDS", 10),
    overlapSeconds: readNumber(env, "OVERLAP_SECONDS", 2),
    answerFormat: readEnum(env, "ANSWER_FORMAT", ["bullets", "full"], "bullets")
  }

  if (!config.openaiApiKey) {
    console.warn("[AppConfig] OPENAI_API_KEY not set - transcription will not work")
  }
  if (config.aiProvider === "gemini" && !config.geminiApiKey) {
    console.warn("[AppConfig] GEMINI_API_KEY not set - answer generation will not work")
  }

  return config
}

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim()
  return value ? value : undefined
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name)
  if (raw === undefined) return fallback

  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`)
  }
  return value
}

function readEnum<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = readString(env, name)?.toLowerCase()
  if (raw === undefined) return fallback

  const match = allowed.find(option => option === raw)
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(", ")}, got "${raw}"`)
  }
  return match
}
