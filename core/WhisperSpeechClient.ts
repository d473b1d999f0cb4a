import OpenAI, { toFile } from "openai";
import type { SpeechToTextClient } from "../src/types/live-session";

export interface WhisperOptions {
  model?: string;
  /** ISO-639-1 code; Whisper auto-detects when omitted */
  language?: string;
  temperature?: number;
}

export class WhisperSpeechClient implements SpeechToTextClient {
  private openai: OpenAI;
  private readonly options: Required<Omit<WhisperOptions, "language">> & { language?: string };

  constructor(openaiApiKey: string, options: WhisperOptions = {}) {
    if (!openaiApiKey || openaiApiKey.trim() === '') {
      throw new Error('OpenAI API key is required for WhisperSpeechClient');
    }

    this.openai = new OpenAI({ apiKey: openaiApiKey });
    this.options = {
      model: options.model ?? "whisper-1",
      temperature: options.temperature ?? 0.2,
      language: options.language
    };
  }

  public async transcribe(audio: Buffer, sampleRate: number): Promise<string> {
    console.log('[WhisperSpeechClient] Sending chunk:', {
      bytes: audio.length,
      sampleRate
    });

    const transcription = await this.openai.audio.transcriptions.create({
      file: await toFile(audio, "chunk.wav", { type: "audio/wav" }),
      model: this.options.model,
      language: this.options.language,
      response_format: "json",
      temperature: this.options.temperature
    });

    return transcription.text || "";
  }
}
