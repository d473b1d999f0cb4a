import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai"
import OpenAI from "openai"
import type { AnswerFormat, AnswerGenerator } from "../src/types/live-session"

export type AIProvider = "gemini" | "openai"

export interface LLMHelperOptions {
  provider: AIProvider
  apiKey: string
  model?: string
}

const DEFAULT_MODELS: Record<AIProvider, string> = {
  gemini: "gemini-2.0-flash",
  openai: "gpt-4o"
}

export class LLMHelper implements AnswerGenerator {
  private readonly provider: AIProvider
  private readonly modelName: string
  private geminiModel: GenerativeModel | null = null
  private openai: OpenAI | null = null

  private readonly systemPrompt = `You are an interview assistant. The user is a candidate in a live interview.
Answer the interviewer's question in the first person, as the candidate would say it out loud.

## Guidelines:
- Structure behavioural answers with STAR: Situation, Task, Action, Result
- Ground the answer in what the candidate has already said in the transcript when possible
- Be concrete and concise; no filler, no preamble
- Never mention the transcript, sources or that you are an AI`

  constructor(options: LLMHelperOptions) {
    if (!options.apiKey || options.apiKey.trim() === "") {
      throw new Error(`API key is required for the ${options.provider} provider`)
    }

    this.provider = options.provider
    this.modelName = options.model || DEFAULT_MODELS[options.provider]

    if (this.provider === "gemini") {
      const genAI = new GoogleGenerativeAI(options.apiKey)
      this.geminiModel = genAI.getGenerativeModel({ model: this.modelName })
    } else {
      this.openai = new OpenAI({ apiKey: options.apiKey })
    }

    console.log(`[LLMHelper] Using ${this.provider} (${this.modelName})`)
  }

  public async generateAnswer(question: string, context: string, format: AnswerFormat): Promise<string> {
    const prompt = this.formatAnswerPrompt(question, context, format)
    console.log(`[LLMHelper] Generating ${format} answer for: "${question}"`)
    try {
      const text = await this.complete(prompt)
      return cleanResponseText(text)
    } catch (error) {
      console.error("[LLMHelper] Error in generateAnswer:", error)
      throw error
    }
  }

  public async generateSummary(transcript: string): Promise<string> {
    const prompt = `Summarize this meeting transcript. Include:
1. Main topics discussed
2. Key decisions made
3. Action items, if any
4. Questions that were asked

Transcript:
${transcript}`

    try {
      return cleanResponseText(await this.complete(prompt))
    } catch (error) {
      console.error("[LLMHelper] Error in generateSummary:", error)
      throw error
    }
  }

  public async generateInterviewPrep(transcript: string): Promise<string> {
    const prompt = `You are a career coach preparing a candidate for their next round. Be specific and actionable.

From this interview transcript, write:
1. Key questions that were asked
2. Recommended answers or talking points for each question
3. Areas that need more preparation
4. Overall assessment and tips

Transcript:
${transcript}`

    try {
      return cleanResponseText(await this.complete(prompt))
    } catch (error) {
      console.error("[LLMHelper] Error in generateInterviewPrep:", error)
      throw error
    }
  }

  public async extractQuestionsAndAnswers(transcript: string): Promise<string> {
    const prompt = `Analyze this interview transcript:
1. Identify every question that was asked
2. Give each a clear, professional answer
3. Improve answers already given in the transcript; complete the ones left unfinished

Format the output as:
Q1: [Question]
A1: [Answer]

Q2: [Question]
A2: [Answer]

Transcript:
${transcript}`

    try {
      return cleanResponseText(await this.complete(prompt))
    } catch (error) {
      console.error("[LLMHelper] Error in extractQuestionsAndAnswers:", error)
      throw error
    }
  }

  private formatAnswerPrompt(question: string, context: string, format: AnswerFormat): string {
    const shape = format === "bullets"
      ? `Reply with 3-5 short bullet points the candidate can glance at while speaking, one per STAR step where it applies.`
      : `Reply with a complete spoken answer of one to two short paragraphs following the STAR structure.`

    return `${this.systemPrompt}

## Conversation so far:
${context.trim() || "(nothing transcribed yet)"}

## Interviewer's question:
${question}

${shape}`
  }

  private async complete(prompt: string): Promise<string> {
    if (this.geminiModel) {
      const result = await this.geminiModel.generateContent(prompt)
      const response = await result.response
      return response.text()
    }

    if (this.openai) {
      const completion = await this.openai.chat.completions.create({
        model: this.modelName,
        messages: [{ role: "user", content: prompt }],
        max_tokens: 1024
      })
      return completion.choices[0]?.message?.content ?? ""
    }

    throw new Error(`No client configured for provider ${this.provider}`)
  }
}

export function cleanResponseText(text: string): string {
  // Remove phrases about information sources
  text = text.replace(/Based on the (?:transcript|information provided|conversation)[,:]?\s*/gi, "")
  text = text.replace(/According to the (?:transcript|sources)[,:]?\s*/gi, "")

  // Remove redundant introductory phrases
  text = text.replace(/^(?:Sure|Certainly|Of course)[!,.]\s*/i, "")
  text = text.replace(/^Here(?:'s| is) (?:an?|the|my) (?:answer|response)[^:\n]*:\s*/i, "")

  // Clean up extra whitespace
  text = text.replace(/\n\n\n+/g, "\n\n")
  return text.trim()
}
