import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"

const gemini = vi.hoisted(() => ({
  generateContent: vi.fn(),
  getGenerativeModel: vi.fn()
}))

const openai = vi.hoisted(() => ({
  create: vi.fn()
}))

vi.mock("@google/generative-ai", () => ({
  GoogleGenerativeAI: vi.fn(function () {
    return { getGenerativeModel: gemini.getGenerativeModel }
  })
}))

vi.mock("openai", () => ({
  default: vi.fn(function () {
    return { chat: { completions: { create: openai.create } } }
  })
}))

import { LLMHelper, cleanResponseText } from "./LLMHelper"

describe("cleanResponseText", () => {
  it("strips source attributions and canned openers", () => {
    expect(cleanResponseText("Sure! Based on the transcript, I led the migration.")).toBe(
      "I led the migration."
    )
    expect(cleanResponseText("Here's an answer you can use:\n- Point one")).toBe("- Point one")
    expect(cleanResponseText("According to the sources: it shipped.")).toBe("it shipped.")
  })

  it("collapses runs of blank lines", () => {
    expect(cleanResponseText("First\n\n\n\nSecond\n")).toBe("First\n\nSecond")
  })
})

describe("LLMHelper", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {})
    vi.spyOn(console, "error").mockImplementation(() => {})
    gemini.getGenerativeModel.mockReturnValue({ generateContent: gemini.generateContent })
  })

  afterEach(() => {
    vi.restoreAllMocks()
    gemini.generateContent.mockReset()
    openai.create.mockReset()
  })

  it("requires an API key", () => {
    expect(() => new LLMHelper({ provider: "gemini", apiKey: "  " })).toThrow(
      "API key is required for the gemini provider"
    )
  })

  it("uses the default Gemini model unless one is given", () => {
    new LLMHelper({ provider: "gemini", apiKey: "test-secret" })
    new LLMHelper({ provider: "gemini", apiKey: "test-secret", model: "gemini-1.5-pro" })

    expect(gemini.getGenerativeModel).toHaveBeenNthCalledWith(1, { model: "gemini-2.0-flash" })
    expect(gemini.getGenerativeModel).toHaveBeenNthCalledWith(2, { model: "gemini-1.5-pro" })
  })

  it("builds a bullet prompt from the question and context and cleans the reply", async () => {
    gemini.generateContent.mockResolvedValue({
      response: { text: () => "Certainly! - Situation: legacy billing\n- Result: 40% faster" }
    })
    const helper = new LLMHelper({ provider: "gemini", apiKey: "test-secret" })

    const answer = await helper.generateAnswer(
      "Tell me about a hard project?",
      "We rebuilt billing last year.",
      "bullets"
    )

    expect(answer).toBe("- Situation: legacy billing\n- Result: 40% faster")
    const prompt: string = gemini.generateContent.mock.calls[0][0]
    expect(prompt).toContain("## Conversation so far:\nWe rebuilt billing last year.")
    expect(prompt).toContain("## Interviewer's question:\nTell me about a hard project?")
    expect(prompt).toContain("Reply with 3-5 short bullet points")
  })

  it("asks for a full answer and marks an empty context", async () => {
    gemini.generateContent.mockResolvedValue({ response: { text: () => "I would start by listening." } })
    const helper = new LLMHelper({ provider: "gemini", apiKey: "test-secret" })

    await helper.generateAnswer("How do you handle conflict?", "   ", "full")

    const prompt: string = gemini.generateContent.mock.calls[0][0]
    expect(prompt).toContain("## Conversation so far:\n(nothing transcribed yet)")
    expect(prompt).toContain("Reply with a complete spoken answer")
  })

  it("rethrows provider failures", async () => {
    gemini.generateContent.mockRejectedValue(new Error("quota exceeded"))
    const helper = new LLMHelper({ provider: "gemini", apiKey: "test-secret" })

    await expect(helper.generateAnswer("Why us?", "", "bullets")).rejects.toThrow("quota exceeded")
  })

  it("answers through OpenAI chat completions", async () => {
    openai.create.mockResolvedValue({ choices: [{ message: { content: "I enjoy hard problems." } }] })
    const helper = new LLMHelper({ provider: "openai", apiKey: "test-secret" })

    await expect(helper.generateAnswer("Why this role?", "", "full")).resolves.toBe("I enjoy hard problems.")
    expect(openai.create).toHaveBeenCalledWith(expect.objectContaining({ model: "gpt-4o", max_tokens: 1024 }))
  })

  it("summarizes a transcript", async () => {
    openai.create.mockResolvedValue({ choices: [{ message: { content: "Topics: hiring." } }] })
    const helper = new LLMHelper({ provider: "openai", apiKey: "test-secret", model: "gpt-4o-mini" })

    await expect(helper.generateSummary("We talked about hiring.")).resolves.toBe("Topics: hiring.")
    const request = openai.create.mock.calls[0][0]
    expect(request.model).toBe("gpt-4o-mini")
    expect(request.messages[0].content).toContain("Transcript:\nWe talked about hiring.")
  })

  it("builds an interview prep guide from the transcript", async () => {
    gemini.generateContent.mockResolvedValue({ response: { text: () => "Of course. 1. Questions asked" } })
    const helper = new LLMHelper({ provider: "gemini", apiKey: "test-secret" })

    await expect(helper.generateInterviewPrep("Why do you want this job?")).resolves.toBe("1. Questions asked")
    const prompt: string = gemini.generateContent.mock.calls[0][0]
    expect(prompt).toContain("3. Areas that need more preparation")
    expect(prompt).toContain("Transcript:\nWhy do you want this job?")
  })

  it("asks for a numbered Q&A document", async () => {
    openai.create.mockResolvedValue({ choices: [{ message: { content: "Q1: Why us?\nA1: The mission." } }] })
    const helper = new LLMHelper({ provider: "openai", apiKey: "test-secret" })

    await expect(helper.extractQuestionsAndAnswers("Why us? The mission.")).resolves.toBe(
      "Q1: Why us?\nA1: The mission."
    )
    const request = openai.create.mock.calls[0][0]
    expect(request.messages[0].content).toContain("Q1: [Question]\nA1: [Answer]")
    expect(request.messages[0].content).toContain("Transcript:\nWhy us? The mission.")
  })

  it("rethrows failures while writing session documents", async () => {
    openai.create.mockRejectedValue(new Error("rate limited"))
    const helper = new LLMHelper({ provider: "openai", apiKey: "test-secret" })

    await expect(helper.extractQuestionsAndAnswers("Anything?")).rejects.toThrow("rate limited")
    await expect(helper.generateInterviewPrep("Anything?")).rejects.toThrow("rate limited")
  })
})
