const MIN_QUESTION_LENGTH = 10

export class QuestionDetector {
  // Matched anywhere in a sentence, not only at its start
  private readonly questionPatterns: RegExp[] = [
    /\b(what|why|how|when|where|who|which)\b/i,
    /\b(tell me about|describe|explain|walk me through)\b/i,
    /\b(can|could|would|will) you\b/i,
    /\b(have|do|did|are|were) you\b/i,
    /\b(give me an example of|share an experience|talk about a time when)\b/i
  ]

  private readonly sentenceBoundary = /[.!?]+|\n+/

  public isQuestion(text: string): boolean {
    if (text.includes("?")) {
      return true
    }
    return this.questionPatterns.some(pattern => pattern.test(text))
  }

  /**
   * Splits text into sentences and returns the ones that read as questions,
   * each normalized to end with a question mark. Order is preserved.
   */
  public extractQuestions(text: string): string[] {
    const questions: string[] = []

    for (const part of text.split(this.sentenceBoundary)) {
      const sentence = part.trim()
      if (sentence.length < MIN_QUESTION_LENGTH) continue
      if (!this.isQuestion(sentence)) continue

      questions.push(sentence.endsWith("?") ? sentence : `${sentence}?`)
    }

    return questions
  }
}
