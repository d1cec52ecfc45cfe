import type { LineIO } from '../src/session/io.js'

/** Answers prompts from a fixed script and records everything shown. */
export class ScriptedIO implements LineIO {
  readonly prompts: string[] = []
  readonly printed: string[] = []
  closed = false
  private readonly answers: string[]

  constructor(answers: string[]) {
    this.answers = [...answers]
  }

  async prompt(question: string): Promise<string | null> {
    this.prompts.push(question)
    return this.answers.shift() ?? null
  }

  print(line: string): void {
    this.printed.push(line)
  }

  close(): void {
    this.closed = true
  }
}
