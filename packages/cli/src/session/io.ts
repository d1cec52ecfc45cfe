import { createInterface } from 'node:readline'

/** Line-based terminal access, swappable for tests. */
export interface LineIO {
  /** Shows `question` and resolves with the next line, or `null` at end of input. */
  prompt(question: string): Promise<string | null>
  print(line: string): void
  close(): void
}

export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): LineIO {
  const rl = createInterface({ input, terminal: false })
  const lines = rl[Symbol.asyncIterator]()

  return {
    async prompt(question) {
      output.write(question)
      const next = await lines.next()
      return next.done ? null : next.value
    },
    print(line) {
      output.write(`${line}\n`)
    },
    close() {
      rl.close()
    },
  }
}

/** Re-asks until the answer is a usable port, or input ends. */
export async function promptPort(
  io: LineIO,
  question = 'Port: ',
  { allowZero = false } = {},
): Promise<number | null> {
  for (;;) {
    const answer = await io.prompt(question)
    if (answer === null) return null

    const port = Number(answer.trim())
    if (Number.isInteger(port) && port >= (allowZero ? 0 : 1) && port <= 65535) {
      return port
    }
    io.print(`Not a valid port: ${answer.trim()}`)
  }
}

export async function promptText(
  io: LineIO,
  question: string,
): Promise<string | null> {
  for (;;) {
    const answer = await io.prompt(question)
    if (answer === null) return null
    if (answer.trim() !== '') return answer.trim()
  }
}
