import { toError } from '@framelink/utils'
import type { LineIO } from './io.js'

/** What a menu session can do with the transport behind it. */
export interface MenuActions {
  /** Shown next to choice `1`. */
  sendLabel: string
  send(message: string): Promise<string[]>
  /** Lines to print for choice `2`; empty when nothing arrived. */
  receive(): Promise<string[]>
}

const CHOICES = ['0', '1', '2']
export const NO_MESSAGES = 'No messages received'

/**
 * Runs the `1` send / `2` receive / `0` exit loop until the user exits or
 * input ends. A failed action is reported and the menu carries on.
 */
export async function runMenu(io: LineIO, actions: MenuActions): Promise<void> {
  for (;;) {
    io.print(`1 to ${actions.sendLabel}\n2 to receive messages\n0 to exit`)

    let choice = await io.prompt('> ')
    while (choice !== null && !CHOICES.includes(choice.trim())) {
      choice = await io.prompt('> ')
    }
    if (choice === null || choice.trim() === '0') return

    try {
      if (choice.trim() === '1') {
        const message = await io.prompt('Message: ')
        if (message === null) return
        for (const line of await actions.send(message)) io.print(line)
      } else {
        const lines = await actions.receive()
        if (lines.length === 0) {
          io.print(NO_MESSAGES)
        } else {
          for (const line of lines) io.print(line)
        }
      }
    } catch (err) {
      io.print(`Error: ${toError(err).message}`)
    }
  }
}
