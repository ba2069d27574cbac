/**
 * shell.ts — Arbor interactive readline shell.
 *
 * LAYER 1 — READLINE
 *   Node.js readline. Prompt, line editing, history (persisted to the
 *   history file), Tab completion through Parser.complete().
 *
 * LAYER 2 — SESSION
 *   ShellSession decides what a submitted line does and writes its output
 *   through the CliIO. It never touches readline.
 *
 * A line ending in `?` prints help and, on a terminal, puts the line back
 * in the editor without the `?`. The shell ends on a `quit` action, on
 * Ctrl+C or Ctrl+D, and when input ends.
 */

import * as readline from 'node:readline'
import type { Parser } from '@arbor/grammar'
import type { CliIO } from '../io.js'
import { processIO } from '../io.js'
import type { CliSettings } from '../settings.js'
import { loadHistory, saveHistory } from './history.js'
import { renderHeader } from './output/header.js'
import { buildPrompt } from './prompt.js'
import { ShellSession } from './session.js'

export interface ShellOptions {
  readonly parser: Parser
  readonly settings: CliSettings
  readonly application: string
  readonly description?: string | null | undefined
  readonly io?: CliIO | undefined
  readonly input?: NodeJS.ReadableStream | undefined
  readonly output?: NodeJS.WritableStream | undefined
  /** Defaults to whether `output` is a TTY. */
  readonly terminal?: boolean | undefined
}

/**
 * launchShell — run the shell until it ends.
 *
 * Resolves once readline has closed and the history file is written.
 */
export function launchShell(options: ShellOptions): Promise<void> {
  const io       = options.io ?? processIO
  const input    = options.input ?? process.stdin
  const output   = options.output ?? process.stdout
  const terminal = options.terminal ?? process.stdout.isTTY === true
  const { parser, settings } = options

  const session = new ShellSession(parser, io)

  const rl = readline.createInterface({
    input,
    output,
    terminal,
    history:     loadHistory(settings.historyFile, settings.historySize),
    historySize: settings.historySize,
    removeHistoryDuplicates: true,
    prompt:      buildPrompt(settings.prompt),
    completer:   (line: string): [string[], string] => {
      const { partial, candidates } = parser.complete(line)
      return [candidates, partial]
    },
  })

  // readline only keeps history on a terminal; write it on every change.
  rl.on('history', (history: string[]) => {
    saveHistory(settings.historyFile, history, settings.historySize)
  })

  io.out(renderHeader(options.application, options.description ?? null))
  rl.prompt()

  let closed = false

  return new Promise<void>((resolve) => {
    rl.on('line', (line: string) => {
      // lines already buffered when the shell quit are dropped
      if (closed) return

      const result = session.evaluate(line)
      if (result.kind === 'quit') {
        rl.close()
        return
      }

      rl.prompt()
      if (result.kind === 'help' && rl.terminal) {
        rl.write(result.reoffer)
      }
    })

    rl.on('SIGINT', () => {
      output.write('\n')
      rl.close()
    })

    rl.on('close', () => {
      closed = true
      resolve()
    })
  })
}
