/**
 * session.ts — what the shell does with one submitted line.
 *
 * Kept apart from readline so it can be driven directly:
 *
 *   ""            nothing
 *   "show ?"      help for what may follow "show "; the line is offered again
 *   "show x"      executed; a failing parse prints the error at its offset
 *   "quit"        executed; a callback returning QUIT ends the session
 *
 * Callback errors are printed and the session goes on.
 */

import { dispatch, helpSections, parse } from '@arbor/grammar'
import type { DispatchResult, Parser } from '@arbor/grammar'
import type { CliIO } from '../io.js'
import { QUIT } from '../registry.js'
import { expectedAt, renderParseError } from './output/error.js'
import { renderHelp } from './output/help.js'
import { t } from './theme.js'

export type LineResult =
  | { readonly kind: 'empty' }
  | { readonly kind: 'help'; readonly reoffer: string }
  | { readonly kind: 'executed'; readonly value: unknown }
  | { readonly kind: 'failed' }
  | { readonly kind: 'quit' }

export class ShellSession {
  constructor(
    private readonly parser: Parser,
    private readonly io: CliIO,
  ) {}

  evaluate(line: string): LineResult {
    if (line.trim() === '') return { kind: 'empty' }

    const body = line.trimEnd()
    if (body.endsWith('?')) {
      return this.showHelp(body.slice(0, -1))
    }

    let result: DispatchResult
    try {
      result = this.parser.execute(line)
    } catch (err: unknown) {
      this.io.err('  ' + t.red('error: ' + (err instanceof Error ? err.message : String(err))) + '\n')
      return { kind: 'failed' }
    }

    if (!result.ok) {
      this.io.err(renderParseError(line, result.error, expectedAt(result.context)))
      return { kind: 'failed' }
    }
    if (result.value === QUIT) return { kind: 'quit' }
    return { kind: 'executed', value: result.value }
  }

  private showHelp(text: string): LineResult {
    const context = parse(this.parser.grammar, text)
    if (context.remaining !== '') {
      // dispatch() runs nothing for a context with input left over
      const result = dispatch(context)
      if (!result.ok) this.io.err(renderParseError(text, result.error, expectedAt(result.context)))
      return { kind: 'help', reoffer: text }
    }
    this.io.out(renderHelp(helpSections(context)))
    return { kind: 'help', reoffer: text }
  }
}
