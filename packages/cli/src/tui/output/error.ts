import { help } from '@arbor/grammar'
import type { IncompleteCommandError, ParseContext } from '@arbor/grammar'
import { t } from '../theme.js'

/**
 * expectedAt — help keys of everything that could have come next, in help
 * order and without repeats.
 */
export function expectedAt(context: ParseContext): string[] {
  const keys: string[] = []
  for (const [key] of help(context)) {
    if (!keys.includes(key)) keys.push(key)
  }
  return keys
}

/**
 * renderParseError — echo the input with a caret under the failing offset,
 * then the error and what was expected there.
 *
 *   show rout
 *        ^
 *   invalid token at offset 5: "rout"
 *   expected: interfaces, route
 */
export function renderParseError(
  input: string,
  error: IncompleteCommandError,
  expected: readonly string[],
): string {
  const offset = error.parsed.length

  let out = ''
  out += '  ' + t.text(input.replace(/\t/g, ' ')) + '\n'
  out += '  ' + ' '.repeat(offset) + t.red('^') + '\n'
  out += '  ' + t.red(error.message) + '\n'
  if (expected.length > 0) {
    out += '  ' + t.muted('expected: ') + t.white(expected.join(', ')) + '\n'
  }
  return out
}
