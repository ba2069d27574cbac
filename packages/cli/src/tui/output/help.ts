import type { HelpSection } from '@arbor/grammar'
import { t } from '../theme.js'

/**
 * renderHelp — format contextual help, one help group per block.
 *
 * Keys are padded to a common column across all groups; groups are
 * separated by a blank line.
 */
export function renderHelp(sections: readonly HelpSection[]): string {
  if (sections.length === 0) {
    return '  ' + t.dim('(nothing may follow)') + '\n'
  }

  const width = Math.max(...sections.flatMap(s => s.pairs.map(([key]) => key.length))) + 2

  const row = (key: string, text: string) =>
    '  ' + t.white(key) + t.dim(' '.repeat(width - key.length) + text) + '\n'

  return sections
    .map(section => section.pairs.map(([key, text]) => row(key, text)).join(''))
    .join('\n')
}
