import { t } from '../theme.js'

/**
 * renderHeader — the shell's startup banner.
 *
 *   netctl  ·  Network control shell
 *   ────────────────────────────────
 *   Tab completes · a trailing ? lists what may follow · Ctrl+D exits
 */
export function renderHeader(application: string, description: string | null): string {
  const title = description === null
    ? t.blue.bold(application)
    : t.blue.bold(application) + '  ' + t.dim('·') + '  ' + t.muted(description)
  const width = application.length + (description === null ? 0 : description.length + 5)

  return (
    '\n' +
    '  ' + title + '\n' +
    '  ' + t.dim('─'.repeat(Math.max(width, 40))) + '\n' +
    '  ' + t.dim('Tab completes · a trailing ? lists what may follow · Ctrl+D exits') + '\n' +
    '\n'
  )
}
