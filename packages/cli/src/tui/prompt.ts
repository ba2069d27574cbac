import { t } from './theme.js'

/**
 * buildPrompt — colour the configured prompt string.
 *
 * A trailing run of whitespace is kept uncoloured so the cursor sits after
 * it, as in `netctl> `.
 */
export function buildPrompt(prompt: string): string {
  const body = prompt.trimEnd()
  return t.blue.bold(body) + prompt.slice(body.length)
}
