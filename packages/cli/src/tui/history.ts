/**
 * history.ts — shell history file.
 *
 * The file holds one command per line, oldest first. readline keeps its
 * history newest first, so both functions reverse. A missing file is an
 * empty history; any other read failure propagates.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'

/** Read at most `size` entries, newest first. */
export function loadHistory(path: string, size: number): string[] {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return []
    throw err
  }
  const lines = text.split('\n').filter(line => line.trim() !== '')
  return size === 0 ? [] : lines.slice(-size).reverse()
}

/** Write the newest `size` entries of a newest-first history. */
export function saveHistory(path: string, history: readonly string[], size: number): void {
  const kept = history.slice(0, size).reverse()
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, kept.length === 0 ? '' : kept.join('\n') + '\n', 'utf8')
}
