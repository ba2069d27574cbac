/**
 * Arbor CLI — Shell Settings Resolution
 *
 * Each setting resolves with the following precedence:
 *
 *   1. Explicit option (e.g. from a --history-file CLI flag)
 *   2. Environment variable
 *   3. Default, derived from the application name
 *
 *   setting       env var              default
 *   historyFile   ARBOR_HISTORY_FILE   ~/.<application>_history
 *   historySize   ARBOR_HISTORY_SIZE   500
 *   prompt        ARBOR_PROMPT         "<application>> "
 *   logFile       ARBOR_LOG_FILE       none (parse runs are not logged)
 *
 * Empty strings count as unset. A history size that is not a non-negative
 * integer is rejected, whichever level it came from.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'

export const DEFAULT_HISTORY_SIZE = 500

export interface CliSettings {
  readonly historyFile: string
  readonly historySize: number
  readonly prompt: string
  /** JSONL parse log, or null for no logging. */
  readonly logFile: string | null
}

/** Explicit overrides. Sizes may arrive as flag strings. */
export interface CliSettingsOptions {
  readonly historyFile?: string | undefined
  readonly historySize?: number | string | undefined
  readonly prompt?: string | undefined
  readonly logFile?: string | undefined
}

export class SettingsError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SettingsError'
  }
}

/**
 * Resolve CLI settings for `application`.
 *
 * @param env  - Environment to read, process.env by default
 * @param home - Home directory for the default history file
 * @throws {SettingsError} on an invalid history size
 */
export function resolveSettings(
  application: string,
  options: CliSettingsOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): CliSettings {
  const historyFile = pick(options.historyFile, env['ARBOR_HISTORY_FILE']) ?? join(home, `.${application}_history`)
  const prompt = pick(options.prompt, env['ARBOR_PROMPT']) ?? `${application}> `
  const logFile = pick(options.logFile, env['ARBOR_LOG_FILE']) ?? null

  let historySize = DEFAULT_HISTORY_SIZE
  if (options.historySize !== undefined && options.historySize !== '') {
    historySize = parseSize(options.historySize, '--history-size')
  } else {
    const fromEnv = pick(undefined, env['ARBOR_HISTORY_SIZE'])
    if (fromEnv !== undefined) historySize = parseSize(fromEnv, 'ARBOR_HISTORY_SIZE')
  }

  return { historyFile, historySize, prompt, logFile }
}

function pick(explicit: string | undefined, fromEnv: string | undefined): string | undefined {
  if (explicit !== undefined && explicit !== '') return explicit
  if (fromEnv !== undefined && fromEnv !== '') return fromEnv
  return undefined
}

function parseSize(value: number | string, source: string): number {
  const n = typeof value === 'number' ? value : /^\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new SettingsError(`${source} must be a non-negative integer, got "${String(value)}"`)
  }
  return n
}
