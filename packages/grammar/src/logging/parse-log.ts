/**
 * Arbor Grammar — Parse Logger
 *
 * Records one ParseLogEntry per parse or execute run. The sink is optional:
 * without one, record() is a no-op, which suits tests and embedded use.
 *
 * Execute runs are recorded in a finally block by the Parser, so a callback
 * that throws is still logged (as `callback-error`) before the error
 * propagates.
 */

import type { ParseContext, ParseOutcome } from '../context.js';
import type { LogSink } from './log-sink.js';

/** What a run did. `callback-error` means the action's callback threw. */
export type LoggedOutcome = ParseOutcome | 'callback-error';

export interface ParseLogEntry {
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
  readonly operation: 'parse' | 'execute';
  readonly input: string;
  readonly outcome: LoggedOutcome;
  readonly parsed: string;
  readonly remaining: string;
  /** Canonical paths entered, root first. */
  readonly history: readonly string[];
  /** Path of the action reached, if any. */
  readonly terminal: string | null;
  /** Error message for `invalid-value` and `callback-error` runs. */
  readonly error: string | null;
}

export class ParseLogger {
  constructor(
    private readonly sink?: LogSink,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** True when entries go somewhere. */
  get enabled(): boolean {
    return this.sink !== undefined;
  }

  record(entry: ParseLogEntry): void {
    this.sink?.append(entry);
  }

  /**
   * Build the entry for a finished run.
   *
   * @param thrown - Set when dispatch threw, holding what was thrown
   */
  entryFor(
    operation: ParseLogEntry['operation'],
    context: ParseContext,
    thrown?: { readonly error: unknown },
  ): ParseLogEntry {
    return {
      timestamp: this.clock().toISOString(),
      operation,
      input: context.input,
      outcome: thrown !== undefined ? 'callback-error' : context.outcome,
      parsed: context.parsed,
      remaining: context.remaining,
      history: context.history.map((node) => node.path),
      terminal: context.terminal?.path ?? null,
      error: thrown !== undefined ? describe(thrown.error) : (context.error?.message ?? null),
    };
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
