/**
 * Arbor Grammar — Log Sink Interface
 *
 * The injection point for parse log persistence. The engine owns this
 * contract and the ParseLogger; concrete sinks (a JSONL file, an in-memory
 * buffer) live in the program that embeds the engine and are injected at
 * construction time. The engine never writes anywhere itself.
 */

import type { ParseLogEntry } from './parse-log.js';

/**
 * Receives one entry per parse or execute run. Implementations must not
 * silently discard entries.
 */
export interface LogSink {
  append(entry: ParseLogEntry): void;
}
