/**
 * Arbor CLI — Parse Log Sinks
 *
 * Implementations of the LogSink interface from @arbor/grammar.
 *
 *   FileLogSink   — appends one JSONL line per entry, with a ULID event_id
 *   MemoryLogSink — keeps entries in memory, for tests and embedded use
 *
 * FileLogSink is synchronous: the line is written before append() returns,
 * so the entry for a callback that crashes the process is already on disk.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LogSink, ParseLogEntry } from '@arbor/grammar';
import { ulid } from './ulid.js';

export class FileLogSink implements LogSink {
  private ready = false;

  constructor(readonly path: string) {}

  append(entry: ParseLogEntry): void {
    if (!this.ready) {
      mkdirSync(dirname(this.path), { recursive: true });
      this.ready = true;
    }
    appendFileSync(this.path, JSON.stringify({ event_id: ulid(), ...entry }) + '\n', 'utf8');
  }
}

export class MemoryLogSink implements LogSink {
  readonly entries: ParseLogEntry[] = [];

  append(entry: ParseLogEntry): void {
    this.entries.push(entry);
  }
}
