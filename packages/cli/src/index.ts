/**
 * @arbor/cli — command line program and interactive shell for Arbor grammars.
 *
 * The bin entry point is src/bin/arbor.ts; this module exposes the pieces
 * for embedding the shell in another program.
 */

export { createProgram, VERSION } from './commands/index.js';
export type { ProgramOptions } from './commands/index.js';
export { parseReport } from './commands/parse.js';
export type { ParseReport } from './commands/parse.js';

export { BufferIO, processIO } from './io.js';
export type { CliIO } from './io.js';
export { builtinRegistry, QUIT } from './registry.js';
export { DEFAULT_HISTORY_SIZE, resolveSettings, SettingsError } from './settings.js';
export type { CliSettings, CliSettingsOptions } from './settings.js';

export { FileLogSink, MemoryLogSink } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';

export { launchShell } from './tui/shell.js';
export type { ShellOptions } from './tui/shell.js';
export { ShellSession } from './tui/session.js';
export type { LineResult } from './tui/session.js';
export { loadHistory, saveHistory } from './tui/history.js';
export { renderHelp } from './tui/output/help.js';
export { expectedAt, renderParseError } from './tui/output/error.js';
