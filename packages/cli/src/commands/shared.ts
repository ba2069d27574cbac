/**
 * Helpers shared by the arbor subcommands.
 */

import { basename, extname } from 'node:path';
import type { Command } from 'commander';
import { AliasResolutionError, GrammarDefinitionError, ParseLogger, Parser } from '@arbor/grammar';
import { loadGrammarFile, LoaderError } from '@arbor/loader';
import type { LoadedGrammar } from '@arbor/loader';
import type { CliIO } from '../io.js';
import { FileLogSink } from '../logging/file-log-sink.js';
import { builtinRegistry } from '../registry.js';
import { SettingsError } from '../settings.js';

/** What every subcommand is built with. */
export interface ProgramContext {
  readonly io: CliIO;
  readonly env: NodeJS.ProcessEnv;
  /** Home directory for default settings paths. */
  readonly home: string;
}

/** Load a grammar file against the built-in registry. */
export function loadForCli(file: string, io: CliIO): LoadedGrammar {
  return loadGrammarFile(file, builtinRegistry(io));
}

/** The grammar's declared name, or the file name without its extension. */
export function applicationName(loaded: LoadedGrammar, file: string): string {
  return loaded.name ?? basename(file, extname(file));
}

/** A Parser logging to `logFile`, or not logging at all. */
export function parserFor(loaded: LoadedGrammar, logFile: string | null): Parser {
  const logger = logFile === null ? new ParseLogger() : new ParseLogger(new FileLogSink(logFile));
  return new Parser(loaded.grammar, { logger });
}

/** Command words joined back into one input line. */
export function commandLine(words: readonly string[]): string {
  return words.join(' ');
}

/**
 * Report an expected failure through commander (exit code 1) and rethrow
 * anything else.
 */
export function failWith(command: Command, err: unknown): never {
  if (
    err instanceof LoaderError ||
    err instanceof GrammarDefinitionError ||
    err instanceof AliasResolutionError ||
    err instanceof SettingsError
  ) {
    command.error(err.message);
  }
  throw err;
}
