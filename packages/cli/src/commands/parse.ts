/**
 * arbor parse — Match input against a grammar and report the context
 *
 * Prints the parse context as JSON. Nothing is dispatched, and a parse
 * that fails is a normal report, not an error.
 *
 *   arbor parse netctl.yaml ping 10.0.0.1 count 3
 */

import { Command } from 'commander';
import type { ParseContext } from '@arbor/grammar';
import type { LoadedGrammar } from '@arbor/loader';
import { resolveSettings } from '../settings.js';
import type { ProgramContext } from './shared.js';
import { applicationName, commandLine, failWith, loadForCli, parserFor } from './shared.js';

/** The JSON shape `arbor parse` prints. */
export interface ParseReport {
  readonly input: string;
  readonly outcome: ParseContext['outcome'];
  readonly complete: boolean;
  readonly parsed: string;
  readonly remaining: string;
  readonly history: readonly string[];
  readonly terminal: string | null;
  readonly vars: Readonly<Record<string, unknown>>;
  readonly error: string | null;
}

export function parseReport(context: ParseContext): ParseReport {
  return {
    input: context.input,
    outcome: context.outcome,
    complete: context.isComplete,
    parsed: context.parsed,
    remaining: context.remaining,
    history: context.history.map((node) => node.path),
    terminal: context.terminal?.path ?? null,
    vars: context.vars,
    error: context.error?.message ?? null,
  };
}

export function parseCommand(ctx: ProgramContext): Command {
  const command: Command = new Command('parse')
    .description('Match input against a grammar and print the parse context as JSON')
    .argument('<grammar>', 'Grammar file (YAML or JSON)')
    .argument('[input...]', 'Command words')
    .option('--log-file <path>', 'Append a JSONL parse log entry to this file')
    .action((file: string, words: string[], options: { logFile?: string }) => {
      let loaded: LoadedGrammar;
      let logFile: string | null;
      try {
        loaded = loadForCli(file, ctx.io);
        logFile = resolveSettings(applicationName(loaded, file), { logFile: options.logFile }, ctx.env, ctx.home).logFile;
      } catch (err: unknown) {
        failWith(command, err);
      }

      const context = parserFor(loaded, logFile).parse(commandLine(words));
      ctx.io.out(JSON.stringify(parseReport(context), null, 2) + '\n');
    });
  return command;
}
