/**
 * arbor run — Execute one command against a grammar
 *
 * Dispatches to the built-in callbacks (`echo`, `quit`). A command that
 * does not reach an action exits with code 1 after printing the input
 * with a caret at the failing offset.
 *
 *   arbor run netctl.yaml show route 10.1.2.3
 */

import { Command } from 'commander';
import type { LoadedGrammar } from '@arbor/loader';
import { resolveSettings } from '../settings.js';
import { expectedAt, renderParseError } from '../tui/output/error.js';
import type { ProgramContext } from './shared.js';
import { applicationName, commandLine, failWith, loadForCli, parserFor } from './shared.js';

export function runCommand(ctx: ProgramContext): Command {
  const command: Command = new Command('run')
    .description('Execute a command with the built-in callbacks')
    .argument('<grammar>', 'Grammar file (YAML or JSON)')
    .argument('<input...>', 'Command words')
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

      const input = commandLine(words);
      const result = parserFor(loaded, logFile).execute(input);
      if (!result.ok) {
        command.error(renderParseError(input, result.error, expectedAt(result.context)).trimEnd());
      }
    });
  return command;
}
