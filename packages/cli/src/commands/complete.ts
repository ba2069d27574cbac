/**
 * arbor complete — Completion candidates for the last word of a line
 *
 * Prints one candidate per line. Quote the input to complete after a
 * space:
 *
 *   arbor complete netctl.yaml 'show '
 */

import { Command } from 'commander';
import { completeLine } from '@arbor/grammar';
import type { LoadedGrammar } from '@arbor/loader';
import type { ProgramContext } from './shared.js';
import { commandLine, failWith, loadForCli } from './shared.js';

export function completeCommand(ctx: ProgramContext): Command {
  const command: Command = new Command('complete')
    .description('List completions for the last word of the input')
    .argument('<grammar>', 'Grammar file (YAML or JSON)')
    .argument('[input...]', 'Command words')
    .option('--json', 'Output as JSON')
    .action((file: string, words: string[], options: { json?: boolean }) => {
      let loaded: LoadedGrammar;
      try {
        loaded = loadForCli(file, ctx.io);
      } catch (err: unknown) {
        failWith(command, err);
      }

      const completion = completeLine(loaded.grammar, commandLine(words));
      if (options.json === true) {
        ctx.io.out(JSON.stringify(completion, null, 2) + '\n');
        return;
      }
      for (const candidate of completion.candidates) {
        ctx.io.out(candidate + '\n');
      }
    });
  return command;
}
