/**
 * arbor help — Contextual help for a partial command
 *
 * Lists what may follow the input, grouped and ordered as the grammar
 * declares. Input that does not parse is reported at its failing offset.
 *
 *   arbor help netctl.yaml ping db
 */

import { Command } from 'commander';
import { dispatch, helpSections, parse } from '@arbor/grammar';
import type { LoadedGrammar } from '@arbor/loader';
import { expectedAt, renderParseError } from '../tui/output/error.js';
import { renderHelp } from '../tui/output/help.js';
import type { ProgramContext } from './shared.js';
import { commandLine, failWith, loadForCli } from './shared.js';

export function helpCommand(ctx: ProgramContext): Command {
  const command: Command = new Command('help')
    .description('Show what may follow a partial command')
    .argument('<grammar>', 'Grammar file (YAML or JSON)')
    .argument('[input...]', 'Command words')
    .action((file: string, words: string[]) => {
      let loaded: LoadedGrammar;
      try {
        loaded = loadForCli(file, ctx.io);
      } catch (err: unknown) {
        failWith(command, err);
      }

      const input = commandLine(words);
      const context = parse(loaded.grammar, input);
      if (context.remaining !== '') {
        const result = dispatch(context);
        if (!result.ok) {
          command.error(renderParseError(input, result.error, expectedAt(context)).trimEnd());
        }
      }
      ctx.io.out(renderHelp(helpSections(context)));
    });
  return command;
}
