/**
 * arbor check — Validate a grammar file
 *
 * Loads the file, validates it against the grammar source schema and
 * builds it (alias resolution included). With --paths, lists every
 * resolved node by canonical path.
 */

import { Command } from 'commander';
import type { LoadedGrammar } from '@arbor/loader';
import type { ProgramContext } from './shared.js';
import { applicationName, failWith, loadForCli } from './shared.js';

export function checkCommand(ctx: ProgramContext): Command {
  const command: Command = new Command('check')
    .description('Validate and build a grammar file')
    .argument('<grammar>', 'Grammar file (YAML or JSON)')
    .option('--paths', 'List every resolved node')
    .action((file: string, options: { paths?: boolean }) => {
      let loaded: LoadedGrammar;
      try {
        loaded = loadForCli(file, ctx.io);
      } catch (err: unknown) {
        failWith(command, err);
      }

      const { grammar } = loaded;
      ctx.io.out(`ok ${applicationName(loaded, file)}: ${grammar.size} nodes\n`);
      if (options.paths === true) {
        for (const node of grammar.walk()) {
          ctx.io.out(`  ${node.kind.padEnd(9)}${node.path}\n`);
        }
      }
    });
  return command;
}
