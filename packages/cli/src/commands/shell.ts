/**
 * arbor shell — Interactive shell for a grammar
 *
 * Settings resolve as flag > ARBOR_* environment variable > default; see
 * settings.ts.
 */

import { Command } from 'commander';
import type { LoadedGrammar } from '@arbor/loader';
import type { CliSettings } from '../settings.js';
import { resolveSettings } from '../settings.js';
import { launchShell } from '../tui/shell.js';
import type { ProgramContext } from './shared.js';
import { applicationName, failWith, loadForCli, parserFor } from './shared.js';

interface ShellFlags {
  historyFile?: string;
  historySize?: string;
  prompt?: string;
  logFile?: string;
}

export function shellCommand(ctx: ProgramContext): Command {
  const command: Command = new Command('shell')
    .description('Start an interactive shell for a grammar')
    .argument('<grammar>', 'Grammar file (YAML or JSON)')
    .option('--history-file <path>', 'History file (env ARBOR_HISTORY_FILE)')
    .option('--history-size <n>', 'Commands kept in history (env ARBOR_HISTORY_SIZE)')
    .option('--prompt <text>', 'Prompt text (env ARBOR_PROMPT)')
    .option('--log-file <path>', 'JSONL parse log (env ARBOR_LOG_FILE)')
    .action(async (file: string, flags: ShellFlags) => {
      let loaded: LoadedGrammar;
      let settings: CliSettings;
      try {
        loaded = loadForCli(file, ctx.io);
        settings = resolveSettings(applicationName(loaded, file), flags, ctx.env, ctx.home);
      } catch (err: unknown) {
        failWith(command, err);
      }

      await launchShell({
        parser: parserFor(loaded, settings.logFile),
        settings,
        application: applicationName(loaded, file),
        description: loaded.description,
        io: ctx.io,
      });
    });
  return command;
}
