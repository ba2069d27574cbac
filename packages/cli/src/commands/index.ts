/**
 * commands/index.ts — the arbor Commander program.
 *
 * createProgram() returns a configured program without parsing. The
 * context defaults to the real process; tests pass their own IO and
 * environment and turn on exitOverride so failures throw a CommanderError
 * instead of exiting.
 */

import { homedir } from 'node:os';
import { Command } from 'commander';
import { processIO } from '../io.js';
import type { CliIO } from '../io.js';
import { checkCommand } from './check.js';
import { completeCommand } from './complete.js';
import { helpCommand } from './help.js';
import { parseCommand } from './parse.js';
import { runCommand } from './run.js';
import type { ProgramContext } from './shared.js';
import { shellCommand } from './shell.js';

export const VERSION = '0.1.0';

export interface ProgramOptions {
  readonly io?: CliIO | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  readonly home?: string | undefined;
  readonly exitOverride?: boolean | undefined;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const ctx: ProgramContext = {
    io: options.io ?? processIO,
    env: options.env ?? process.env,
    home: options.home ?? homedir(),
  };

  const program = new Command('arbor')
    .description(
      'Arbor — grammar-driven command line engine.\n' +
      'Validate, query and run YAML or JSON command grammars.',
    )
    .version(VERSION);

  const commands = [
    checkCommand(ctx),
    parseCommand(ctx),
    completeCommand(ctx),
    helpCommand(ctx),
    runCommand(ctx),
    shellCommand(ctx),
  ];

  for (const command of [program, ...commands]) {
    command.configureOutput({ writeOut: ctx.io.out, writeErr: ctx.io.err });
    if (options.exitOverride === true) command.exitOverride();
  }
  for (const command of commands) {
    program.addCommand(command);
  }

  return program;
}
