/**
 * Arbor CLI — Output Rendering Tests
 *
 *   OUT-U1: help rows share one key column; groups are separated by a blank line
 *   OUT-U2: an empty help listing says so
 *   OUT-U3: parse errors show a caret under the failing offset
 *   OUT-U4: the prompt keeps its trailing whitespace
 */

import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { action, buildGrammar, dispatch, helpSections, integer, node, parse, variable } from '@arbor/grammar';
import type { Grammar } from '@arbor/grammar';
import { expectedAt, renderParseError } from '../src/tui/output/error.js';
import { renderHelp } from '../src/tui/output/help.js';
import { buildPrompt } from '../src/tui/prompt.js';

beforeAll(() => {
  chalk.level = 0;
});

function errorBlock(grammar: Grammar, input: string): string {
  const context = parse(grammar, input);
  const result = dispatch(context);
  if (result.ok) throw new Error(`expected "${input}" to fail`);
  return renderParseError(input, result.error, expectedAt(context));
}

describe('renderHelp', () => {
  it('OUT-U1: aligns keys and separates groups', () => {
    const grammar = buildGrammar(
      node('a', { help: 'A' }),
      node('bb', { help: 'B', helpGroup: 1 }),
      action('Run', () => undefined),
    );
    expect(renderHelp(helpSections(parse(grammar, '')))).toBe(
      '  a      A\n' +
      '\n' +
      '  bb     B\n' +
      '\n' +
      '  <eol>  Run\n',
    );
  });

  it('OUT-U2: says when nothing may follow', () => {
    expect(renderHelp([])).toBe('  (nothing may follow)\n');
  });
});

describe('renderParseError', () => {
  const grammar = buildGrammar(
    node('set', { help: 'Change a setting' }, [
      variable('level', { type: integer, help: 'Log level' }, [action('Set the level', () => undefined)]),
    ]),
  );

  it('OUT-U3: marks an invalid token', () => {
    expect(errorBlock(grammar, 'set high')).toBe(
      '  set high\n' +
      '      ^\n' +
      '  invalid token at offset 4: "high"\n' +
      '  expected: <level>\n',
    );
  });

  it('OUT-U3b: marks the end of an incomplete command', () => {
    expect(errorBlock(grammar, 'set')).toBe(
      '  set\n' +
      '     ^\n' +
      '  incomplete command\n' +
      '  expected: <level>\n',
    );
  });

  it('OUT-U3c: lists literal alternatives at the root', () => {
    expect(errorBlock(grammar, 'sat 1')).toBe(
      '  sat 1\n' +
      '  ^\n' +
      '  invalid token at offset 0: "sat 1"\n' +
      '  expected: set\n',
    );
  });
});

describe('buildPrompt', () => {
  it('OUT-U4: keeps trailing whitespace', () => {
    expect(buildPrompt('netctl> ')).toBe('netctl> ');
  });
});
