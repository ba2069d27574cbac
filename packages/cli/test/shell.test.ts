/**
 * Arbor CLI — Shell Tests
 *
 *   SH-U1: executed lines dispatch to the built-in callbacks
 *   SH-U2: a trailing ? prints help and offers the line again
 *   SH-U3: failing lines print the error at its offset
 *   SH-U4: callback errors are printed and the session goes on
 *   SH-U5: history files round-trip newest first
 *   SH-I1: launchShell runs lines until quit and ignores what follows
 *   SH-I2: launchShell ends with its input
 *
 * Isolation: shells read from in-memory streams; history files live in a
 * temp directory.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import chalk from 'chalk';
import { action, buildGrammar, node, Parser } from '@arbor/grammar';
import { loadGrammarFile } from '@arbor/loader';
import { BufferIO } from '../src/io.js';
import { builtinRegistry } from '../src/registry.js';
import { resolveSettings } from '../src/settings.js';
import { loadHistory, saveHistory } from '../src/tui/history.js';
import { ShellSession } from '../src/tui/session.js';
import { launchShell } from '../src/tui/shell.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/netctl.yaml', import.meta.url));

beforeAll(() => {
  chalk.level = 0;
});

function sessionFor(io: BufferIO): ShellSession {
  const loaded = loadGrammarFile(FIXTURE, builtinRegistry(io));
  return new ShellSession(new Parser(loaded.grammar), io);
}

// ---------------------------------------------------------------------------
// ShellSession
// ---------------------------------------------------------------------------

describe('ShellSession', () => {
  it('SH-U1: dispatches to the built-in callbacks', () => {
    const io = new BufferIO();
    const session = sessionFor(io);

    expect(session.evaluate('   ')).toEqual({ kind: 'empty' });
    expect(session.evaluate('show route 10.1.2.3')).toEqual({
      kind: 'executed',
      value: { destination: [10, 1, 2, 3] },
    });
    expect(io.stdout).toBe('{"destination":[10,1,2,3]}\n');
    expect(session.evaluate('quit')).toEqual({ kind: 'quit' });
  });

  it('SH-U2: a trailing ? prints help for what may follow', () => {
    const io = new BufferIO();
    const session = sessionFor(io);

    expect(session.evaluate('show ?')).toEqual({ kind: 'help', reoffer: 'show ' });
    expect(io.stdout).toBe(
      '  interfaces  List interfaces\n' +
      '  route       Show a route\n',
    );
  });

  it('SH-U2b: help on a word that does not parse reports the error', () => {
    const io = new BufferIO();
    const session = sessionFor(io);

    expect(session.evaluate('shw?')).toEqual({ kind: 'help', reoffer: 'shw' });
    expect(io.stdout).toBe('');
    expect(io.stderr).toBe(
      '  shw\n' +
      '  ^\n' +
      '  invalid token at offset 0: "shw"\n' +
      '  expected: show, set, quit\n',
    );
  });

  it('SH-U3: failing lines print the error at its offset', () => {
    const io = new BufferIO();
    const session = sessionFor(io);

    expect(session.evaluate('set 99999999999999999999')).toEqual({ kind: 'failed' });
    expect(io.stderr).toBe(
      '  set 99999999999999999999\n' +
      '      ^\n' +
      '  invalid value "99999999999999999999" for /set/level: 99999999999999999999 is out of range\n' +
      '  expected: <level>\n',
    );
  });

  it('SH-U4: callback errors are printed', () => {
    const io = new BufferIO();
    const grammar = buildGrammar(
      node('boom', {}, [action('Fail', () => { throw new Error('kaput'); })]),
      node('ok', {}, [action('Succeed', () => 'fine')]),
    );
    const session = new ShellSession(new Parser(grammar), io);

    expect(session.evaluate('boom')).toEqual({ kind: 'failed' });
    expect(io.stderr).toBe('  error: kaput\n');
    expect(session.evaluate('ok')).toEqual({ kind: 'executed', value: 'fine' });
  });
});

// ---------------------------------------------------------------------------
// History files
// ---------------------------------------------------------------------------

describe('history files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'arbor-shell-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('SH-U5: store oldest first and load newest first', () => {
    const file = join(dir, 'nested', 'history');
    saveHistory(file, ['show interfaces', 'set 3', 'quit'], 2);
    expect(readFileSync(file, 'utf8')).toBe('set 3\nshow interfaces\n');
    expect(loadHistory(file, 10)).toEqual(['show interfaces', 'set 3']);
    expect(loadHistory(file, 1)).toEqual(['show interfaces']);
    expect(loadHistory(file, 0)).toEqual([]);
  });

  it('SH-U5b: a missing file is an empty history', () => {
    expect(loadHistory(join(dir, 'none'), 10)).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// launchShell
// ---------------------------------------------------------------------------

describe('launchShell', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'arbor-shell-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function runShell(lines: string): Promise<BufferIO> {
    const io = new BufferIO();
    const loaded = loadGrammarFile(FIXTURE, builtinRegistry(io));
    const input = new PassThrough();
    const output = new PassThrough();
    output.resume();

    const done = launchShell({
      parser: new Parser(loaded.grammar),
      settings: resolveSettings('netctl', { historyFile: join(dir, 'history') }, {}, dir),
      application: 'netctl',
      description: loaded.description,
      io,
      input,
      output,
      terminal: false,
    });
    input.end(lines);
    await done;
    return io;
  }

  it('SH-I1: runs lines until quit', async () => {
    const io = await runShell('show interfaces\nquit\nset 3\n');
    expect(io.stdout.startsWith('\n  netctl  ·  Network control shell\n')).toBe(true);
    expect(io.stdout.endsWith('{}\n')).toBe(true);
    expect(io.stdout).not.toContain('"level"');
  });

  it('SH-I2: ends with its input', async () => {
    const io = await runShell('set 3\n');
    expect(io.stdout.endsWith('{"level":3}\n')).toBe(true);
  });
});
