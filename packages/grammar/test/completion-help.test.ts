/**
 * Arbor Grammar — Completion and Help Tests
 *
 * CH-U1: complete() offers literal forms and provider output in declared order
 * CH-U2: completeLine() splits off the partial word and parses the rest
 * CH-U3: help() orders pairs by help group, help order, then declaration
 * CH-U4: helpSections() groups pairs by help group
 */

import { describe, it, expect } from 'vitest';
import {
  action,
  alias,
  buildGrammar,
  complete,
  completeLine,
  help,
  helpKey,
  helpSections,
  integer,
  node,
  parse,
  staticCandidates,
  variable,
} from '../src/index.js';

const noop = (): void => undefined;

const grammar = buildGrammar(
  node('term', { help: 'Terminal settings' }, [action('Show terminal', noop)]),
  node('test', { help: 'Run self test' }, [action('Run', noop)]),
  node('show', { help: 'Show state' }, [
    variable('state', { pattern: 'on|off', help: 'Power state' }, [action('Apply', noop)]),
    variable('level', { type: integer, help: 'Level' }, [action('Apply', noop)]),
    node('dir', { candidates: staticCandidates('etc/', 'usr/'), help: 'Directory' }),
  ]),
);

// ---------------------------------------------------------------------------
// CH-U1: complete()
// ---------------------------------------------------------------------------

describe('CH-U1: complete()', () => {
  it('filters by prefix in declared order', () => {
    expect(complete(grammar, parse(grammar, ''), 'te')).toEqual(['term ', 'test ']);
  });

  it('offers every root word for an empty partial', () => {
    expect(complete(grammar, parse(grammar, ''), '')).toEqual(['term ', 'test ', 'show ']);
  });

  it('uses literal alternatives and providers, and skips open patterns', () => {
    expect(complete(grammar, parse(grammar, 'show '), '')).toEqual(['on ', 'off ', 'etc/', 'usr/']);
  });

  it('omits children without traversal budget', () => {
    const looping = buildGrammar(node('x', {}, [alias('.'), node('y'), action('X', noop)]));
    expect(complete(looping, parse(looping, 'x'), '')).toEqual(['y ']);
  });

  it('de-duplicates candidates', () => {
    const twice = buildGrammar(
      variable('a', { candidates: staticCandidates('red', 'blue') }),
      variable('b', { candidates: staticCandidates('blue ', 'green') }),
    );
    expect(complete(twice, parse(twice, ''), '')).toEqual(['red ', 'blue ', 'green ']);
  });
});

// ---------------------------------------------------------------------------
// CH-U2: completeLine()
// ---------------------------------------------------------------------------

describe('CH-U2: completeLine()', () => {
  it('completes the last word', () => {
    expect(completeLine(grammar, 'te')).toEqual({ prefix: '', partial: 'te', candidates: ['term ', 'test '] });
  });

  it('completes after a trailing space', () => {
    expect(completeLine(grammar, 'show o')).toEqual({ prefix: 'show ', partial: 'o', candidates: ['on ', 'off '] });
    expect(completeLine(grammar, 'show ').candidates).toEqual(['on ', 'off ', 'etc/', 'usr/']);
  });

  it('offers nothing when the prefix does not parse', () => {
    expect(completeLine(grammar, 'bogus t').candidates).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// CH-U3: help()
// ---------------------------------------------------------------------------

const helpGrammar = buildGrammar(
  node('show', { help: 'Show' }, [
    action('Show everything', noop),
    node('b', { help: 'Second', helpOrder: 2 }),
    node('a', { help: 'First', helpOrder: 1 }),
    variable('n', { help: 'Count', helpGroup: 1 }),
    node('lazy', { help: (context) => [['lazy', `after ${context.parsed.trim()}`]] }),
  ]),
);

describe('CH-U3: help()', () => {
  it('orders by group, order, then declaration', () => {
    expect(help(parse(helpGrammar, 'show '))).toEqual([
      ['lazy', 'after show'],
      ['a', 'First'],
      ['b', 'Second'],
      ['<n>', 'Count'],
      ['<eol>', 'Show everything'],
    ]);
  });

  it('lists the root children for an empty line', () => {
    expect(help(parse(helpGrammar, ''))).toEqual([['show', 'Show']]);
  });

  it('derives keys from the node kind', () => {
    const keys = buildGrammar(
      node('plain'),
      node('mode', { pattern: 'on|off' }),
      action('Quit', noop, { name: 'quit', pattern: 'quit' }),
      action('Run', noop),
    );
    expect([...keys.walk()].slice(1).map(helpKey)).toEqual(['plain', '<mode>', '<quit>', '<eol>']);
  });
});

// ---------------------------------------------------------------------------
// CH-U4: helpSections()
// ---------------------------------------------------------------------------

describe('CH-U4: helpSections()', () => {
  it('groups pairs by help group', () => {
    expect(helpSections(parse(helpGrammar, 'show'))).toEqual([
      {
        group: 0,
        pairs: [
          ['lazy', 'after show'],
          ['a', 'First'],
          ['b', 'Second'],
        ],
      },
      { group: 1, pairs: [['<n>', 'Count']] },
      { group: 9999, pairs: [['<eol>', 'Show everything']] },
    ]);
  });
});
