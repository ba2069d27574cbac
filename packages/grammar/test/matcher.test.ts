/**
 * Arbor Grammar — Matcher Tests
 *
 * MT-U1: parsed + remaining always equals the input; offsets are exact
 * MT-U2: outcomes (terminal, incomplete, no-match, invalid-value)
 * MT-U3: traversal limits and variable accumulation
 * MT-U4: aliases reach the same node and share its traversal count
 * MT-U5: matchCandidates constrains matching to the candidate set
 * MT-U6: quoted tokens
 * MT-I1: parsing is deterministic
 * MT-I2: the returned context is sealed
 */

import { describe, it, expect } from 'vitest';
import {
  action,
  alias,
  buildGrammar,
  integer,
  node,
  parse,
  staticCandidates,
  string,
  variable,
  VariableParseError,
} from '../src/index.js';
import type { ParseContext } from '../src/index.js';

const noop = (): void => undefined;

function paths(context: ParseContext): string[] {
  return context.history.map((n) => n.path);
}

const showGrammar = buildGrammar(
  node('show', { help: 'Show system state' }, [
    node('version', { help: 'Software version' }, [action('Show version', noop)]),
    variable('count', { type: integer, help: 'Lines to show' }, [action('Show lines', noop)]),
  ]),
);

// ---------------------------------------------------------------------------
// MT-U1: offsets
// ---------------------------------------------------------------------------

describe('MT-U1: offsets', () => {
  it.each([
    '',
    '   ',
    'show',
    '  show   version ',
    'show bogus',
    'show 12 extra words',
    '\tshow\t\tversion',
  ])('parsed + remaining equals %j', (input) => {
    const context = parse(showGrammar, input);
    expect(context.parsed + context.remaining).toBe(input);
  });

  it('consumes leading whitespace and the whitespace after each token', () => {
    const context = parse(showGrammar, '  show   version ');
    expect(context.cursor).toBe(17);
    expect(context.remaining).toBe('');
  });

  it('stops in front of the failing token', () => {
    const context = parse(showGrammar, '  show  bogus  ');
    expect(context.parsed).toBe('  show  ');
    expect(context.remaining).toBe('bogus  ');
  });
});

// ---------------------------------------------------------------------------
// MT-U2: outcomes
// ---------------------------------------------------------------------------

describe('MT-U2: outcomes', () => {
  it('terminates at an end-of-input action', () => {
    const context = parse(showGrammar, 'show version');
    expect(context.outcome).toBe('terminal');
    expect(context.isComplete).toBe(true);
    expect(paths(context)).toEqual(['/', '/show', '/show/version', '/show/version/<eol>']);
    expect(context.terminal?.path).toBe('/show/version/<eol>');
    expect(context.frontier.path).toBe('/show/version');
  });

  it('is incomplete when input runs out before an action', () => {
    const context = parse(showGrammar, 'show');
    expect(context.outcome).toBe('incomplete');
    expect(context.terminal).toBeNull();
    expect(context.node.path).toBe('/show');
    expect(context.frontier.path).toBe('/show');
  });

  it('reports no-match when no child accepts the token', () => {
    const context = parse(showGrammar, 'show bogus');
    expect(context.outcome).toBe('no-match');
    expect(context.node.path).toBe('/show');
    expect(context.isComplete).toBe(false);
  });

  it('skips end-of-input actions while tokens remain', () => {
    const context = parse(showGrammar, 'show 12 extra');
    expect(context.outcome).toBe('no-match');
    expect(context.remaining).toBe('extra');
  });

  it('terminates an empty line at a root action', () => {
    const grammar = buildGrammar(action('Nothing to do', noop), node('x', {}, [action('X', noop)]));
    const context = parse(grammar, '');
    expect(context.outcome).toBe('terminal');
    expect(context.frontier).toBe(grammar.root);
  });

  it('terminates at an action that consumed a token', () => {
    const grammar = buildGrammar(action('Quit', noop, { name: 'quit', pattern: 'quit|exit' }));
    const context = parse(grammar, 'exit');
    expect(context.outcome).toBe('terminal');
    expect(context.terminal?.path).toBe('/quit');
    expect(context.frontier.path).toBe('/quit');
  });

  it('records a rejected variable value without storing it', () => {
    const grammar = buildGrammar(
      node('set', {}, [
        variable(
          'n',
          {
            pattern: /\d+/,
            parse: (raw) => {
              if (raw === '0') throw new Error('zero is not allowed');
              return Number(raw);
            },
          },
          [action('Set', noop)],
        ),
      ]),
    );
    const context = parse(grammar, 'set 0');
    expect(context.outcome).toBe('invalid-value');
    expect(context.error).toBeInstanceOf(VariableParseError);
    expect(context.error?.offset).toBe(4);
    expect(context.error?.token).toBe('0');
    expect(context.error?.message).toBe('invalid value "0" for /set/n: zero is not allowed');
    expect(context.vars).toEqual({});
    expect(context.remaining).toBe('0');
    expect(context.node.path).toBe('/set');
  });
});

// ---------------------------------------------------------------------------
// MT-U3: traversals
// ---------------------------------------------------------------------------

describe('MT-U3: traversals', () => {
  const listGrammar = buildGrammar(
    node('add', {}, [variable('item', { traversals: 3 }, [alias('.'), action('Add items', noop)])]),
  );

  it('collects two entries into a two-element array', () => {
    const context = parse(listGrammar, 'add a b');
    expect(context.outcome).toBe('terminal');
    expect(context.vars).toEqual({ item: ['a', 'b'] });
  });

  it('collects one entry into a one-element array', () => {
    expect(parse(listGrammar, 'add a').vars).toEqual({ item: ['a'] });
  });

  it('refuses entry beyond the limit', () => {
    const context = parse(listGrammar, 'add a b c d');
    expect(context.outcome).toBe('no-match');
    expect(context.remaining).toBe('d');
    expect(context.vars).toEqual({ item: ['a', 'b', 'c'] });
  });

  it('rejects re-entry of a traversals=1 node', () => {
    const grammar = buildGrammar(node('x', {}, [alias('.'), action('X', noop)]));
    const context = parse(grammar, 'x x');
    expect(context.outcome).toBe('no-match');
    expect(context.remaining).toBe('x');
  });

  it('allows unlimited entries with traversals=0', () => {
    const grammar = buildGrammar(node('x', { traversals: 0 }, [alias('.'), action('X', noop)]));
    const context = parse(grammar, 'x x x');
    expect(context.outcome).toBe('terminal');
    expect(context.traversalCount(context.node)).toBe(0);
    expect(context.traversalCount(context.frontier)).toBe(3);
  });

  it('stores scalars for traversals=1 variables', () => {
    expect(parse(showGrammar, 'show 42').vars).toEqual({ count: 42 });
  });

  it('does not charge end-of-input actions', () => {
    const context = parse(showGrammar, 'show version');
    const eol = context.terminal;
    expect(eol).not.toBeNull();
    if (eol !== null) expect(context.traversalCount(eol)).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// MT-U4: aliases
// ---------------------------------------------------------------------------

describe('MT-U4: aliases', () => {
  it('reaches the aliased node, and the declared sibling', () => {
    const grammar = buildGrammar(
      node('one', {}, [alias('/three'), node('two', {}, [action('Two', noop)])]),
      node('three', {}, [action('Three', noop)]),
    );
    expect(parse(grammar, 'one three').frontier.path).toBe('/three');
    expect(parse(grammar, 'one two').frontier.path).toBe('/one/two');
  });

  it('reaches the same node identity through /a/* under /b', () => {
    const grammar = buildGrammar(
      node('a', {}, [node('x', {}, [action('X', noop)])]),
      node('b', {}, [alias('/a/*')]),
    );
    const direct = parse(grammar, 'a x');
    const aliased = parse(grammar, 'b x');
    expect(aliased.frontier).toBe(direct.frontier);
    expect(paths(aliased)).toEqual(['/', '/b', '/a/x', '/a/x/<eol>']);
  });

  it('shares one traversal count across paths', () => {
    const grammar = buildGrammar(
      node('a', {}, [node('x', {}, [alias('/b'), action('X', noop)])]),
      node('b', {}, [alias('/a/*')]),
    );
    const context = parse(grammar, 'a x b x');
    expect(context.outcome).toBe('no-match');
    expect(context.remaining).toBe('x');
    expect(paths(context)).toEqual(['/', '/a', '/a/x', '/b']);
  });
});

// ---------------------------------------------------------------------------
// MT-U5: matchCandidates
// ---------------------------------------------------------------------------

describe('MT-U5: matchCandidates', () => {
  const grammar = buildGrammar(
    node('kill', {}, [
      variable('signal', { candidates: staticCandidates('TERM', 'KILL'), matchCandidates: true }, [
        action('Send signal', noop),
      ]),
    ]),
  );

  it('rejects a token outside the candidate set', () => {
    const context = parse(grammar, 'kill FOO');
    expect(context.outcome).toBe('no-match');
    expect(context.remaining).toBe('FOO');
  });

  it('accepts a candidate', () => {
    const context = parse(grammar, 'kill TERM');
    expect(context.outcome).toBe('terminal');
    expect(context.vars).toEqual({ signal: 'TERM' });
  });
});

// ---------------------------------------------------------------------------
// MT-U6: quoting
// ---------------------------------------------------------------------------

describe('MT-U6: quoted tokens', () => {
  const grammar = buildGrammar(node('say', {}, [variable('msg', { type: string }, [action('Say', noop)])]));

  it('keeps whitespace inside quotes', () => {
    const context = parse(grammar, 'say "hello world"');
    expect(context.outcome).toBe('terminal');
    expect(context.vars).toEqual({ msg: 'hello world' });
  });

  it('stores values under varName', () => {
    const renamed = buildGrammar(variable('m', { varName: 'message' }, [action('Say', noop)]));
    expect(parse(renamed, 'hi').vars).toEqual({ message: 'hi' });
  });
});

// ---------------------------------------------------------------------------
// MT-I1 / MT-I2
// ---------------------------------------------------------------------------

describe('MT-I1: determinism', () => {
  it('produces identical results for identical input', () => {
    const first = parse(showGrammar, 'show 12');
    const second = parse(showGrammar, 'show 12');
    expect(paths(second)).toEqual(paths(first));
    expect(second.vars).toEqual(first.vars);
    expect(second.parsed).toBe(first.parsed);
    expect(second.remaining).toBe(first.remaining);
  });
});

describe('MT-I2: sealing', () => {
  it('refuses mutation after the run', () => {
    const context = parse(showGrammar, 'show');
    expect(context.isSealed).toBe(true);
    expect(() => context.enter(showGrammar.root)).toThrow('parse context is sealed');
  });
});
