/**
 * Arbor Grammar — Matcher
 *
 * parse() walks the input token by token down the grammar. At each step the
 * current node's eligible children are tried in order; the first whose
 * anchored pattern accepts the whole token wins. There is no cross-branch
 * backtracking.
 *
 * parse() never throws for user input. How the run ended is recorded on
 * the returned, sealed ParseContext.
 */

import { ParseContext } from './context.js';
import { VariableParseError } from './errors.js';
import type { Grammar } from './grammar.js';
import { readToken, skipWhitespace } from './tokenizer.js';
import type { Token } from './tokenizer.js';
import type { ActionNode, GrammarNode } from './types.js';

/** Match `text` against `grammar`. */
export function parse(grammar: Grammar, text: string): ParseContext {
  const context = new ParseContext(grammar, text);
  context.advanceTo(skipWhitespace(text, 0));

  for (;;) {
    const token = readToken(text, context.cursor);

    if (token === null) {
      if (context.node.kind === 'action') {
        context.finish('terminal');
        return context;
      }
      const end = endOfInputAction(grammar, context);
      if (end === undefined) {
        context.finish('incomplete');
        return context;
      }
      context.enterEndOfInput(end);
      context.finish('terminal');
      return context;
    }

    const child = matchingChild(grammar, context, token);
    if (child === undefined) {
      context.finish('no-match');
      return context;
    }

    if (child.kind === 'variable') {
      let value: unknown;
      try {
        value = child.parseValue(token.text);
      } catch (err: unknown) {
        context.finish('invalid-value', new VariableParseError(child.path, token.text, token.start, err));
        return context;
      }
      context.enter(child);
      context.store(child, value);
    } else {
      context.enter(child);
    }
    context.advanceTo(token.next);
  }
}

/**
 * The children of the context's current node that still have traversal
 * budget, in declared order.
 */
export function eligibleChildren(grammar: Grammar, context: ParseContext, from: GrammarNode = context.node): GrammarNode[] {
  return grammar.children(from).filter((child) => context.canEnter(child));
}

/** Whether `token` is accepted by `node`'s pattern and candidate policy. */
export function accepts(node: GrammarNode, token: string, context: ParseContext): boolean {
  if (node.pattern === null || !node.pattern.regex.test(token)) return false;
  if (!node.matchCandidates) return true;
  if (node.candidates === null) return false;
  for (const candidate of node.candidates(token, context)) {
    if (candidate.trimEnd() === token) return true;
  }
  return false;
}

function matchingChild(grammar: Grammar, context: ParseContext, token: Token): GrammarNode | undefined {
  return eligibleChildren(grammar, context).find((child) => accepts(child, token.text, context));
}

function endOfInputAction(grammar: Grammar, context: ParseContext): ActionNode | undefined {
  for (const child of eligibleChildren(grammar, context)) {
    if (child.kind === 'action' && child.pattern === null) return child;
  }
  return undefined;
}
