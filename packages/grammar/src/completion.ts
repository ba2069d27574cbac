/**
 * Arbor Grammar — Completion Engine
 *
 * Offers the words that may follow a parsed prefix. Each eligible child of
 * the context's frontier contributes, in declared order:
 *
 * - its candidate provider's output, when it has one;
 * - otherwise its literal forms: the name for nodes matched by name, or
 *   every alternative of a literal alternation pattern (`start|stop`).
 *
 * Actions that match end of input contribute nothing, and neither do
 * patterned nodes without a finite literal form. Candidates end in a space
 * (so the next word can be typed directly) unless they already end in
 * whitespace or `/`.
 */

import type { ParseContext } from './context.js';
import type { Grammar } from './grammar.js';
import { eligibleChildren, parse } from './matcher.js';
import { tokenize } from './tokenizer.js';
import type { CandidateProvider, GrammarNode } from './types.js';

/**
 * Completion candidates for `partial` at the frontier of `context`,
 * prefix-filtered and de-duplicated in order.
 */
export function complete(grammar: Grammar, context: ParseContext, partial: string): string[] {
  const out: string[] = [];
  for (const child of eligibleChildren(grammar, context, context.frontier)) {
    for (const word of candidateWords(child, partial, context)) {
      const candidate = /[\s/]$/.test(word) ? word : `${word} `;
      if (candidate.startsWith(partial) && !out.includes(candidate)) {
        out.push(candidate);
      }
    }
  }
  return out;
}

/** A completed line: the word being completed and what may replace it. */
export interface LineCompletion {
  /** Input before the word being completed. */
  readonly prefix: string;
  /** The partial word at the end of the line (may be empty). */
  readonly partial: string;
  readonly candidates: string[];
}

/**
 * Complete the last word of a raw input line. The text before the word is
 * parsed; when it does not parse in full there is nothing to offer.
 *
 * @example
 * completeLine(grammar, 'show ve')  // { prefix: 'show ', partial: 've', candidates: ['version '] }
 */
export function completeLine(grammar: Grammar, line: string): LineCompletion {
  const last = tokenize(line).at(-1);
  const split = last !== undefined && last.end === line.length ? last.start : line.length;
  const prefix = line.slice(0, split);
  const partial = line.slice(split);

  const context = parse(grammar, prefix);
  if (context.remaining !== '') {
    return { prefix, partial, candidates: [] };
  }
  return { prefix, partial, candidates: complete(grammar, context, partial) };
}

/**
 * A candidate provider that always offers the same words.
 *
 * @example
 * variable('signal', { candidates: staticCandidates('TERM', 'KILL'), matchCandidates: true })
 */
export function staticCandidates(...words: string[]): CandidateProvider {
  const fixed = Object.freeze([...words]);
  return () => fixed;
}

function candidateWords(node: GrammarNode, partial: string, context: ParseContext): Iterable<string> {
  if (node.candidates !== null) return node.candidates(partial, context);
  if (node.pattern === null) return [];
  if (node.literalName) return [node.name];
  return node.pattern.literals ?? [];
}
