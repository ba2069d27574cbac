/**
 * Arbor Grammar — Contextual Help
 *
 * Lists what may follow the parsed prefix: one or more (key, text) pairs
 * per eligible child of the frontier. Pairs are ordered by help group,
 * then help order, then declaration order. Help groups only affect display;
 * matching order is always declaration order.
 */

import type { ParseContext } from './context.js';
import { eligibleChildren } from './matcher.js';
import { END_OF_INPUT } from './nodes.js';
import type { GrammarNode, HelpPair } from './types.js';

/** Help pairs of one help group. */
export interface HelpSection {
  readonly group: number;
  readonly pairs: readonly HelpPair[];
}

interface RankedNode {
  readonly node: GrammarNode;
  readonly index: number;
}

/** Ordered help for the frontier of `context`. Help providers run lazily, here. */
export function help(context: ParseContext): HelpPair[] {
  return ranked(context).flatMap(({ node }) => pairsOf(node, context));
}

/** Help grouped into sections by help group, lowest group first. */
export function helpSections(context: ParseContext): HelpSection[] {
  const sections: { group: number; pairs: HelpPair[] }[] = [];
  for (const { node } of ranked(context)) {
    let section = sections.at(-1);
    if (section === undefined || section.group !== node.helpGroup) {
      section = { group: node.helpGroup, pairs: [] };
      sections.push(section);
    }
    section.pairs.push(...pairsOf(node, context));
  }
  return sections.filter((section) => section.pairs.length > 0);
}

/**
 * The key under which a node is listed: its name when matched by name,
 * `<eol>` for an action matching end of input, `<name>` otherwise.
 */
export function helpKey(node: GrammarNode): string {
  if (node.kind === 'action' && node.pattern === null) return END_OF_INPUT;
  if (node.literalName) return node.name;
  return `<${node.name}>`;
}

function ranked(context: ParseContext): RankedNode[] {
  return eligibleChildren(context.grammar, context, context.frontier)
    .map((node, index) => ({ node, index }))
    .sort((a, b) => a.node.helpGroup - b.node.helpGroup || a.node.helpOrder - b.node.helpOrder || a.index - b.index);
}

function pairsOf(node: GrammarNode, context: ParseContext): HelpPair[] {
  if (node.help === null) return [];
  if (typeof node.help === 'string') return [[helpKey(node), node.help]];
  return [...node.help(context)];
}
