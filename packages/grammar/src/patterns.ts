/**
 * Arbor Grammar — Pattern Compilation
 *
 * Node patterns are regular expressions matched against one whole token.
 * compilePattern() validates a pattern and anchors it; literalAlternatives()
 * recovers the finite set of words a pattern accepts (`start|stop`,
 * `(?:on|off)`, `show`) so that completion can offer them.
 */

import { GrammarDefinitionError } from './errors.js';
import type { CompiledPattern } from './types.js';

/** Regular expression metacharacters. */
const META = new Set(['\\', '^', '$', '.', '|', '?', '*', '+', '(', ')', '[', ']', '{', '}']);

/** Escapes that stand for the character itself. */
const LITERAL_ESCAPES = new Set([...META, '/', '-', ' ', '"', "'", ',', ':', '=', '@', '#', '%', '&', '!', '<', '>', '~']);

/** Escape text so that it matches itself literally. */
export function escapePattern(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Validate and anchor a pattern. The global and sticky flags are dropped:
 * matching is always a whole-token test.
 *
 * @param pattern - Regular expression source or RegExp
 * @param where - Node path used in the error message
 * @param ignoreCase - Add the `i` flag if the pattern lacks it
 * @throws {GrammarDefinitionError} if the pattern does not compile or
 *   would match an empty token
 */
export function compilePattern(pattern: string | RegExp, where: string, ignoreCase = false): CompiledPattern {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  const declared = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
  const flags = ignoreCase && !declared.includes('i') ? `${declared}i` : declared;

  let regex: RegExp;
  try {
    // Compile unanchored first so that a source such as `a)|(b` cannot
    // escape the anchoring group.
    new RegExp(source, flags);
    regex = new RegExp(`^(?:${source})$`, flags);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GrammarDefinitionError(`invalid pattern /${source}/: ${reason}`, where);
  }

  if (regex.test('')) {
    throw new GrammarDefinitionError(`pattern /${source}/ matches an empty token`, where);
  }

  return { source, flags, regex, literals: literalAlternatives(source) };
}

/**
 * The literal words a pattern accepts, or null when the pattern is not a
 * plain alternation of literals.
 *
 * @example
 * literalAlternatives('start|stop')   // ['start', 'stop']
 * literalAlternatives('(?:on|off)')   // ['on', 'off']
 * literalAlternatives('\\d+')         // null
 */
export function literalAlternatives(source: string): readonly string[] | null {
  const body = stripOuterGroup(source);
  const literals: string[] = [];
  for (const alternative of splitAlternatives(body)) {
    const literal = unescapeLiteral(alternative);
    if (literal === null || literal === '') return null;
    if (!literals.includes(literal)) literals.push(literal);
  }
  return literals;
}

function stripOuterGroup(source: string): string {
  if (!source.startsWith('(') || !source.endsWith(')')) return source;
  let depth = 0;
  let inClass = false;
  for (let i = 0; i < source.length; i++) {
    const ch = source.charAt(i);
    if (ch === '\\') {
      i++;
      continue;
    }
    if (inClass) {
      if (ch === ']') inClass = false;
      continue;
    }
    if (ch === '[') {
      inClass = true;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      // The first group closes before the end: `(a)|(b)` is not one group.
      if (depth === 0 && i !== source.length - 1) return source;
    }
  }
  if (source.startsWith('(?:')) return source.slice(3, -1);
  if (source.startsWith('(?')) return source;
  return source.slice(1, -1);
}

function splitAlternatives(body: string): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch === '\\') {
      current += ch + body.charAt(i + 1);
      i++;
    } else if (ch === '|') {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

function unescapeLiteral(text: string): string | null {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === '\\') {
      const next = text.charAt(i + 1);
      if (!LITERAL_ESCAPES.has(next)) return null;
      out += next;
      i++;
      continue;
    }
    if (META.has(ch)) return null;
    out += ch;
  }
  return out;
}
