/**
 * Arbor Grammar — Tokenizer
 *
 * Splits input into whitespace-separated tokens with exact offsets. A token
 * that starts with `"` or `'` runs to the matching unescaped closing quote,
 * so quoted strings may contain whitespace; an unterminated quote runs to
 * the end of the input. Quotes are kept in the token text: unquoting is the
 * job of the variable type that accepts it.
 */

export interface Token {
  /** Raw token text, quotes included. */
  readonly text: string;
  /** Offset of the first character of the token. */
  readonly start: number;
  /** Offset just past the token. */
  readonly end: number;
  /** Offset just past the whitespace that follows the token. */
  readonly next: number;
}

const WHITESPACE = /\s/;

/** Offset of the first non-whitespace character at or after `from`. */
export function skipWhitespace(input: string, from: number): number {
  let i = from;
  while (i < input.length && WHITESPACE.test(input.charAt(i))) i++;
  return i;
}

/**
 * Scan the token starting at `start`, or return null when only whitespace
 * remains.
 */
export function readToken(input: string, start: number): Token | null {
  const begin = skipWhitespace(input, start);
  if (begin >= input.length) return null;

  const quote = input.charAt(begin);
  let end = begin;
  if (quote === '"' || quote === "'") {
    end = begin + 1;
    while (end < input.length) {
      const ch = input.charAt(end);
      if (ch === '\\') {
        end += 2;
        continue;
      }
      end++;
      if (ch === quote) break;
    }
    end = Math.min(end, input.length);
    // A closing quote glued to more text keeps going until whitespace.
    while (end < input.length && !WHITESPACE.test(input.charAt(end))) end++;
  } else {
    while (end < input.length && !WHITESPACE.test(input.charAt(end))) end++;
  }

  return { text: input.slice(begin, end), start: begin, end, next: skipWhitespace(input, end) };
}

/** Every token of the input, in order. */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let token = readToken(input, 0);
  while (token !== null) {
    tokens.push(token);
    token = readToken(input, token.next);
  }
  return tokens;
}
