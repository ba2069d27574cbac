/**
 * Arbor Grammar — Segment Glob Matching
 *
 * Pure glob-to-regex conversion for alias target segments. A segment is
 * matched against one node name, so no glob here ever crosses `/`.
 *
 * Supported glob syntax:
 * - `*`     matches any character sequence
 * - `?`     matches exactly one character
 * - `[...]` matches one character of the class (`[!...]` or `[^...]` negates)
 * - All other characters are treated as literals
 *
 * This module has no dependencies and no side effects.
 */

/** Thrown by compileGlob() when a character class is unterminated or empty. */
export class GlobSyntaxError extends Error {
  constructor(message: string, public readonly glob: string) {
    super(`${message} in glob "${glob}"`);
    this.name = 'GlobSyntaxError';
  }
}

/** True when the segment contains glob metacharacters. */
export function isGlob(segment: string): boolean {
  return /[*?[]/.test(segment);
}

/**
 * Compile a segment glob into an anchored regular expression.
 *
 * @example
 * compileGlob('eth*').test('eth0')   // true
 * compileGlob('v?').test('v1')       // true
 * compileGlob('[ab]x').test('cx')    // false
 */
export function compileGlob(glob: string): RegExp {
  let regexStr = '';
  for (let i = 0; i < glob.length; i++) {
    const ch = glob.charAt(i);
    if (ch === '*') {
      regexStr += '.*';
    } else if (ch === '?') {
      regexStr += '.';
    } else if (ch === '[') {
      const close = glob.indexOf(']', i + 2);
      if (close === -1) {
        throw new GlobSyntaxError('unterminated character class', glob);
      }
      regexStr += characterClass(glob.slice(i + 1, close), glob);
      i = close;
    } else {
      regexStr += ch.replace(/[.+?^${}()|[\]\\*]/g, '\\$&');
    }
  }
  return new RegExp(`^${regexStr}$`);
}

/** Test whether a node name satisfies a segment glob. */
export function matchesGlob(glob: string, name: string): boolean {
  return compileGlob(glob).test(name);
}

function characterClass(body: string, glob: string): string {
  let negate = false;
  let members = body;
  if (members.startsWith('!') || members.startsWith('^')) {
    negate = true;
    members = members.slice(1);
  }
  if (members === '') {
    throw new GlobSyntaxError('empty character class', glob);
  }
  // Only `-` keeps its meaning inside the class; everything else is literal.
  const escaped = members.replace(/[\\\]^[]/g, '\\$&');
  return `[${negate ? '^' : ''}${escaped}]`;
}
