/**
 * Arbor Grammar — Variable Types
 *
 * The built-in typed capabilities a variable may declare. Each supplies the
 * token pattern and the conversion from matched text to value; a conversion
 * rejects its input by throwing.
 *
 *   variable('count', { type: integer })          // vars.count === 42
 *   variable('peer',  { type: host })             // [10, 0, 0, 1] or ['db', 'local']
 */

import { staticCandidates } from './completion.js';
import type { VariableType } from './types.js';

/** An identifier: a letter or underscore followed by word characters. */
export const word: VariableType<string> = {
  name: 'word',
  pattern: /[A-Za-z_]\w*/,
  parse: (raw) => raw,
};

/** A bare word or a single- or double-quoted string. The value is unquoted. */
export const string: VariableType<string> = {
  name: 'string',
  pattern: /\w+|"[^"\\]*(?:\\.[^"\\]*)*"|'[^'\\]*(?:\\.[^'\\]*)*'/,
  parse: unquote,
};

export const integer: VariableType<number> = {
  name: 'integer',
  pattern: /\d+/,
  parse: (raw) => {
    const value = Number.parseInt(raw, 10);
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`${raw} is out of range`);
    }
    return value;
  },
};

export const float: VariableType<number> = {
  name: 'float',
  pattern: /[-+]?[0-9]*\.?[0-9]+(?:[eE][-+]?[0-9]+)?/,
  parse: (raw) => Number.parseFloat(raw),
};

const TRUE_WORDS = ['true', 'yes', 'aye', 'enable', 'enabled', 'on', '1'];
const FALSE_WORDS = ['false', 'no', 'disable', 'disabled', 'off', '0'];

/** One of the usual yes/no spellings, case-insensitive. */
export const boolean: VariableType<boolean> = {
  name: 'boolean',
  pattern: new RegExp([...TRUE_WORDS, ...FALSE_WORDS].join('|'), 'i'),
  parse: (raw) => TRUE_WORDS.includes(raw.toLowerCase()),
  candidates: staticCandidates('true', 'false'),
};

const OCTET = '(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)';

/** An IPv4 address, parsed into its four octets. */
export const ip: VariableType<readonly number[]> = {
  name: 'ip',
  pattern: new RegExp(`${OCTET}\\.${OCTET}\\.${OCTET}\\.${OCTET}`),
  parse: (raw) => Object.freeze(raw.split('.').map((octet) => Number.parseInt(octet, 10))),
};

const LABEL = '[A-Za-z0-9][A-Za-z0-9_-]*';

/** A dotted hostname, parsed into its labels. Purely numeric names match too. */
export const hostname: VariableType<readonly string[]> = {
  name: 'hostname',
  pattern: new RegExp(`${LABEL}(?:\\.${LABEL})*`),
  parse: (raw) => Object.freeze(raw.split('.')),
};

/** An IPv4 address (octets as numbers) or a hostname (labels as strings). */
export const host: VariableType<readonly number[] | readonly string[]> = {
  name: 'host',
  pattern: new RegExp(`${ip.pattern.source}|${hostname.pattern.source}`),
  parse: (raw) => (anchored(ip.pattern).test(raw) ? ip.parse(raw) : hostname.parse(raw)),
};

export const email: VariableType<string> = {
  name: 'email',
  pattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/,
  parse: (raw) => raw,
};

const URI_CHARS = "[0-9A-Za-z;/?:@&=+$.\\-_!~*'()%]+";

/** A URI with optional scheme and fragment. The value is the text itself. */
export const uri: VariableType<string> = {
  name: 'uri',
  pattern: new RegExp(`(?:[A-Za-z][0-9A-Za-z+.-]*:)?/{0,2}${URI_CHARS}(?:#${URI_CHARS})?`),
  parse: (raw) => raw,
};

/** An LDAP distinguished name such as `cn=admin,dc=example,dc=org`. */
export const ldapdn: VariableType<string> = {
  name: 'ldapdn',
  pattern: /\w+=\w+(?:,\w+=\w+)*/,
  parse: (raw) => raw,
};

/** Every built-in type, keyed by name. */
export const VARIABLE_TYPES: Readonly<Record<string, VariableType>> = Object.freeze({
  word,
  string,
  integer,
  float,
  boolean,
  ip,
  hostname,
  host,
  email,
  uri,
  ldapdn,
});

function anchored(pattern: RegExp): RegExp {
  return new RegExp(`^(?:${pattern.source})$`, pattern.flags);
}

const ESCAPES: Readonly<Record<string, string>> = { n: '\n', t: '\t', r: '\r', '0': '\0' };

/** Strip matching quotes and resolve backslash escapes. Bare words pass through. */
function unquote(raw: string): string {
  const quote = raw.charAt(0);
  if ((quote !== '"' && quote !== "'") || raw.length < 2 || !raw.endsWith(quote)) {
    return raw;
  }
  return raw.slice(1, -1).replace(/\\(.)/g, (_match, ch: string) => ESCAPES[ch] ?? ch);
}
