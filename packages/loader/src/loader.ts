/**
 * Arbor Loader — Grammar Source Loader
 *
 * Turns a declarative grammar source into a built Grammar:
 *
 *   1. yaml.load()        text → plain data (JSON is valid YAML)
 *   2. schema validation  closed zod schema; all issues reported together
 *   3. registry lookup    callback, candidate and type names → implementations
 *   4. buildGrammar()     declarations → Grammar (alias resolution included)
 *
 * Grammar build errors (GrammarDefinitionError, AliasResolutionError)
 * propagate unchanged from step 4.
 */

import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import {
  action,
  alias,
  buildGrammar,
  group,
  node,
  userAction,
  variable,
  VARIABLE_TYPES,
} from '@arbor/grammar';
import type {
  ActionCallback,
  AttributeOverrides,
  CandidateProvider,
  Grammar,
  Help,
  NodeDecl,
  UserActionCallback,
  VariableType,
} from '@arbor/grammar';
import { LoaderError } from './errors.js';
import type { LoaderIssue } from './errors.js';
import { GrammarSourceSchema } from './schema.js';
import type { RawAction, RawAttributes, RawEntry, RawHelp, RawNode, RawVariable } from './schema.js';

/** Implementations a grammar source may refer to by name. */
export interface LoaderRegistry {
  readonly callbacks?: Readonly<Record<string, ActionCallback>> | undefined;
  /** Callbacks for actions declared with `withUserObject: true`. */
  readonly userCallbacks?: Readonly<Record<string, UserActionCallback>> | undefined;
  readonly candidates?: Readonly<Record<string, CandidateProvider>> | undefined;
  /** Extra variable types. They shadow built-in types of the same name. */
  readonly types?: Readonly<Record<string, VariableType>> | undefined;
}

export interface LoadedGrammar {
  /** The source's `name`, when it declares one. */
  readonly name: string | null;
  readonly description: string | null;
  readonly grammar: Grammar;
}

/**
 * Load a grammar from YAML or JSON text.
 *
 * @param origin - Where the text came from, for error messages
 * @throws {LoaderError} on malformed text, schema violations or unknown names
 */
export function loadGrammar(text: string, registry: LoaderRegistry = {}, origin: string | null = null): LoadedGrammar {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LoaderError([{ path: '', message: `malformed source: ${reason}` }], origin);
  }

  const result = GrammarSourceSchema.safeParse(raw);
  if (!result.success) {
    throw new LoaderError(
      result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      origin,
    );
  }

  const doc = result.data;
  const converter = new DeclarationConverter(registry);
  const decls = converter.convertAll(doc.grammar, 'grammar');
  if (converter.issues.length > 0) {
    throw new LoaderError(converter.issues, origin);
  }

  return {
    name: doc.name ?? null,
    description: doc.description ?? null,
    grammar: buildGrammar(...decls),
  };
}

/**
 * Load a grammar from a `.yaml`, `.yml` or `.json` file.
 *
 * @throws {LoaderError} as for loadGrammar(), or if the file cannot be read
 */
export function loadGrammarFile(path: string, registry: LoaderRegistry = {}): LoadedGrammar {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LoaderError([{ path: '', message: `cannot read file: ${reason}` }], path);
  }
  return loadGrammar(text, registry, path);
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

class DeclarationConverter {
  readonly issues: LoaderIssue[] = [];
  private readonly types: Readonly<Record<string, VariableType>>;

  constructor(private readonly registry: LoaderRegistry) {
    this.types = { ...VARIABLE_TYPES, ...registry.types };
  }

  convertAll(entries: readonly RawEntry[], path: string): NodeDecl[] {
    const decls: NodeDecl[] = [];
    entries.forEach((entry, index) => {
      const decl = this.convert(entry, `${path}.${index}`);
      if (decl !== null) decls.push(decl);
    });
    return decls;
  }

  private convert(entry: RawEntry, path: string): NodeDecl | null {
    switch (entry.kind) {
      case 'alias':
        return alias(entry.target);
      case 'group':
        return group(attributesOf(entry), this.convertAll(entry.children, `${path}.children`));
      case 'node':
        return this.convertNode(entry, path);
      case 'variable':
        return this.convertVariable(entry, path);
      case 'action':
        return this.convertAction(entry, path);
    }
  }

  private convertNode(entry: RawNode, path: string): NodeDecl | null {
    const children = this.convertAll(entry.children ?? [], `${path}.children`);
    const candidates = this.lookup(this.registry.candidates, entry.candidates, 'candidate provider', `${path}.candidates`);
    if (candidates === null) return null;
    return node(
      entry.name,
      { ...attributesOf(entry), pattern: entry.pattern, ignoreCase: entry.ignoreCase, help: helpOf(entry.help), candidates },
      children,
    );
  }

  private convertVariable(entry: RawVariable, path: string): NodeDecl | null {
    const children = this.convertAll(entry.children ?? [], `${path}.children`);
    const candidates = this.lookup(this.registry.candidates, entry.candidates, 'candidate provider', `${path}.candidates`);
    const type = this.lookup(this.types, entry.type, 'variable type', `${path}.type`);
    if (candidates === null || type === null) return null;
    return variable(
      entry.name,
      {
        ...attributesOf(entry),
        pattern: entry.pattern,
        ignoreCase: entry.ignoreCase,
        help: helpOf(entry.help),
        candidates,
        type,
        varName: entry.varName,
      },
      children,
    );
  }

  private convertAction(entry: RawAction, path: string): NodeDecl | null {
    const candidates = this.lookup(this.registry.candidates, entry.candidates, 'candidate provider', `${path}.candidates`);
    if (candidates === null) return null;
    const options = { ...attributesOf(entry), pattern: entry.pattern, ignoreCase: entry.ignoreCase, name: entry.name, candidates };

    if (entry.withUserObject === true) {
      const callback = this.lookup(this.registry.userCallbacks, entry.callback, 'user callback', `${path}.callback`);
      return callback === null || callback === undefined ? null : userAction(helpOf(entry.help), callback, options);
    }
    const callback = this.lookup(this.registry.callbacks, entry.callback, 'callback', `${path}.callback`);
    return callback === null || callback === undefined ? null : action(helpOf(entry.help), callback, options);
  }

  /**
   * Resolve an optional registry name. Returns undefined when no name was
   * given and null (after recording an issue) when the name is unknown.
   */
  private lookup<T>(
    table: Readonly<Record<string, T>> | undefined,
    name: string | undefined,
    what: string,
    path: string,
  ): T | undefined | null {
    if (name === undefined) return undefined;
    const found = table !== undefined && Object.hasOwn(table, name) ? table[name] : undefined;
    if (found === undefined) {
      this.issues.push({ path, message: `unknown ${what} "${name}"` });
      return null;
    }
    return found;
  }
}

function attributesOf(entry: RawAttributes): AttributeOverrides {
  return {
    traversals: entry.traversals,
    matchCandidates: entry.matchCandidates,
    helpGroup: entry.helpGroup,
    helpOrder: entry.helpOrder,
  };
}

function helpOf(help: RawHelp | undefined): Help {
  if (help === undefined) return '';
  if (typeof help === 'string') return help;
  const pairs = help.map(([key, text]) => [key, text] as const);
  return () => pairs;
}
