/**
 * Arbor Grammar — Node Declarations
 *
 * The declaration API a grammar author uses. Each factory validates its
 * input and returns immutable plain data; buildGrammar() (grammar.ts) turns
 * a forest of declarations into a resolved, immutable Grammar.
 *
 *   buildGrammar(
 *     node('show', { help: 'Show system state' }, [
 *       node('version', { help: 'Software version' }, [action('Show version', showVersion)]),
 *       variable('count', { type: integer, help: 'Lines to show' }, [alias('.')]),
 *     ]),
 *   )
 *
 * Variants form a closed union. Custom behavior enters through the small
 * set of hooks on the options (a variable type's `parse`, a candidate
 * provider, a help provider), never through subclassing.
 */

import { GrammarDefinitionError } from './errors.js';
import { compilePattern, escapePattern } from './patterns.js';
import type {
  ActionBinding,
  ActionCallback,
  AttributeOverrides,
  CandidateProvider,
  CompiledPattern,
  Help,
  UserActionCallback,
  VariableType,
} from './types.js';

// ---------------------------------------------------------------------------
// Declaration types
// ---------------------------------------------------------------------------

interface NamedDecl {
  readonly name: string;
  readonly help: Help;
  readonly pattern: CompiledPattern | null;
  readonly literalName: boolean;
  readonly candidates: CandidateProvider | null;
  /** Only the attributes set explicitly on this node. */
  readonly attributes: AttributeOverrides;
  readonly children: readonly NodeDecl[];
}

/** A plain routing node: matches a keyword and leads to its children. */
export interface RoutingDecl extends NamedDecl {
  readonly kind: 'routing';
}

/** Stores a typed value derived from the matched token. */
export interface VariableDecl extends NamedDecl {
  readonly kind: 'variable';
  readonly varName: string;
  readonly typeName: string;
  readonly parseValue: (raw: string) => unknown;
}

/** A terminal node whose callback runs when the command ends on it. */
export interface ActionDecl extends NamedDecl {
  readonly kind: 'action';
  readonly binding: ActionBinding;
}

/** Attaches the node(s) addressed by `target` at this position. */
export interface AliasDecl {
  readonly kind: 'alias';
  readonly target: string;
}

/** Transparent container applying attribute overrides to its descendants. */
export interface GroupDecl {
  readonly kind: 'group';
  readonly overrides: AttributeOverrides;
  readonly children: readonly NodeDecl[];
}

export type NodeDecl = RoutingDecl | VariableDecl | ActionDecl | AliasDecl | GroupDecl;

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface NodeOptions extends AttributeOverrides {
  readonly help?: Help | undefined;
  /** Defaults to the escaped node name. */
  readonly pattern?: string | RegExp | undefined;
  /** Match the pattern, explicit or default, regardless of case. */
  readonly ignoreCase?: boolean | undefined;
  readonly candidates?: CandidateProvider | undefined;
}

export interface VariableOptions extends NodeOptions {
  /** Typed capability supplying the default pattern, parse hook and candidates. */
  readonly type?: VariableType | undefined;
  /** Parse hook; overrides the type's. */
  readonly parse?: ((raw: string) => unknown) | undefined;
  /** Key under which values are stored. Defaults to the node name. */
  readonly varName?: string | undefined;
}

export interface ActionOptions extends AttributeOverrides {
  /** Defaults to `<eol>`. */
  readonly name?: string | undefined;
  /** When set, the action consumes a token matching it instead of end of input. */
  readonly pattern?: string | RegExp | undefined;
  readonly ignoreCase?: boolean | undefined;
  readonly candidates?: CandidateProvider | undefined;
}

/** The default name of an action, which matches end of input. */
export const END_OF_INPUT = '<eol>';

/** Pattern used by variables that declare neither a type nor a pattern. */
const DEFAULT_VARIABLE_PATTERN = /\w+/;

const NAME_SYNTAX = /^[^\s/]+$/;

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/**
 * Declare a routing node.
 *
 * @throws {GrammarDefinitionError} on an invalid name, pattern, attribute
 *   or a sibling name collision among `children`
 */
export function node(name: string, options: NodeOptions = {}, children: readonly NodeDecl[] = []): RoutingDecl {
  checkName(name);
  const explicit = options.pattern !== undefined;
  return freezeDecl({
    kind: 'routing',
    name,
    help: checkHelp(options.help ?? '', name),
    pattern: compilePattern(options.pattern ?? escapePattern(name), name, options.ignoreCase),
    literalName: !explicit,
    candidates: options.candidates ?? null,
    attributes: pickAttributes(options, name),
    children: checkChildren(children, name),
  });
}

/**
 * Declare a variable node.
 *
 * Pattern precedence: explicit `pattern` > the type's pattern > `\w+`.
 * Parse precedence: explicit `parse` > the type's parse > identity.
 */
export function variable(
  name: string,
  options: VariableOptions = {},
  children: readonly NodeDecl[] = [],
): VariableDecl {
  checkName(name);
  const type = options.type;
  const varName = options.varName ?? name;
  checkName(varName);
  const parseValue = options.parse ?? (type === undefined ? (raw: string): unknown => raw : (raw: string): unknown => type.parse(raw));
  return freezeDecl({
    kind: 'variable',
    name,
    help: checkHelp(options.help ?? '', name),
    pattern: compilePattern(options.pattern ?? type?.pattern ?? DEFAULT_VARIABLE_PATTERN, name, options.ignoreCase),
    literalName: false,
    candidates: options.candidates ?? type?.candidates ?? null,
    attributes: pickAttributes(options, name),
    children: checkChildren(children, name),
    varName,
    typeName: type?.name ?? 'custom',
    parseValue,
  });
}

/**
 * Declare an action whose callback receives the collected variables.
 */
export function action(help: Help, callback: ActionCallback, options: ActionOptions = {}): ActionDecl {
  return actionDecl(help, { withUserObject: false, callback }, options);
}

/**
 * Declare an action whose callback also receives the caller's user object,
 * passed first. Executing it without a user object throws
 * UserObjectRequiredError.
 */
export function userAction(help: Help, callback: UserActionCallback, options: ActionOptions = {}): ActionDecl {
  return actionDecl(help, { withUserObject: true, callback }, options);
}

function actionDecl(help: Help, binding: ActionBinding, options: ActionOptions): ActionDecl {
  const name = options.name ?? END_OF_INPUT;
  checkName(name);
  if (typeof binding.callback !== 'function') {
    throw new GrammarDefinitionError('action callback must be a function', name);
  }
  const pattern = options.pattern === undefined || options.pattern === ''
    ? null
    : compilePattern(options.pattern, name, options.ignoreCase);
  return freezeDecl({
    kind: 'action',
    name,
    help: checkHelp(help, name),
    pattern,
    literalName: false,
    candidates: options.candidates ?? null,
    attributes: pickAttributes(options, name),
    children: [],
    binding,
  });
}

/**
 * Attach the node(s) at `target` here. Absolute paths start at the root;
 * relative paths start at the alias's parent (`.` is the parent itself).
 * Segments may be globs (`*`, `?`, `[...]`).
 */
export function alias(target: string): AliasDecl {
  if (typeof target !== 'string' || target.trim() === '') {
    throw new GrammarDefinitionError('alias target must be a non-empty path');
  }
  return Object.freeze({ kind: 'alias', target });
}

/**
 * Apply attribute overrides to every node declared beneath the group.
 * The group itself is transparent: its children behave as children of the
 * group's parent.
 */
export function group(overrides: AttributeOverrides, children: readonly NodeDecl[]): GroupDecl {
  return Object.freeze({
    kind: 'group',
    overrides: pickAttributes(overrides, '(group)'),
    children: checkChildren(children, '(group)'),
  });
}

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

function checkName(name: string): void {
  if (typeof name !== 'string' || !NAME_SYNTAX.test(name)) {
    throw new GrammarDefinitionError(`invalid node name "${String(name)}": must be non-empty without whitespace or "/"`);
  }
}

function checkHelp(help: Help, where: string): Help {
  if (typeof help !== 'string' && typeof help !== 'function') {
    throw new GrammarDefinitionError('help must be a string or a help provider', where);
  }
  return help;
}

function pickAttributes(source: AttributeOverrides, where: string): AttributeOverrides {
  const { traversals, matchCandidates, helpGroup, helpOrder } = source;
  if (traversals !== undefined && (!Number.isInteger(traversals) || traversals < 0)) {
    throw new GrammarDefinitionError(`traversals must be a non-negative integer, got ${String(traversals)}`, where);
  }
  if (helpGroup !== undefined && !Number.isInteger(helpGroup)) {
    throw new GrammarDefinitionError(`helpGroup must be an integer, got ${String(helpGroup)}`, where);
  }
  if (helpOrder !== undefined && !Number.isInteger(helpOrder)) {
    throw new GrammarDefinitionError(`helpOrder must be an integer, got ${String(helpOrder)}`, where);
  }
  if (matchCandidates !== undefined && typeof matchCandidates !== 'boolean') {
    throw new GrammarDefinitionError('matchCandidates must be a boolean', where);
  }
  const attributes: { -readonly [K in keyof AttributeOverrides]: AttributeOverrides[K] } = {};
  if (traversals !== undefined) attributes.traversals = traversals;
  if (matchCandidates !== undefined) attributes.matchCandidates = matchCandidates;
  if (helpGroup !== undefined) attributes.helpGroup = helpGroup;
  if (helpOrder !== undefined) attributes.helpOrder = helpOrder;
  return Object.freeze(attributes);
}

/**
 * Reject sibling name collisions. Groups are transparent, so names declared
 * inside a group are siblings of the group's own siblings.
 */
function checkChildren(children: readonly NodeDecl[], where: string): readonly NodeDecl[] {
  const seen = new Set<string>();
  for (const name of siblingNames(children)) {
    if (seen.has(name)) {
      throw new GrammarDefinitionError(`duplicate child name "${name}"`, where);
    }
    seen.add(name);
  }
  return Object.freeze([...children]);
}

/** Names of the declarations that become direct children, groups flattened. */
export function* siblingNames(children: readonly NodeDecl[]): Generator<string> {
  for (const child of children) {
    if (child.kind === 'group') {
      yield* siblingNames(child.children);
    } else if (child.kind !== 'alias') {
      yield child.name;
    }
  }
}

function freezeDecl<T extends RoutingDecl | VariableDecl | ActionDecl>(decl: T): T {
  return Object.freeze(decl);
}
