/**
 * Arbor Grammar — Core Type Definitions
 *
 * Types shared by the node model, the resolved grammar arena, the matcher
 * and the completion/help/dispatch layers.
 *
 * Two node families exist:
 * - Declarations (nodes.ts): what a grammar author writes. Immutable
 *   plain data, including alias and group directives.
 * - Resolved nodes (this module): what a built Grammar contains. Only
 *   root, routing, variable and action nodes survive resolution; groups are
 *   flattened into their parent and aliases become extra child edges.
 */

import type { ParseContext } from './context.js';

// ---------------------------------------------------------------------------
// Help and candidates
// ---------------------------------------------------------------------------

/** A help entry: the key shown to the user and its description. */
export type HelpPair = readonly [key: string, text: string];

/**
 * Lazily evaluated help. Called each time help is requested for the
 * context in which the node is offered.
 */
export type HelpProvider = (context: ParseContext) => Iterable<HelpPair>;

/** A literal help string, or a provider of ordered (key, text) pairs. */
export type Help = string | HelpProvider;

/**
 * Produces completion words for a node. `partial` is the text typed so far
 * for the token being completed (or the full token when matching with
 * `matchCandidates`). Providers must be cheap and free of side effects.
 */
export type CandidateProvider = (partial: string, context: ParseContext) => Iterable<string>;

// ---------------------------------------------------------------------------
// Variable types
// ---------------------------------------------------------------------------

/**
 * A typed variable capability: the token pattern it accepts and the
 * conversion from matched text to value. A parse hook signals rejection by
 * throwing.
 */
export interface VariableType<T = unknown> {
  readonly name: string;
  readonly pattern: RegExp;
  parse(raw: string): T;
  readonly candidates?: CandidateProvider | undefined;
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

/** Collected variables, keyed by variable name. */
export type VarMap = Readonly<Record<string, unknown>>;

/** An action callback. Receives the collected variables as named arguments. */
export type ActionCallback = (vars: VarMap) => unknown;

/**
 * An action callback bound with a user object, which is passed first. The
 * engine does not know the object's type; the callback narrows it.
 */
export type UserActionCallback = (user: unknown, vars: VarMap) => unknown;

/** How an action's callback is invoked. */
export type ActionBinding =
  | { readonly withUserObject: false; readonly callback: ActionCallback }
  | { readonly withUserObject: true; readonly callback: UserActionCallback };

// ---------------------------------------------------------------------------
// Attributes
// ---------------------------------------------------------------------------

/**
 * Attributes that resolve by precedence:
 * explicit setting > nearest group override > type-level default.
 */
export interface NodeAttributes {
  /** Maximum entries per parse run. 0 means unlimited. */
  readonly traversals: number;
  /** Accept only tokens equal to one of the node's completion candidates. */
  readonly matchCandidates: boolean;
  /** Help section. Lower groups are listed first. */
  readonly helpGroup: number;
  /** Ordering within a help section. Ties keep declaration order. */
  readonly helpOrder: number;
}

export type AttributeOverrides = { readonly [K in keyof NodeAttributes]?: NodeAttributes[K] | undefined };

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

/** A validated node pattern, anchored for whole-token matching. */
export interface CompiledPattern {
  readonly source: string;
  readonly flags: string;
  readonly regex: RegExp;
  /** Every literal the pattern accepts, when it denotes a finite choice. */
  readonly literals: readonly string[] | null;
}

// ---------------------------------------------------------------------------
// Resolved nodes
// ---------------------------------------------------------------------------

interface ResolvedNodeBase extends NodeAttributes {
  /** Stable arena index. Traversal counts key off this, never the path. */
  readonly id: number;
  readonly name: string;
  /** Canonical declared path, e.g. `/interface/shutdown`. */
  readonly path: string;
  /** Non-owning back-reference into the same arena. */
  readonly parentId: number | null;
  /** Declared children and alias-attached nodes, in tie-break order. */
  readonly childIds: readonly number[];
  readonly help: Help | null;
  /** Null for the root and for actions that match end of input. */
  readonly pattern: CompiledPattern | null;
  /** True when the pattern was derived from the name. */
  readonly literalName: boolean;
  readonly candidates: CandidateProvider | null;
}

export interface RootNode extends ResolvedNodeBase {
  readonly kind: 'root';
}

export interface RoutingNode extends ResolvedNodeBase {
  readonly kind: 'routing';
}

export interface VariableNode extends ResolvedNodeBase {
  readonly kind: 'variable';
  readonly varName: string;
  readonly typeName: string;
  readonly parseValue: (raw: string) => unknown;
}

export interface ActionNode extends ResolvedNodeBase {
  readonly kind: 'action';
  readonly binding: ActionBinding;
}

export type GrammarNode = RootNode | RoutingNode | VariableNode | ActionNode;
