/**
 * Arbor Grammar — Grammar Build & Alias Resolution
 *
 * buildGrammar() turns a forest of declarations into an immutable arena of
 * resolved nodes. The build runs in two passes:
 *
 * 1. Allocation: every routing, variable and action declaration receives a
 *    stable numeric id, its canonical path and its effective attributes.
 *    Groups are flattened into their parent, applying their overrides to
 *    every node declared beneath them. Aliases are left in place as
 *    unresolved entries of their parent's child list.
 *
 * 2. Resolution: each child list is resolved on demand. An alias entry is
 *    replaced by the node(s) its target path addresses, in the alias's
 *    position. Walking a path may require other child lists, and with them
 *    the expansion of other aliases. An alias walking through its own
 *    parent sees that list without itself; needing any other alias that is
 *    still being expanded is a cycle. Resolved sibling names stay unique.
 *
 * Aliases never copy subtrees: an aliased node is the same arena entry
 * wherever it is reached from, so traversal accounting (keyed by id) is
 * shared across every path to it.
 *
 * Any failure throws; no partially usable Grammar is ever returned.
 */

import { AliasResolutionError, GrammarDefinitionError } from './errors.js';
import { compileGlob, GlobSyntaxError, isGlob } from './glob.js';
import type { ActionDecl, NodeDecl, RoutingDecl, VariableDecl } from './nodes.js';
import { siblingNames } from './nodes.js';
import type {
  ActionNode,
  AttributeOverrides,
  GrammarNode,
  NodeAttributes,
  RootNode,
  RoutingNode,
  VariableNode,
} from './types.js';

/** Kind-level attribute defaults. */
const DEFAULT_ATTRIBUTES: NodeAttributes = {
  traversals: 1,
  matchCandidates: false,
  helpGroup: 0,
  helpOrder: 0,
};

/** Actions are listed after everything else in help. */
const ACTION_HELP_GROUP = 9999;

const ROOT_ID = 0;

// ---------------------------------------------------------------------------
// Build drafts
// ---------------------------------------------------------------------------

type NamedDecl = RoutingDecl | VariableDecl | ActionDecl;

interface AliasEntry {
  readonly kind: 'alias';
  readonly ownerId: number;
  readonly target: string;
}

type DraftEntry = { readonly kind: 'node'; readonly id: number } | AliasEntry;

interface Draft {
  readonly id: number;
  readonly decl: NamedDecl | null;
  readonly name: string;
  readonly path: string;
  readonly parentId: number | null;
  readonly attributes: NodeAttributes;
  readonly entries: DraftEntry[];
}

// ---------------------------------------------------------------------------
// Grammar
// ---------------------------------------------------------------------------

/**
 * An immutable, resolved grammar. Safe to share across any number of
 * concurrent parse runs: all per-parse state lives in a Context.
 */
export class Grammar {
  private readonly byPath: ReadonlyMap<string, number>;

  private constructor(private readonly nodes: readonly GrammarNode[]) {
    this.byPath = new Map(nodes.map((n) => [n.path, n.id]));
    Object.freeze(this);
  }

  /**
   * Build a grammar whose root has the given top-level children.
   *
   * @throws {GrammarDefinitionError} on duplicate names or a declaration
   *   used more than once
   * @throws {AliasResolutionError} if any alias fails to resolve
   */
  static build(...children: NodeDecl[]): Grammar {
    return new Grammar(new GrammarBuilder(children).build());
  }

  /** The root node. It has no pattern and no parent. */
  get root(): RootNode {
    const root = this.node(ROOT_ID);
    if (root.kind !== 'root') {
      throw new Error('grammar arena is corrupt: entry 0 is not the root');
    }
    return root;
  }

  /** Number of resolved nodes, including the root. */
  get size(): number {
    return this.nodes.length;
  }

  /**
   * The node with the given arena id.
   *
   * @throws {RangeError} if the id does not belong to this grammar
   */
  node(id: number): GrammarNode {
    const found = this.nodes[id];
    if (found === undefined) {
      throw new RangeError(`no node with id ${id}`);
    }
    return found;
  }

  /** The resolved children of a node, alias-attached nodes included. */
  children(node: GrammarNode): GrammarNode[] {
    return node.childIds.map((id) => this.node(id));
  }

  /**
   * Look a node up by path. Canonical paths are found directly; any other
   * absolute path is followed through resolved child edges, so a node
   * attached by an alias is found under the alias's parent as well.
   */
  find(path: string): GrammarNode | undefined {
    const canonical = this.byPath.get(path);
    if (canonical !== undefined) return this.node(canonical);
    if (!path.startsWith('/')) return undefined;

    let current: GrammarNode = this.root;
    for (const segment of path.slice(1).split('/')) {
      const next: GrammarNode | undefined = this.children(current).find((child) => child.name === segment);
      if (next === undefined) return undefined;
      current = next;
    }
    return current;
  }

  /** Every node in arena order (root first, then declaration order, depth first). */
  *walk(): Generator<GrammarNode> {
    yield* this.nodes;
  }
}

/** Build a grammar from top-level declarations. See Grammar.build(). */
export function buildGrammar(...children: NodeDecl[]): Grammar {
  return Grammar.build(...children);
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

class GrammarBuilder {
  private readonly drafts: Draft[] = [];
  private readonly seen = new Set<NodeDecl>();
  private readonly resolved = new Map<number, readonly number[]>();
  private readonly expanded = new Map<AliasEntry, readonly number[]>();
  private readonly expanding: AliasEntry[] = [];

  constructor(private readonly children: readonly NodeDecl[]) {}

  build(): GrammarNode[] {
    this.checkSiblings(this.children, '/');
    const root: Draft = {
      id: ROOT_ID,
      decl: null,
      name: '',
      path: '/',
      parentId: null,
      attributes: DEFAULT_ATTRIBUTES,
      entries: [],
    };
    this.drafts.push(root);
    this.allocate(this.children, root, {});

    for (const draft of this.drafts) {
      this.resolveChildren(draft.id);
    }
    return this.drafts.map((draft) => this.freeze(draft));
  }

  // -------------------------------------------------------------------------
  // Pass 1: allocation
  // -------------------------------------------------------------------------

  private allocate(decls: readonly NodeDecl[], parent: Draft, inherited: AttributeOverrides): void {
    for (const decl of decls) {
      switch (decl.kind) {
        case 'group':
          this.allocate(decl.children, parent, { ...inherited, ...defined(decl.overrides) });
          break;
        case 'alias':
          parent.entries.push({ kind: 'alias', ownerId: parent.id, target: decl.target });
          break;
        default: {
          const path = parent.parentId === null ? `/${decl.name}` : `${parent.path}/${decl.name}`;
          if (this.seen.has(decl)) {
            throw new GrammarDefinitionError('declaration is used more than once; use an alias to share it', path);
          }
          this.seen.add(decl);
          const draft: Draft = {
            id: this.drafts.length,
            decl,
            name: decl.name,
            path,
            parentId: parent.id,
            attributes: effectiveAttributes(decl, inherited),
            entries: [],
          };
          this.drafts.push(draft);
          parent.entries.push({ kind: 'node', id: draft.id });
          this.allocate(decl.children, draft, inherited);
        }
      }
    }
  }

  private checkSiblings(decls: readonly NodeDecl[], where: string): void {
    const names = new Set<string>();
    for (const name of siblingNames(decls)) {
      if (names.has(name)) {
        throw new GrammarDefinitionError(`duplicate child name "${name}"`, where);
      }
      names.add(name);
    }
  }

  // -------------------------------------------------------------------------
  // Pass 2: alias resolution
  // -------------------------------------------------------------------------

  private draft(id: number): Draft {
    const found = this.drafts[id];
    if (found === undefined) {
      throw new RangeError(`no draft with id ${id}`);
    }
    return found;
  }

  /**
   * The resolved child list of a node. While one of the node's own aliases
   * is being expanded the list is returned without it, and not cached.
   */
  private resolveChildren(id: number): readonly number[] {
    const done = this.resolved.get(id);
    if (done !== undefined) return done;

    const owner = this.draft(id);
    const current = this.expanding[this.expanding.length - 1];
    const childIds: number[] = [];
    const sources = new Map<string, string | null>();
    let partial = false;

    const attach = (childId: number, target: string | null): void => {
      if (childIds.includes(childId)) return;
      const name = this.draft(childId).name;
      const earlier = sources.get(name);
      if (earlier !== undefined) {
        const culprit = target ?? earlier;
        if (culprit === null) throw new GrammarDefinitionError(`duplicate child name "${name}"`, owner.path);
        throw new AliasResolutionError(`"${name}" is already a child of ${owner.path}`, aliasPath(owner), culprit);
      }
      sources.set(name, target);
      childIds.push(childId);
    };

    for (const entry of owner.entries) {
      if (entry.kind === 'node') {
        attach(entry.id, null);
      } else if (entry === current) {
        partial = true;
      } else {
        for (const childId of this.expand(entry)) attach(childId, entry.target);
      }
    }
    if (!partial) this.resolved.set(id, childIds);
    return childIds;
  }

  private expand(entry: AliasEntry): readonly number[] {
    const done = this.expanded.get(entry);
    if (done !== undefined) return done;

    const owner = this.draft(entry.ownerId);
    const waiting = this.expanding[this.expanding.length - 1];
    if (waiting !== undefined && this.expanding.includes(entry)) {
      throw new AliasResolutionError(
        `resolution cycle through ${owner.path}`,
        aliasPath(this.draft(waiting.ownerId)),
        waiting.target,
      );
    }

    this.expanding.push(entry);
    const ids = this.resolveAlias(owner, entry.target);
    this.expanding.pop();
    this.expanded.set(entry, ids);
    return ids;
  }

  /** Resolve an alias declared among `owner`'s children to the ids it attaches. */
  private resolveAlias(owner: Draft, target: string): number[] {
    const fail = (message: string): AliasResolutionError =>
      new AliasResolutionError(message, aliasPath(owner), target);

    const absolute = target.startsWith('/');
    const body = absolute ? target.slice(1) : target;
    if (body === '') {
      throw fail(absolute ? 'the root cannot be an alias target' : 'empty path');
    }

    let current: number[] = [absolute ? ROOT_ID : owner.id];
    for (const segment of body.split('/')) {
      if (segment === '') throw fail('empty path segment');

      const next: number[] = [];
      const add = (id: number): void => {
        if (!next.includes(id)) next.push(id);
      };

      if (segment === '.') {
        current.forEach(add);
      } else if (segment === '..') {
        for (const id of current) {
          const parentId = this.draft(id).parentId;
          if (parentId === null) throw fail('".." above the root');
          add(parentId);
        }
      } else {
        const matches = segmentMatcher(segment, fail);
        for (const id of current) {
          for (const childId of this.resolveChildren(id)) {
            if (matches(this.draft(childId).name)) add(childId);
          }
        }
      }

      if (next.length === 0) throw fail(`"${segment}" matches no node`);
      current = next;
    }

    if (current.includes(ROOT_ID)) throw fail('the root cannot be an alias target');
    return current;
  }

  // -------------------------------------------------------------------------
  // Freezing
  // -------------------------------------------------------------------------

  private freeze(draft: Draft): GrammarNode {
    const childIds = Object.freeze([...this.resolveChildren(draft.id)]);
    const base = {
      id: draft.id,
      name: draft.name,
      path: draft.path,
      parentId: draft.parentId,
      childIds,
      ...draft.attributes,
    };
    const decl = draft.decl;
    if (decl === null) {
      const root: RootNode = {
        ...base,
        kind: 'root',
        help: null,
        pattern: null,
        literalName: false,
        candidates: null,
      };
      return Object.freeze(root);
    }
    const shared = {
      ...base,
      help: decl.help,
      pattern: decl.pattern,
      literalName: decl.literalName,
      candidates: decl.candidates,
    };
    switch (decl.kind) {
      case 'routing': {
        const routing: RoutingNode = { ...shared, kind: 'routing' };
        return Object.freeze(routing);
      }
      case 'variable': {
        const variable: VariableNode = {
          ...shared,
          kind: 'variable',
          varName: decl.varName,
          typeName: decl.typeName,
          parseValue: decl.parseValue,
        };
        return Object.freeze(variable);
      }
      case 'action': {
        const action: ActionNode = { ...shared, kind: 'action', binding: decl.binding };
        return Object.freeze(action);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Effective attributes: explicit setting > nearest group override > kind
 * default.
 */
function effectiveAttributes(decl: NamedDecl, inherited: AttributeOverrides): NodeAttributes {
  const kindDefaults: NodeAttributes =
    decl.kind === 'action' ? { ...DEFAULT_ATTRIBUTES, helpGroup: ACTION_HELP_GROUP } : DEFAULT_ATTRIBUTES;
  return Object.freeze({ ...kindDefaults, ...defined(inherited), ...defined(decl.attributes) });
}

/** Drop keys whose value is undefined so they do not mask lower layers. */
function defined(overrides: AttributeOverrides): Partial<NodeAttributes> {
  const out: { -readonly [K in keyof NodeAttributes]?: NodeAttributes[K] } = {};
  if (overrides.traversals !== undefined) out.traversals = overrides.traversals;
  if (overrides.matchCandidates !== undefined) out.matchCandidates = overrides.matchCandidates;
  if (overrides.helpGroup !== undefined) out.helpGroup = overrides.helpGroup;
  if (overrides.helpOrder !== undefined) out.helpOrder = overrides.helpOrder;
  return out;
}

function segmentMatcher(
  segment: string,
  fail: (message: string) => AliasResolutionError,
): (name: string) => boolean {
  if (!isGlob(segment)) return (name) => name === segment;
  try {
    const regex = compileGlob(segment);
    return (name) => regex.test(name);
  } catch (err: unknown) {
    if (err instanceof GlobSyntaxError) throw fail(err.message);
    throw err;
  }
}

/** Where an alias sits, for error messages: `/parent/<alias>`. */
function aliasPath(owner: Draft): string {
  return owner.parentId === null ? '/<alias>' : `${owner.path}/<alias>`;
}
