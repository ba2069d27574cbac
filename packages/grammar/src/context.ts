/**
 * Arbor Grammar — Parse Context
 *
 * All mutable state of one parse run. A Grammar is shared and immutable;
 * a ParseContext is created per parse, mutated only by the matcher, and
 * sealed once matching ends. Completion, help and dispatch read it.
 *
 * Traversal accounting is keyed by node id, so a node reached through an
 * alias shares its count with the node reached by its canonical path.
 */

import type { VariableParseError } from './errors.js';
import type { Grammar } from './grammar.js';
import type { ActionNode, GrammarNode, VariableNode, VarMap } from './types.js';

/**
 * How a parse run ended.
 *
 * - `terminal`: an action was reached and all input consumed
 * - `incomplete`: input ran out before an action
 * - `no-match`: no eligible child accepted the next token
 * - `invalid-value`: a variable's parse hook rejected its token
 */
export type ParseOutcome = 'terminal' | 'incomplete' | 'no-match' | 'invalid-value';

export class ParseContext {
  private position = 0;
  private current: GrammarNode;
  private readonly trail: GrammarNode[];
  private readonly counts = new Map<number, number>();
  private readonly values = new Map<string, unknown>();
  private reached: ActionNode | null = null;
  private zeroWidthTail = false;
  private result: ParseOutcome = 'incomplete';
  private failure: VariableParseError | null = null;
  private sealed = false;

  constructor(
    readonly grammar: Grammar,
    readonly input: string,
  ) {
    this.current = grammar.root;
    this.trail = [grammar.root];
  }

  // -------------------------------------------------------------------------
  // Read access
  // -------------------------------------------------------------------------

  /** Offset of the first unconsumed character. */
  get cursor(): number {
    return this.position;
  }

  /** Consumed input, trailing whitespace included. */
  get parsed(): string {
    return this.input.slice(0, this.position);
  }

  /** Unconsumed input. `parsed + remaining` is always the whole input. */
  get remaining(): string {
    return this.input.slice(this.position);
  }

  /** The node most recently entered. */
  get node(): GrammarNode {
    return this.current;
  }

  /**
   * The node whose children completion and help consult. After the
   * zero-width step into an end-of-input action this is the node before
   * it, so the alternatives at the end of the line stay visible.
   */
  get frontier(): GrammarNode {
    if (this.zeroWidthTail) {
      const previous = this.trail[this.trail.length - 2];
      if (previous !== undefined) return previous;
    }
    return this.current;
  }

  /** The action the parse terminated at, if any. */
  get terminal(): ActionNode | null {
    return this.reached;
  }

  /** Nodes entered, root first. */
  get history(): readonly GrammarNode[] {
    return [...this.trail];
  }

  /** Collected variables. Multi-traversal variables hold arrays. */
  get vars(): VarMap {
    return Object.freeze(
      Object.fromEntries(
        [...this.values].map(([key, value]): [string, unknown] => [key, Array.isArray(value) ? Object.freeze([...value]) : value]),
      ),
    );
  }

  get outcome(): ParseOutcome {
    return this.result;
  }

  /** Set when the outcome is `invalid-value`. */
  get error(): VariableParseError | null {
    return this.failure;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /** True when the parse reached an action with no input left over. */
  get isComplete(): boolean {
    return this.result === 'terminal' && this.reached !== null && this.remaining === '';
  }

  /** How many times `node` has consumed a token in this run. */
  traversalCount(node: GrammarNode): number {
    return this.counts.get(node.id) ?? 0;
  }

  /** Whether `node` still has traversal budget. A limit of 0 is unlimited. */
  canEnter(node: GrammarNode): boolean {
    return node.traversals === 0 || this.traversalCount(node) < node.traversals;
  }

  // -------------------------------------------------------------------------
  // Matcher access
  // -------------------------------------------------------------------------

  /** @internal */
  advanceTo(cursor: number): void {
    this.assertOpen();
    if (cursor < this.position || cursor > this.input.length) {
      throw new RangeError(`cursor ${cursor} out of range ${this.position}..${this.input.length}`);
    }
    this.position = cursor;
  }

  /**
   * Enter a node that consumed a token, charging its traversal budget.
   *
   * @internal
   */
  enter(node: GrammarNode): void {
    this.assertOpen();
    this.counts.set(node.id, this.traversalCount(node) + 1);
    this.trail.push(node);
    this.current = node;
    this.zeroWidthTail = false;
  }

  /**
   * Record the zero-width step into an action that matches end of input.
   * No traversal budget is charged.
   *
   * @internal
   */
  enterEndOfInput(node: ActionNode): void {
    this.assertOpen();
    this.trail.push(node);
    this.current = node;
    this.zeroWidthTail = true;
  }

  /**
   * Store a variable value: a scalar when the node may be traversed once,
   * otherwise appended to the node's list.
   *
   * @internal
   */
  store(node: VariableNode, value: unknown): void {
    this.assertOpen();
    if (node.traversals === 1) {
      this.values.set(node.varName, value);
      return;
    }
    const existing = this.values.get(node.varName);
    this.values.set(node.varName, Array.isArray(existing) ? [...existing, value] : [value]);
  }

  /**
   * End the run and seal the context.
   *
   * @internal
   */
  finish(outcome: ParseOutcome, error: VariableParseError | null = null): void {
    this.assertOpen();
    this.result = outcome;
    this.failure = error;
    if (outcome === 'terminal' && this.current.kind === 'action') {
      this.reached = this.current;
    }
    this.sealed = true;
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error('parse context is sealed');
    }
  }
}
