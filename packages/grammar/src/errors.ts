/**
 * Arbor Grammar — Error Types
 *
 * Build-time errors (GrammarDefinitionError, AliasResolutionError) abort
 * grammar construction: no partially usable Grammar is ever returned.
 *
 * Parse-time problems are not thrown. A failing variable conversion is
 * recorded on the Context as a VariableParseError, and an incomplete or
 * invalid command is a normal parse outcome that execute() reports as an
 * IncompleteCommandError result. Callback errors propagate unchanged.
 */

// ---------------------------------------------------------------------------
// Build-time errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a node declaration is malformed: an uncompilable pattern, a
 * negative or fractional traversal limit, an invalid name, or a sibling
 * name collision.
 */
export class GrammarDefinitionError extends Error {
  constructor(
    message: string,
    public readonly path: string | null = null,
  ) {
    super(path === null ? message : `${path}: ${message}`);
    this.name = 'GrammarDefinitionError';
  }
}

/**
 * Thrown when an alias target cannot be resolved: malformed path syntax,
 * a segment matching no node, a root target, or a resolution cycle.
 */
export class AliasResolutionError extends Error {
  constructor(
    message: string,
    public readonly aliasPath: string,
    public readonly target: string,
  ) {
    super(`alias ${aliasPath} -> "${target}": ${message}`);
    this.name = 'AliasResolutionError';
  }
}

// ---------------------------------------------------------------------------
// Parse-time errors
// ---------------------------------------------------------------------------

/**
 * A variable's parse hook rejected the matched token.
 *
 * Recorded on the Context (never thrown by parse()). The branch is treated
 * as failed: no value is stored and matching halts at `offset`.
 */
export class VariableParseError extends Error {
  constructor(
    public readonly nodePath: string,
    public readonly token: string,
    public readonly offset: number,
    cause: unknown,
  ) {
    super(
      `invalid value "${token}" for ${nodePath}: ` +
        (cause instanceof Error ? cause.message : String(cause)),
      { cause },
    );
    this.name = 'VariableParseError';
  }
}

// ---------------------------------------------------------------------------
// Dispatch-time errors
// ---------------------------------------------------------------------------

/** Why a parse did not end at an executable action. */
export type IncompleteReason = 'unexpected-end' | 'invalid-token' | 'invalid-value';

/**
 * The command did not terminate at an Action with no remaining input.
 * Returned (not thrown) by execute(); no callback was invoked.
 */
export class IncompleteCommandError extends Error {
  constructor(
    public readonly reason: IncompleteReason,
    public readonly parsed: string,
    public readonly remaining: string,
    cause?: VariableParseError,
  ) {
    super(describeIncomplete(reason, parsed, remaining, cause), cause === undefined ? undefined : { cause });
    this.name = 'IncompleteCommandError';
  }
}

function describeIncomplete(
  reason: IncompleteReason,
  parsed: string,
  remaining: string,
  cause: VariableParseError | undefined,
): string {
  switch (reason) {
    case 'unexpected-end':
      return 'incomplete command';
    case 'invalid-token':
      return `invalid token at offset ${parsed.length}: "${remaining}"`;
    case 'invalid-value':
      return cause?.message ?? `invalid value at offset ${parsed.length}`;
  }
}

/**
 * An action declared `withUserObject` was executed without a user object.
 * This is a configuration error in the calling program, so it is thrown.
 */
export class UserObjectRequiredError extends Error {
  constructor(public readonly actionPath: string) {
    super(`action ${actionPath} requires a user object but none was supplied`);
    this.name = 'UserObjectRequiredError';
  }
}
