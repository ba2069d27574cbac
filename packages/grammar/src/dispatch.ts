/**
 * Arbor Grammar — Dispatcher
 *
 * execute() parses a command and, when it ends at an action with no input
 * left over, invokes the action's callback with the collected variables.
 * An incomplete or invalid command is an expected outcome, returned as an
 * IncompleteCommandError result without invoking anything. Errors thrown
 * by the callback propagate unchanged.
 */

import type { ParseContext } from './context.js';
import { IncompleteCommandError, UserObjectRequiredError } from './errors.js';
import type { IncompleteReason } from './errors.js';
import type { Grammar } from './grammar.js';
import { parse } from './matcher.js';

export type DispatchResult =
  | { readonly ok: true; readonly context: ParseContext; readonly value: unknown }
  | { readonly ok: false; readonly context: ParseContext; readonly error: IncompleteCommandError };

/**
 * Parse `text` and run the action it reaches.
 *
 * @param userObject - Passed first to actions declared with userAction()
 * @throws {UserObjectRequiredError} if the action needs a user object and
 *   none was given
 */
export function execute(grammar: Grammar, text: string, userObject?: unknown): DispatchResult {
  return dispatch(parse(grammar, text), userObject);
}

/**
 * Run the action a parsed context terminated at.
 *
 * @throws {UserObjectRequiredError} as for execute()
 */
export function dispatch(context: ParseContext, userObject?: unknown): DispatchResult {
  const action = context.terminal;
  if (action === null || !context.isComplete) {
    return { ok: false, context, error: incompleteError(context) };
  }

  const binding = action.binding;
  if (!binding.withUserObject) {
    return { ok: true, context, value: binding.callback(context.vars) };
  }
  if (userObject === undefined) {
    throw new UserObjectRequiredError(action.path);
  }
  return { ok: true, context, value: binding.callback(userObject, context.vars) };
}

function incompleteError(context: ParseContext): IncompleteCommandError {
  const reason: IncompleteReason =
    context.outcome === 'invalid-value' ? 'invalid-value'
    : context.outcome === 'no-match' ? 'invalid-token'
    : 'unexpected-end';
  return new IncompleteCommandError(reason, context.parsed, context.remaining, context.error ?? undefined);
}
