/**
 * Arbor Grammar — Parser
 *
 * Binds a Grammar to a ParseLogger. The free functions (parse, execute,
 * completeLine, help) stay usable on their own; the Parser adds logging of
 * every parse and execute run.
 */

import { completeLine } from './completion.js';
import type { LineCompletion } from './completion.js';
import type { ParseContext } from './context.js';
import { dispatch } from './dispatch.js';
import type { DispatchResult } from './dispatch.js';
import type { Grammar } from './grammar.js';
import { help } from './help.js';
import { ParseLogger } from './logging/parse-log.js';
import { parse } from './matcher.js';
import type { HelpPair } from './types.js';

export interface ParserOptions {
  /** Defaults to a logger without a sink, which records nothing. */
  readonly logger?: ParseLogger | undefined;
}

export class Parser {
  private readonly logger: ParseLogger;

  constructor(
    readonly grammar: Grammar,
    options: ParserOptions = {},
  ) {
    this.logger = options.logger ?? new ParseLogger();
  }

  parse(text: string): ParseContext {
    const context = parse(this.grammar, text);
    this.logger.record(this.logger.entryFor('parse', context));
    return context;
  }

  /**
   * Parse and dispatch. The run is logged even when the callback throws.
   *
   * @throws whatever the callback throws, and UserObjectRequiredError
   */
  execute(text: string, userObject?: unknown): DispatchResult {
    const context = parse(this.grammar, text);
    let thrown: { readonly error: unknown } | undefined;
    try {
      return dispatch(context, userObject);
    } catch (error: unknown) {
      thrown = { error };
      throw error;
    } finally {
      this.logger.record(this.logger.entryFor('execute', context, thrown));
    }
  }

  /** Complete the last word of `line`. Not logged. */
  complete(line: string): LineCompletion {
    return completeLine(this.grammar, line);
  }

  /** Help for what may follow `text`. Not logged. */
  help(text: string): HelpPair[] {
    return help(parse(this.grammar, text));
  }
}
