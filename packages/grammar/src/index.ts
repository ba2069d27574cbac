/**
 * @arbor/grammar
 *
 * Grammar-driven command line engine: node declarations, grammar build and
 * alias resolution, the token matcher, completion, contextual help and
 * dispatch.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:readline, node:process or any other I/O API; parse logging goes to
 * an injected LogSink. The interactive shell and file sinks live in
 * @arbor/cli.
 */

// Types
export type {
  ActionBinding,
  ActionCallback,
  ActionNode,
  AttributeOverrides,
  CandidateProvider,
  CompiledPattern,
  GrammarNode,
  Help,
  HelpPair,
  HelpProvider,
  NodeAttributes,
  RootNode,
  RoutingNode,
  UserActionCallback,
  VariableNode,
  VariableType,
  VarMap,
} from './types.js';

// Errors
export {
  AliasResolutionError,
  GrammarDefinitionError,
  IncompleteCommandError,
  UserObjectRequiredError,
  VariableParseError,
} from './errors.js';
export type { IncompleteReason } from './errors.js';

// Declarations
export { action, alias, END_OF_INPUT, group, node, userAction, variable } from './nodes.js';
export type {
  ActionDecl,
  ActionOptions,
  AliasDecl,
  GroupDecl,
  NodeDecl,
  NodeOptions,
  RoutingDecl,
  VariableDecl,
  VariableOptions,
} from './nodes.js';

export {
  boolean,
  email,
  float,
  host,
  hostname,
  integer,
  ip,
  ldapdn,
  string,
  uri,
  VARIABLE_TYPES,
  word,
} from './variable-types.js';

export { compilePattern, escapePattern, literalAlternatives } from './patterns.js';
export { compileGlob, GlobSyntaxError, isGlob, matchesGlob } from './glob.js';

// Grammar
export { buildGrammar, Grammar } from './grammar.js';

// Matching
export { readToken, skipWhitespace, tokenize } from './tokenizer.js';
export type { Token } from './tokenizer.js';
export { ParseContext } from './context.js';
export type { ParseOutcome } from './context.js';
export { accepts, eligibleChildren, parse } from './matcher.js';

// Completion, help and dispatch
export { complete, completeLine, staticCandidates } from './completion.js';
export type { LineCompletion } from './completion.js';
export { help, helpKey, helpSections } from './help.js';
export type { HelpSection } from './help.js';
export { dispatch, execute } from './dispatch.js';
export type { DispatchResult } from './dispatch.js';

// Parser and logging
export { Parser } from './parser.js';
export type { ParserOptions } from './parser.js';
export type { LogSink } from './logging/log-sink.js';
export { ParseLogger } from './logging/parse-log.js';
export type { LoggedOutcome, ParseLogEntry } from './logging/parse-log.js';
