/**
 * @arbor/loader
 *
 * Declarative grammar sources (YAML or JSON) validated against a closed
 * schema and built into an @arbor/grammar Grammar.
 */

export { loadGrammar, loadGrammarFile } from './loader.js';
export type { LoadedGrammar, LoaderRegistry } from './loader.js';
export { LoaderError } from './errors.js';
export type { LoaderIssue } from './errors.js';
export { EntrySchema, GrammarSourceSchema } from './schema.js';
export type {
  RawAction,
  RawAlias,
  RawAttributes,
  RawEntry,
  RawGrammarSource,
  RawGroup,
  RawHelp,
  RawNode,
  RawVariable,
} from './schema.js';
