/**
 * Arbor Loader — Error Types
 */

/** One problem found in a grammar source. `path` is dotted, e.g. `grammar.0.children.1.callback`. */
export interface LoaderIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Thrown when a grammar source cannot be turned into a Grammar: malformed
 * YAML or JSON, a schema violation, or a name missing from the registry.
 * Every issue found is reported at once.
 */
export class LoaderError extends Error {
  constructor(
    readonly issues: readonly LoaderIssue[],
    readonly source: string | null = null,
  ) {
    super(
      `Invalid grammar${source === null ? '' : ` ${source}`}: ` +
        issues.map((i) => (i.path === '' ? i.message : `[${i.path}] ${i.message}`)).join('; '),
    );
    this.name = 'LoaderError';
  }
}
