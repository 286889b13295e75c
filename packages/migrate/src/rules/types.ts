export type RuleName = 'include' | 'namespace' | 'using-namespace';

/**
 * A line-level rewrite. `apply` returns the line unchanged when it does not match.
 */
export interface LineRule {
  readonly name: RuleName;
  apply(line: string): string;
}
