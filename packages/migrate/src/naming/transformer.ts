/**
 * CamelCase to snake_case conversions used when migrating file names and
 * the references to them.
 */

const WORD_RUN = /[A-Z][a-z]+/g;

/**
 * Convert a CamelCase token to snake_case.
 *
 * Every maximal run of one uppercase letter followed by lowercase letters is
 * lower-cased and the runs are joined with underscores, in input order.
 * Anything outside a run (digits, underscores, acronyms) is dropped, so tokens
 * without a run yield an empty string.
 *
 * @example
 * toSnakeCase('FastRecursiveMutex') // 'fast_recursive_mutex'
 * toSnakeCase('Widget')             // 'widget'
 * toSnakeCase('HTTP')               // ''
 */
export function toSnakeCase(token: string): string {
  return (token.match(WORD_RUN) ?? []).map((run) => run.toLowerCase()).join('_');
}

/**
 * `toSnakeCase`, falling back to lower-casing the whole token when it has no
 * CamelCase run.
 *
 * @example
 * toSnakeCaseOrLower('FooBar') // 'foo_bar'
 * toSnakeCaseOrLower('ab')     // 'ab'
 * toSnakeCaseOrLower('HTTP')   // 'http'
 */
export function toSnakeCaseOrLower(token: string): string {
  return toSnakeCase(token) || token.toLowerCase();
}

/**
 * Lower-case a whole identifier without splitting it into words.
 * Namespaces are migrated this way: `FooBar` becomes `foobar`, not `foo_bar`.
 */
export function toLowerIdentifier(token: string): string {
  return token.toLowerCase();
}
