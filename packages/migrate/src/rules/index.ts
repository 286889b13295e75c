import { includeRule } from './include';
import { namespaceDeclarationRule, usingNamespaceRule } from './namespace';
import type { LineRule } from './types';

export type { LineRule, RuleName } from './types';
export { includeRule, namespaceDeclarationRule, usingNamespaceRule };

export const DEFAULT_RULES: readonly LineRule[] = [
  includeRule,
  namespaceDeclarationRule,
  usingNamespaceRule,
];

/**
 * Offers `line` to every rule in order. The default rules are disjoint, so at
 * most one of them changes any given line.
 */
export function rewriteLine(line: string, rules: readonly LineRule[] = DEFAULT_RULES): string {
  return rules.reduce((current, rule) => rule.apply(current), line);
}
