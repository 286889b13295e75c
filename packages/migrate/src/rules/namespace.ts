import { toLowerIdentifier } from '../naming/transformer';
import type { LineRule, RuleName } from './types';

function namespaceRule(name: RuleName, pattern: RegExp): LineRule {
  return {
    name,
    apply(line: string): string {
      return line.replace(
        pattern,
        (_match, prefix: string, ident: string) => `${prefix}${toLowerIdentifier(ident)}`,
      );
    },
  };
}

/** `namespace FooBar {` -> `namespace foobar {` */
export const namespaceDeclarationRule = namespaceRule('namespace', /^(\s*namespace\s+)(\w+)/);

/** `using namespace FooBar;` -> `using namespace foobar;` */
export const usingNamespaceRule = namespaceRule(
  'using-namespace',
  /^(\s*using namespace\s+)(\w+)/,
);
