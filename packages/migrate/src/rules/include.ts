import { toSnakeCaseOrLower } from '../naming/transformer';
import type { LineRule } from './types';

// `#include "a/b/FooBar.h` -> prefix `#include "a/b/`, header `FooBar`
const INCLUDE_PATTERN = /(#\s*include\s+"(?:\w+\/)*)(\w+)\.h/g;

/**
 * Rewrites quoted includes of headers to their snake_case file name.
 * The directory prefix is kept verbatim; only the last segment changes.
 */
export const includeRule: LineRule = {
  name: 'include',
  apply(line: string): string {
    return line.replace(
      INCLUDE_PATTERN,
      (_match, prefix: string, header: string) => `${prefix}${toSnakeCaseOrLower(header)}.h`,
    );
  },
};
