import nodeFs from 'node:fs/promises';
import { IOError, atomicWrite, toAppError } from '@snakify/shared';
import { DEFAULT_RULES, rewriteLine, type LineRule } from '../rules';

export interface ContentRewrite {
  content: string;
  /** 1-based numbers of the lines that changed */
  changedLines: number[];
}

/**
 * Sources are decoded one byte per character. The rules only match ASCII, so
 * bytes outside it (Latin-1 comments, UTF-8 sequences) round-trip unchanged.
 */
export const SOURCE_ENCODING = 'latin1';

export interface SourceReader {
  readFile(path: string, encoding: typeof SOURCE_ENCODING): Promise<string>;
}

export interface RewriteFileOptions {
  rules?: readonly LineRule[];
  /** Compute the rewrite without writing it back */
  dryRun?: boolean;
  fs?: SourceReader;
}

/**
 * Splits text into lines that keep their terminators, so joining the result
 * reproduces the input byte for byte.
 */
export function splitLines(content: string): string[] {
  return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function rewriteContent(
  content: string,
  rules: readonly LineRule[] = DEFAULT_RULES,
): ContentRewrite {
  const changedLines: number[] = [];
  const lines = splitLines(content).map((line, index) => {
    const rewritten = rewriteLine(line, rules);
    if (rewritten !== line) changedLines.push(index + 1);
    return rewritten;
  });
  return { content: lines.join(''), changedLines };
}

export async function readSource(
  filePath: string,
  fs: SourceReader = nodeFs,
): Promise<string> {
  try {
    return await fs.readFile(filePath, SOURCE_ENCODING);
  } catch (error) {
    throw toAppError(error, (m, o) => new IOError(m, o), `Failed to read ${filePath}`);
  }
}

export async function writeSource(filePath: string, content: string): Promise<void> {
  try {
    await atomicWrite(filePath, Buffer.from(content, SOURCE_ENCODING));
  } catch (error) {
    throw toAppError(error, (m, o) => new IOError(m, o), `Failed to write ${filePath}`);
  }
}

/**
 * Rewrites the include and namespace lines of one file in place.
 * Nothing is written when no line changes.
 */
export async function rewriteFile(
  filePath: string,
  options: RewriteFileOptions = {},
): Promise<ContentRewrite> {
  const original = await readSource(filePath, options.fs);
  const result = rewriteContent(original, options.rules);
  if (!options.dryRun && result.changedLines.length > 0) {
    await writeSource(filePath, result.content);
  }
  return result;
}
